/**
 * Price Sources
 *
 * Daily bar retrieval behind a small interface so orchestrators never see the
 * vendor client. The Alpaca source is built lazily from environment config
 * and goes through retry and the market-data circuit.
 */

import Alpaca from '@alpacahq/alpaca-trade-api';
import { CircuitBreaker, createMarketDataCircuit } from './circuit-breaker';
import { DATA_FETCH } from './constants';
import { alpacaConfig } from './env';
import type { PriceBar } from './indicators/types';
import { createLogger, serializeError } from './logger';
import { errorStatus, withRetry, type RetryConfig } from './retry';

const log = createLogger('price-source');

export interface PriceSource {
  readonly name: string;
  /** Most recent `lookbackBars` daily bars, oldest first */
  fetchDailyBars(symbol: string, lookbackBars: number): Promise<PriceBar[]>;
}

/**
 * Every request in a non-empty universe failed, or the source refused to
 * serve at all
 */
export class DataSourceUnavailableError extends Error {
  readonly source: string;
  readonly failures: number;

  constructor(source: string, failures: number, cause?: unknown) {
    super(`Price source '${source}' unavailable: ${failures} request(s) failed`);
    this.name = 'DataSourceUnavailableError';
    this.source = source;
    this.failures = failures;
    if (cause !== undefined) this.cause = cause;
  }
}

// ============================================
// ALPACA
// ============================================

export interface AlpacaBar {
  Timestamp: string;
  OpenPrice: number;
  HighPrice: number;
  LowPrice: number;
  ClosePrice: number;
  Volume: number;
}

/**
 * The slice of the Alpaca client this module calls
 */
export interface BarsClient {
  getBarsV2(
    symbol: string,
    options: { timeframe: string; start: string; feed: string }
  ): AsyncIterable<AlpacaBar>;
}

export interface AlpacaPriceSourceOptions {
  client?: BarsClient;
  circuit?: CircuitBreaker;
  retry?: Partial<RetryConfig>;
  feed?: string;
  now?: () => Date;
}

/**
 * Calendar days that cover `lookbackBars` trading days plus holidays
 */
export function calendarDaysFor(lookbackBars: number): number {
  return Math.ceil((lookbackBars * 365) / 252) + 10;
}

/**
 * Unknown or malformed symbols fail on their own; they say nothing about the
 * health of the source
 */
export function isSymbolError(error: unknown): boolean {
  const status = errorStatus(error);
  return status === 400 || status === 404 || status === 422;
}

export function toPriceBar(bar: AlpacaBar): PriceBar {
  return {
    date: bar.Timestamp.slice(0, 10),
    open: bar.OpenPrice,
    high: bar.HighPrice,
    low: bar.LowPrice,
    close: bar.ClosePrice,
    volume: bar.Volume,
  };
}

function createAlpacaClient(): BarsClient {
  return new Alpaca({
    keyId: alpacaConfig.apiKey,
    secretKey: alpacaConfig.apiSecret,
    paper: alpacaConfig.isPaper,
  });
}

export class AlpacaPriceSource implements PriceSource {
  readonly name = 'alpaca';
  private client: BarsClient | null;
  private readonly circuit: CircuitBreaker;
  private readonly retry: Partial<RetryConfig>;
  private readonly feed: string | undefined;
  private readonly now: () => Date;

  constructor(options: AlpacaPriceSourceOptions = {}) {
    this.client = options.client ?? null;
    this.circuit = options.circuit ?? createMarketDataCircuit('alpaca-market-data', { isFailure: e => !isSymbolError(e) });
    this.retry = {
      maxRetries: DATA_FETCH.MAX_RETRIES,
      baseDelayMs: DATA_FETCH.RETRY_BASE_DELAY_MS,
      ...options.retry,
    };
    this.feed = options.feed;
    this.now = options.now ?? (() => new Date());
  }

  private getClient(): BarsClient {
    if (!this.client) {
      this.client = createAlpacaClient();
    }
    return this.client;
  }

  async fetchDailyBars(symbol: string, lookbackBars: number): Promise<PriceBar[]> {
    const start = new Date(this.now().getTime() - calendarDaysFor(lookbackBars) * 86_400_000);
    const request = {
      timeframe: '1Day',
      start: start.toISOString().slice(0, 10),
      feed: this.feed ?? alpacaConfig.dataFeed,
    };

    return this.circuit.execute(() =>
      withRetry(
        async () => {
          const bars: PriceBar[] = [];
          for await (const bar of this.getClient().getBarsV2(symbol, request)) {
            bars.push(toPriceBar(bar));
          }
          return bars.slice(-lookbackBars);
        },
        {
          ...this.retry,
          onRetry: (attempt, error, delayMs) => {
            log.warn('Retrying bar request', { symbol, attempt, delayMs, ...serializeError(error) });
          },
        }
      )
    );
  }
}

// ============================================
// IN-MEMORY
// ============================================

/**
 * Serves fixed histories, for offline runs and tests. Unknown symbols
 * resolve to an empty history.
 */
export class StaticPriceSource implements PriceSource {
  readonly name = 'static';

  constructor(private readonly histories: ReadonlyMap<string, readonly PriceBar[]>) {}

  async fetchDailyBars(symbol: string, lookbackBars: number): Promise<PriceBar[]> {
    return (this.histories.get(symbol) ?? []).slice(-lookbackBars);
  }
}
