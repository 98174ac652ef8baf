/**
 * Portfolio Technical Manager
 *
 * Runs one orchestrator per enabled asset class, isolates their failures and
 * exposes the aggregated signals through a uniform query surface.
 */

import { AssetClassOrchestrator, type AssetClassRunResult } from './asset-class-orchestrator';
import { createAssetClassModule } from './asset-classes';
import type { AnalysisStatus } from './analysis-state-machine';
import { ConfigValidationError, defaultAnalysisConfig, type AnalysisConfig } from './analysis-config';
import { SELECTION_DEFAULTS, DATA_FETCH } from './constants';
import { validateEnvironment } from './env';
import { toSignalRow, type SignalTableRow } from './formatters';
import { createLogger, serializeError } from './logger';
import { AlpacaPriceSource, type PriceSource } from './price-source';
import { TokenBucketRateLimiter, type RateLimiter } from './rate-limiter';
import { FileReportSink, nullReportSink, type ReportSink } from './report-writer';
import { compareText } from './selection/fusion';
import { ASSET_CLASSES, isDirectional, type AssetClass, type Direction, type Signal } from './strategies/types';
import { FileUniverseSource, StaticUniverseSource, type UniverseSource } from './universe-loader';

const log = createLogger('portfolio-technical-manager');

// ============================================
// TYPES
// ============================================

export interface RunOptions {
  /** Classes not yet started when the signal aborts are left untouched */
  signal?: AbortSignal;
  /** Restrict the run to these classes (default: every registered class) */
  assetClasses?: readonly AssetClass[];
}

export interface DirectionCounts {
  total: number;
  buy: number;
  sell: number;
  watch: number;
}

export interface TradingSummary {
  totalSignals: number;
  buySignals: number;
  sellSignals: number;
  watchSignals: number;
  breakdown: Partial<Record<AssetClass, DirectionCounts>>;
  strongestSignals: SignalTableRow[];
}

export interface AssetClassSignalSummary extends DirectionCounts {
  status: AnalysisStatus;
  lastUpdate: string | null;
}

export interface SignalValidationEntry {
  valid: boolean;
  signalCount: number;
  issues: string[];
}

export interface ConfidenceStatistics {
  mean: number;
  min: number;
  max: number;
}

export interface ComprehensiveReport {
  generatedAt: string;
  status: Record<AssetClass, AnalysisStatus>;
  summary: TradingSummary;
  topSignals: SignalTableRow[];
  assetClasses: Partial<Record<AssetClass, {
    /** Trade list and watchlist */
    distribution: DirectionCounts;
    /** Trade list only */
    confidence: ConfidenceStatistics | null;
    skipped: number;
    error?: string;
  }>>;
}

export interface ManagerDependencies {
  orchestrators: readonly AssetClassOrchestrator[];
  /** Workers in the pool; one task per asset class */
  concurrency?: number;
  reportSink?: ReportSink;
  now?: () => Date;
}

// ============================================
// WORKER POOL
// ============================================

/**
 * Run `worker` over `items` with at most `limit` in flight. Items not started
 * before `signal` aborts are skipped.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const item = items[next++];
      await worker(item);
    }
  });
  await Promise.all(lanes);
}

function compareRows(a: SignalTableRow, b: SignalTableRow): number {
  return (
    b.confidence - a.confidence ||
    compareText(a.instrument, b.instrument) ||
    compareText(a.assetClass, b.assetClass)
  );
}

/**
 * Trade list followed by the watchlist
 */
function reportedSignals(result: AssetClassRunResult): Signal[] {
  return [...result.signals, ...result.watchlist];
}

function countDirections(rows: readonly { direction: Direction }[]): DirectionCounts {
  const counts: DirectionCounts = { total: rows.length, buy: 0, sell: 0, watch: 0 };
  for (const row of rows) {
    if (row.direction === 'BUY') counts.buy++;
    else if (row.direction === 'SELL') counts.sell++;
    else counts.watch++;
  }
  return counts;
}

// ============================================
// MANAGER
// ============================================

export class PortfolioTechnicalManager {
  private readonly orchestrators: Map<AssetClass, AssetClassOrchestrator>;
  private readonly concurrency: number;
  private readonly reportSink: ReportSink;
  private readonly now: () => Date;
  private readonly results = new Map<AssetClass, AssetClassRunResult>();

  constructor(deps: ManagerDependencies) {
    this.orchestrators = new Map(deps.orchestrators.map(o => [o.assetClass, o]));
    this.concurrency = Math.max(1, deps.concurrency ?? 4);
    this.reportSink = deps.reportSink ?? nullReportSink;
    this.now = deps.now ?? (() => new Date());
  }

  getAssetClasses(): AssetClass[] {
    return Array.from(this.orchestrators.keys());
  }

  /**
   * Analyze every registered asset class. True when no class ended in Error
   * and the run was not aborted.
   */
  async runAssetClassAnalysis(options: RunOptions = {}): Promise<boolean> {
    const targets = (options.assetClasses ?? this.getAssetClasses()).filter(c => this.orchestrators.has(c));
    const started = Date.now();
    log.info('Starting technical analysis', { assetClasses: targets, concurrency: this.concurrency });

    let failed = 0;
    await runBounded(
      targets,
      this.concurrency,
      async assetClass => {
        const result = await this.runOne(assetClass);
        if (result.status === 'Error') failed++;
      },
      options.signal
    );

    const aborted = options.signal?.aborted ?? false;
    if (aborted) {
      log.warn('Technical analysis aborted', { completed: targets.filter(c => this.results.has(c)) });
    }
    log.info('Technical analysis finished', { failed, aborted, durationMs: Date.now() - started });
    return failed === 0 && !aborted;
  }

  async runSingleAssetClass(assetClass: AssetClass): Promise<boolean> {
    if (!this.orchestrators.has(assetClass)) {
      log.warn('Asset class is not enabled', { assetClass });
      return false;
    }
    const result = await this.runOne(assetClass);
    return result.status !== 'Error';
  }

  private async runOne(assetClass: AssetClass): Promise<AssetClassRunResult> {
    const orchestrator = this.orchestrators.get(assetClass);
    if (!orchestrator) {
      throw new Error(`No orchestrator registered for ${assetClass}`);
    }
    const result = await orchestrator.run();
    this.results.set(assetClass, result);
    return result;
  }

  // ============================================
  // QUERIES
  // ============================================

  getAssetClassSignals(assetClass: AssetClass): SignalTableRow[] {
    return (this.results.get(assetClass)?.signals ?? []).map(toSignalRow);
  }

  /**
   * Instruments under observation: WATCH survivors outside the trade list
   */
  getAssetClassWatchlist(assetClass: AssetClass): SignalTableRow[] {
    return (this.results.get(assetClass)?.watchlist ?? []).map(toSignalRow);
  }

  private allRows(): SignalTableRow[] {
    const rows: SignalTableRow[] = [];
    for (const assetClass of ASSET_CLASSES) {
      rows.push(...this.getAssetClassSignals(assetClass));
    }
    return rows;
  }

  getTopSignals(n: number): SignalTableRow[] {
    if (n <= 0) return [];
    return this.allRows().sort(compareRows).slice(0, n);
  }

  getTradingSummary(): TradingSummary {
    const breakdown: Partial<Record<AssetClass, DirectionCounts>> = {};
    const reported: Signal[] = [];
    for (const [assetClass, result] of this.results) {
      const signals = reportedSignals(result);
      breakdown[assetClass] = countDirections(signals);
      reported.push(...signals);
    }
    const totals = countDirections(reported);

    return {
      totalSignals: totals.total,
      buySignals: totals.buy,
      sellSignals: totals.sell,
      watchSignals: totals.watch,
      breakdown,
      strongestSignals: this.getTopSignals(SELECTION_DEFAULTS.STRONGEST_SIGNALS),
    };
  }

  /**
   * Status per registered class; classes that never ran report NotRun
   */
  getAnalysisStatus(): Record<AssetClass, AnalysisStatus> {
    const status: Record<AssetClass, AnalysisStatus> = {
      equities: 'NotRun',
      bonds: 'NotRun',
      commodities: 'NotRun',
      golds: 'NotRun',
    };
    for (const [assetClass, result] of this.results) {
      status[assetClass] = result.status;
    }
    return status;
  }

  getSignalsSummary(): Partial<Record<AssetClass, AssetClassSignalSummary>> {
    const summary: Partial<Record<AssetClass, AssetClassSignalSummary>> = {};
    for (const assetClass of this.orchestrators.keys()) {
      const result = this.results.get(assetClass);
      summary[assetClass] = {
        ...countDirections(result ? reportedSignals(result) : []),
        status: result?.status ?? 'NotRun',
        lastUpdate: result ? result.finishedAt.toISOString() : null,
      };
    }
    return summary;
  }

  filterSignalsByStrength(minConfidence: number): SignalTableRow[] {
    return this.allRows()
      .filter(row => row.confidence >= minConfidence)
      .sort(compareRows);
  }

  /**
   * Structural check of every stored signal
   */
  validateSignals(): Partial<Record<AssetClass, SignalValidationEntry>> {
    const report: Partial<Record<AssetClass, SignalValidationEntry>> = {};

    for (const [assetClass, result] of this.results) {
      const issues: string[] = [];
      const signals = reportedSignals(result);
      signals.forEach((signal, index) => {
        const label = `${assetClass}[${index}]`;
        if (!signal.instrument) issues.push(`${label}: missing instrument`);
        if (!['BUY', 'SELL', 'WATCH'].includes(signal.direction)) {
          issues.push(`${label}: invalid direction ${signal.direction}`);
        }
        if (!Number.isFinite(signal.confidence) || signal.confidence < 0 || signal.confidence > 1) {
          issues.push(`${label}: confidence ${signal.confidence} outside [0, 1]`);
        }
        if (isDirectional(signal) && (!Number.isFinite(signal.stopLoss) || !Number.isFinite(signal.target))) {
          issues.push(`${label}: directional signal without stop-loss or target`);
        }
      });
      report[assetClass] = { valid: issues.length === 0, signalCount: signals.length, issues };
    }

    return report;
  }

  generateComprehensiveReport(): ComprehensiveReport {
    const assetClasses: ComprehensiveReport['assetClasses'] = {};
    for (const [assetClass, result] of this.results) {
      const confidences = result.signals.map(s => s.confidence);
      assetClasses[assetClass] = {
        distribution: countDirections(reportedSignals(result)),
        confidence: confidences.length > 0
          ? {
              mean: confidences.reduce((sum, c) => sum + c, 0) / confidences.length,
              min: Math.min(...confidences),
              max: Math.max(...confidences),
            }
          : null,
        skipped: result.skipped.length,
        error: result.error,
      };
    }

    return {
      generatedAt: this.now().toISOString(),
      status: this.getAnalysisStatus(),
      summary: this.getTradingSummary(),
      topSignals: this.getTopSignals(SELECTION_DEFAULTS.REPORT_TOP_SIGNALS),
      assetClasses,
    };
  }

  /**
   * Write the comprehensive report through the sink. Returns the written
   * location, or null when the sink discarded it or the write failed.
   */
  async saveComprehensiveReport(): Promise<string | null> {
    const generatedAt = this.now();
    try {
      return await this.reportSink.writeComprehensiveReport(this.generateComprehensiveReport(), generatedAt);
    } catch (error) {
      log.error('Failed to save comprehensive report', serializeError(error));
      return null;
    }
  }
}

// ============================================
// FACTORY
// ============================================

export interface ManagerOverrides {
  priceSource?: PriceSource;
  rateLimiter?: RateLimiter;
  reportSink?: ReportSink;
  universeSource?: UniverseSource;
  now?: () => Date;
}

function universeSourceFor(config: AnalysisConfig): UniverseSource {
  const inline: Partial<Record<AssetClass, string[]>> = {};
  for (const assetClass of ASSET_CLASSES) {
    const universe = config.assetClasses[assetClass].universe;
    if (universe) inline[assetClass] = universe;
  }
  const files = new FileUniverseSource(config.tickersDir);
  if (Object.keys(inline).length === 0) return files;

  const fixed = new StaticUniverseSource(inline);
  return {
    load: (assetClass, fallback) =>
      inline[assetClass] ? fixed.load(assetClass, fallback) : files.load(assetClass, fallback),
  };
}

/**
 * Alpaca market data, once its credentials are known to be present
 */
function defaultPriceSource(): PriceSource {
  const env = validateEnvironment();
  if (!env.valid) {
    throw new ConfigValidationError('environment', env.missing.map(name => `${name} is required`));
  }
  return new AlpacaPriceSource();
}

/**
 * Wire a manager for every enabled asset class in `config`. The rate limiter
 * is shared by all orchestrators.
 */
export function createPortfolioTechnicalManager(
  config: AnalysisConfig = defaultAnalysisConfig(),
  overrides: ManagerOverrides = {}
): PortfolioTechnicalManager {
  const priceSource = overrides.priceSource ?? defaultPriceSource();
  const rateLimiter = overrides.rateLimiter ?? new TokenBucketRateLimiter({
    maxTokens: DATA_FETCH.BURST,
    refillPerSecond: DATA_FETCH.REQUESTS_PER_SECOND,
  });
  const reportSink = overrides.reportSink ??
    (config.writeReports ? new FileReportSink(config.reportDir) : nullReportSink);
  const universeSource = overrides.universeSource ?? universeSourceFor(config);

  const orchestrators = ASSET_CLASSES
    .filter(assetClass => config.assetClasses[assetClass].enabled)
    .map(assetClass => {
      const settings = config.assetClasses[assetClass];
      const module = createAssetClassModule(assetClass, {
        overrides: {
          lookbackBars: settings.lookbackBars,
          minHistoryBars: settings.minHistoryBars,
          minPositions: settings.minPositions,
          maxPositions: settings.maxPositions,
        },
        majorityThreshold: settings.majorityThreshold,
        strategyTypes: settings.strategies,
      });
      return new AssetClassOrchestrator({
        module,
        priceSource,
        universeSource,
        rateLimiter,
        reportSink,
        now: overrides.now,
      });
    });

  return new PortfolioTechnicalManager({
    orchestrators,
    concurrency: config.concurrency,
    reportSink,
    now: overrides.now,
  });
}
