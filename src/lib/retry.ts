/**
 * Retry Utility with Exponential Backoff
 *
 * Retries transient price-source failures with exponential backoff and
 * jitter. Permanent failures (bad symbol, auth) are thrown on first sight.
 */

export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries: number;
  /** Base delay in ms before first retry (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in ms between retries (default: 10000) */
  maxDelayMs: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier: number;
  /** Add random jitter to prevent thundering herd (default: true) */
  jitter: boolean;
  /** Predicate deciding whether an error is worth another attempt */
  isRetryable: (error: unknown) => boolean;
  /** Optional callback on each retry attempt */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Injected for tests */
  wait: (ms: number) => Promise<void>;
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE']);

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Node-style error code (`ENOENT`, `ECONNRESET`, ...). Read structurally:
 * errors raised by `fs` under a test sandbox are not `instanceof Error`.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code = readField(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

export function isMissingFileError(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * HTTP status carried by an error, looking at the shapes axios and the
 * Alpaca client produce
 */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const direct = readField(error, 'status') ?? readField(error, 'statusCode');
  if (typeof direct === 'number') return direct;
  const response = readField(error, 'response');
  if (typeof response === 'object' && response !== null) {
    const status = readField(response, 'status');
    if (typeof status === 'number') return status;
  }
  return undefined;
}

/**
 * Rate limiting, server errors and dropped connections are transient
 */
export function isTransientError(error: unknown): boolean {
  const status = errorStatus(error);
  if (status !== undefined) return status === 429 || status >= 500;

  const code = errorCode(error);
  if (code !== undefined && TRANSIENT_CODES.has(code)) return true;
  return error instanceof Error && /timeout|socket hang up|network/i.test(error.message);
}

/**
 * Sleep helper (exported for testing)
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

const DEFAULT_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
  jitter: true,
  isRetryable: isTransientError,
  wait: sleep,
};

/**
 * Calculate delay for a given attempt with exponential backoff and optional jitter
 */
export function calculateDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'backoffMultiplier' | 'maxDelayMs' | 'jitter'>
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const clampedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    // Between 50% and 100% of the delay
    return Math.round(clampedDelay * (0.5 + Math.random() * 0.5));
  }

  return Math.round(clampedDelay);
}

/**
 * Execute an async function with retry logic
 *
 * Returns the result on success or throws the last error once retries are
 * exhausted or the error is not retryable.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const cfg: RetryConfig = { ...DEFAULT_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt <= cfg.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= cfg.maxRetries || !cfg.isRetryable(error)) {
        break;
      }

      const delay = calculateDelay(attempt, cfg);
      cfg.onRetry?.(attempt + 1, error, delay);

      await cfg.wait(delay);
    }
  }

  throw lastError;
}
