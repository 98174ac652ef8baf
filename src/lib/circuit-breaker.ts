/**
 * Price-source circuit
 *
 * Counts consecutive market-data failures and, past the threshold, rejects
 * fetches until a cooldown has passed. The first fetch after the cooldown is
 * a trial: its outcome closes or reopens the circuit, and fetches issued
 * while it is pending are rejected. An open circuit during a run counts as a
 * total data-source failure.
 */

import { DATA_FETCH } from './constants';
import { createLogger } from './logger';

const log = createLogger('circuit-breaker');

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

type Phase =
  | { state: 'CLOSED' }
  | { state: 'OPEN'; openedAt: number }
  | { state: 'HALF_OPEN'; trialPending: boolean };

export interface CircuitBreakerConfig {
  /** Consecutive counted failures that open the circuit */
  failureThreshold: number;
  /** How long an open circuit rejects fetches */
  cooldownMs: number;
  /** Errors for which this returns false pass through without counting */
  isFailure: (error: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState, name: string) => void;
  now: () => number;
}

export interface CircuitStats {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  successes: number;
  failures: number;
  /** Errors rethrown without counting against the circuit */
  ignoredErrors: number;
  /** Calls refused while open or while a trial was pending */
  rejected: number;
  openedAt: number | null;
  remainingCooldownMs: number;
}

export class CircuitBreaker {
  readonly name: string;
  private readonly config: CircuitBreakerConfig;
  private phase: Phase = { state: 'CLOSED' };
  private consecutiveFailures = 0;
  private successes = 0;
  private failures = 0;
  private ignoredErrors = 0;
  private rejected = 0;

  constructor(name: string, config: Partial<CircuitBreakerConfig> = {}) {
    this.name = name;
    this.config = {
      failureThreshold: DATA_FETCH.CIRCUIT_FAILURE_THRESHOLD,
      cooldownMs: DATA_FETCH.CIRCUIT_COOLDOWN_MS,
      isFailure: () => true,
      now: () => Date.now(),
      ...config,
    };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const phase = this.refresh();
    if (phase.state === 'OPEN' || (phase.state === 'HALF_OPEN' && phase.trialPending)) {
      this.rejected++;
      throw new CircuitOpenError(this.name, this.remainingCooldownMs());
    }
    if (phase.state === 'HALF_OPEN') phase.trialPending = true;

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordError(error);
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  /** True when the next call would reach the price source */
  canExecute(): boolean {
    const phase = this.refresh();
    return phase.state === 'CLOSED' || (phase.state === 'HALF_OPEN' && !phase.trialPending);
  }

  getState(): CircuitState {
    return this.refresh().state;
  }

  getStats(): CircuitStats {
    const phase = this.refresh();
    return {
      name: this.name,
      state: phase.state,
      consecutiveFailures: this.consecutiveFailures,
      successes: this.successes,
      failures: this.failures,
      ignoredErrors: this.ignoredErrors,
      rejected: this.rejected,
      openedAt: phase.state === 'OPEN' ? phase.openedAt : null,
      remainingCooldownMs: this.remainingCooldownMs(),
    };
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.moveTo({ state: 'CLOSED' });
  }

  private recordSuccess(): void {
    this.successes++;
    this.consecutiveFailures = 0;
    if (this.phase.state === 'HALF_OPEN') this.moveTo({ state: 'CLOSED' });
  }

  private recordError(error: unknown): void {
    if (!this.config.isFailure(error)) {
      this.ignoredErrors++;
      // An uncounted error still ends the trial; the next call tries again.
      if (this.phase.state === 'HALF_OPEN') this.phase.trialPending = false;
      return;
    }
    this.failures++;
    this.consecutiveFailures++;
    if (this.phase.state === 'HALF_OPEN' || this.consecutiveFailures >= this.config.failureThreshold) {
      this.moveTo({ state: 'OPEN', openedAt: this.config.now() });
    }
  }

  /** Applies the cooldown expiry, then returns the current phase */
  private refresh(): Phase {
    if (this.phase.state === 'OPEN' && this.config.now() - this.phase.openedAt >= this.config.cooldownMs) {
      this.moveTo({ state: 'HALF_OPEN', trialPending: false });
    }
    return this.phase;
  }

  private moveTo(next: Phase): void {
    const from = this.phase.state;
    this.phase = next;
    if (from !== next.state) this.config.onStateChange?.(from, next.state, this.name);
  }

  private remainingCooldownMs(): number {
    if (this.phase.state !== 'OPEN') return 0;
    return Math.max(0, this.phase.openedAt + this.config.cooldownMs - this.config.now());
  }
}

export class CircuitOpenError extends Error {
  readonly circuitName: string;
  readonly retryAfterMs: number;

  constructor(circuitName: string, retryAfterMs: number) {
    super(`Circuit breaker '${circuitName}' is OPEN. Retry after ${Math.ceil(retryAfterMs / 1000)}s.`);
    this.name = 'CircuitOpenError';
    this.circuitName = circuitName;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Circuit for one price source that logs every state change
 */
export function createMarketDataCircuit(
  name: string = 'market-data',
  config: Partial<CircuitBreakerConfig> = {}
): CircuitBreaker {
  return new CircuitBreaker(name, {
    onStateChange: (from, to, circuit) => {
      log.warn('Circuit state change', { circuit, from, to });
    },
    ...config,
  });
}
