/**
 * Request Rate Limiting
 *
 * Token bucket shared by every orchestrator that talks to the same price
 * source. Tests use `unlimitedRateLimiter` and never wait.
 */

import { sleep } from './retry';

export interface RateLimiter {
  acquire(tokens?: number): Promise<void>;
}

export interface TokenBucketConfig {
  /** Bucket capacity (burst size) */
  maxTokens: number;
  /** Tokens added back per second */
  refillPerSecond: number;
  /** Longest single wait while polling for tokens */
  maxWaitMs: number;
  now: () => number;
  wait: (ms: number) => Promise<void>;
}

const DEFAULT_CONFIG: TokenBucketConfig = {
  maxTokens: 20,
  refillPerSecond: 2,
  maxWaitMs: 100,
  now: () => Date.now(),
  wait: sleep,
};

export class TokenBucketRateLimiter implements RateLimiter {
  private readonly config: TokenBucketConfig;
  private tokens: number;
  private lastRefillTime: number;

  constructor(config: Partial<TokenBucketConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.refillPerSecond <= 0) {
      throw new Error('refillPerSecond must be positive');
    }
    this.tokens = this.config.maxTokens;
    this.lastRefillTime = this.config.now();
  }

  /**
   * Wait until `tokensNeeded` tokens are available, then take them
   */
  async acquire(tokensNeeded: number = 1): Promise<void> {
    while (true) {
      this.refill();

      if (this.tokens >= tokensNeeded) {
        this.tokens -= tokensNeeded;
        return;
      }

      const waitMs = ((tokensNeeded - this.tokens) / this.config.refillPerSecond) * 1000;
      await this.config.wait(Math.min(Math.ceil(waitMs), this.config.maxWaitMs));
    }
  }

  getAvailableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.config.now();
    const elapsedSeconds = (now - this.lastRefillTime) / 1000;
    this.tokens = Math.min(this.config.maxTokens, this.tokens + elapsedSeconds * this.config.refillPerSecond);
    this.lastRefillTime = now;
  }
}

export const unlimitedRateLimiter: RateLimiter = {
  acquire: () => Promise.resolve(),
};
