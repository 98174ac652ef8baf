/**
 * Strategy Factory
 *
 * Registry pattern for creating strategy instances by type.
 */

import type { StrategyType, TradingStrategy } from './types';
import { MultiIndicatorVotingStrategy } from './voting-strategy';
import { TrendFollowingStrategy } from './trend-following-strategy';
import { MeanReversionStrategy } from './mean-reversion-strategy';
import { BreakoutStrategy } from './breakout-strategy';
import { MomentumBreakoutStrategy } from './momentum-breakout-strategy';
import { MomentumStrategy } from './momentum-strategy';
import { YieldCurveStrategy } from './yield-curve-strategy';
import { CreditSpreadStrategy } from './credit-spread-strategy';
import { FibonacciRetracementStrategy } from './fibonacci-strategy';
import { GoldFactorStrategy } from './gold-factor-strategy';

const registry = new Map<string, () => TradingStrategy>();

// Register built-in strategies
registry.set('multi_indicator_voting', () => new MultiIndicatorVotingStrategy());
registry.set('trend_following', () => new TrendFollowingStrategy());
registry.set('mean_reversion', () => new MeanReversionStrategy());
registry.set('breakout', () => new BreakoutStrategy());
registry.set('momentum_breakout', () => new MomentumBreakoutStrategy());
registry.set('momentum', () => new MomentumStrategy());
registry.set('yield_curve', () => new YieldCurveStrategy());
registry.set('credit_spread', () => new CreditSpreadStrategy());
registry.set('fibonacci_retracement', () => new FibonacciRetracementStrategy());
registry.set('gold_factors', () => new GoldFactorStrategy());

/**
 * Create a strategy instance by type
 */
export function createStrategy(type: string): TradingStrategy {
  const factory = registry.get(type);
  if (!factory) {
    throw new Error(`Unknown strategy type: ${type}`);
  }
  return factory();
}

/**
 * Get all available strategy types
 */
export function getAvailableStrategyTypes(): string[] {
  return Array.from(registry.keys());
}

/**
 * Register a custom implementation for a strategy type
 */
export function registerStrategy(type: StrategyType, factory: () => TradingStrategy): void {
  registry.set(type, factory);
}
