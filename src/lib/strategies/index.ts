export * from './types';
export { MultiIndicatorVotingStrategy, formatTally, tallyVotes } from './voting-strategy';
export { TrendFollowingStrategy } from './trend-following-strategy';
export { MeanReversionStrategy } from './mean-reversion-strategy';
export { BreakoutStrategy } from './breakout-strategy';
export { MomentumBreakoutStrategy } from './momentum-breakout-strategy';
export { MomentumStrategy } from './momentum-strategy';
export { YieldCurveStrategy } from './yield-curve-strategy';
export { CreditSpreadStrategy } from './credit-spread-strategy';
export { FibonacciRetracementStrategy } from './fibonacci-strategy';
export { GoldFactorStrategy, calculateGoldFactors } from './gold-factor-strategy';
export { atrLevels, clampConfidence } from './signal-builder';
export { createStrategy, getAvailableStrategyTypes, registerStrategy } from './strategy-factory';
