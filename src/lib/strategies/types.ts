/**
 * Strategy Types
 *
 * Signals are a closed union on `direction`: BUY and SELL always carry a
 * stop-loss and a target, WATCH never does.
 */

import type { IndicatorSet } from '../indicators/types';

export const ASSET_CLASSES = ['equities', 'bonds', 'commodities', 'golds'] as const;
export type AssetClass = (typeof ASSET_CLASSES)[number];

export type Direction = 'BUY' | 'SELL' | 'WATCH';
export type TradeDirection = Exclude<Direction, 'WATCH'>;

export type StrategyFamily = 'voting' | 'generic' | 'specialized' | 'fallback';

export type StrategyType =
  | 'multi_indicator_voting'
  | 'trend_following'
  | 'mean_reversion'
  | 'breakout'
  | 'momentum_breakout'
  | 'momentum'
  | 'yield_curve'
  | 'credit_spread'
  | 'fibonacci_retracement'
  | 'gold_factors'
  | 'forced_entry'
  | 'fusion_conflict';

export interface VoteTally {
  buy: number;
  sell: number;
  neutral: number;
  total: number;
}

interface SignalBase {
  instrument: string;
  assetClass: AssetClass;
  strategy: StrategyType;
  family: StrategyFamily;
  /** Bounded to [0, 1] */
  confidence: number;
  /** Count of agreeing sub-conditions or votes */
  strength: number;
  price: number;
  /** Date of the bar the signal was computed on */
  asOf: string;
  rationale: string;
  votes?: VoteTally;
  /** Other strategies whose candidates were folded into this one */
  supportingStrategies?: StrategyType[];
}

export interface DirectionalSignal extends SignalBase {
  direction: TradeDirection;
  stopLoss: number;
  target: number;
}

export interface WatchSignal extends SignalBase {
  direction: 'WATCH';
}

export type Signal = DirectionalSignal | WatchSignal;

export function isDirectional(signal: Signal): signal is DirectionalSignal {
  return signal.direction !== 'WATCH';
}

export function isWatch(signal: Signal): signal is WatchSignal {
  return signal.direction === 'WATCH';
}

export interface StrategyInput {
  assetClass: AssetClass;
  indicators: ReadonlyMap<string, IndicatorSet>;
}

/**
 * A deterministic rule set over indicator sets. `generate` returns every
 * candidate it produces; filtering is left to the selection policy.
 */
export interface TradingStrategy {
  name: string;
  type: StrategyType;
  family: StrategyFamily;
  description: string;
  generate(input: StrategyInput): Signal[];
}
