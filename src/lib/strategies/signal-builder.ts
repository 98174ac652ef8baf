/**
 * Signal construction helpers shared by every strategy.
 */

import type { IndicatorSet, IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { snapshotIndicators } from '../indicators/indicator-set';
import type {
  AssetClass,
  DirectionalSignal,
  Signal,
  StrategyFamily,
  StrategyInput,
  StrategyType,
  TradeDirection,
  VoteTally,
  WatchSignal,
} from './types';

/** Stand-in ATR, as a fraction of price, when ATR is zero or unavailable */
export const FALLBACK_ATR_PCT = 0.02;

export function clampConfidence(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/**
 * ATR-multiple stop and target on the correct side of the price
 */
export function atrLevels(
  direction: TradeDirection,
  price: number,
  atr: number | undefined,
  stopMultiple: number,
  targetMultiple: number
): { stopLoss: number; target: number } {
  const range = isDefined(atr) && atr > 0 ? atr : price * FALLBACK_ATR_PCT;
  const sign = direction === 'BUY' ? 1 : -1;
  return {
    stopLoss: price - sign * stopMultiple * range,
    target: price + sign * targetMultiple * range,
  };
}

export interface SignalFields {
  snapshot: IndicatorSnapshot;
  assetClass: AssetClass;
  strategy: StrategyType;
  family: StrategyFamily;
  confidence: number;
  strength: number;
  rationale: string;
  votes?: VoteTally;
}

export function buildDirectionalSignal(
  fields: SignalFields & { direction: TradeDirection; stopLoss: number; target: number }
): DirectionalSignal {
  const { snapshot, ...rest } = fields;
  return {
    ...rest,
    instrument: snapshot.instrument,
    price: snapshot.price,
    asOf: snapshot.asOf,
    confidence: clampConfidence(fields.confidence),
  };
}

export function buildWatchSignal(fields: SignalFields): WatchSignal {
  const { snapshot, ...rest } = fields;
  return {
    ...rest,
    direction: 'WATCH',
    instrument: snapshot.instrument,
    price: snapshot.price,
    asOf: snapshot.asOf,
    confidence: clampConfidence(fields.confidence),
  };
}

/**
 * Run a per-instrument rule over every indicator set in the input
 */
export function evaluateEach(
  input: StrategyInput,
  evaluate: (snapshot: IndicatorSnapshot, set: IndicatorSet) => Signal | null
): Signal[] {
  const signals: Signal[] = [];
  for (const set of input.indicators.values()) {
    const snapshot = snapshotIndicators(set);
    if (!snapshot) continue;
    const signal = evaluate(snapshot, set);
    if (signal) signals.push(signal);
  }
  return signals;
}

export function formatPct(value: number): string {
  const pct = value * 100;
  return `${pct >= 0 ? '+' : ''}${pct.toFixed(2)}%`;
}
