/**
 * Gold Factor Strategy
 *
 * Scores gold proxies on two factors:
 *   safe-haven      1 - min(daily volatility * 10, 1)
 *   inflation-hedge clamp(mean daily return over the drift window * 100, 0, 1)
 * Calm, rising gold is bought; volatile gold with no positive drift is sold.
 */

import { STRATEGY_THRESHOLDS, TA_PERIODS } from '../constants';
import type { IndicatorSet, IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { calculateReturns } from '../indicators/volatility';
import { atrLevels, buildDirectionalSignal, evaluateEach } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradingStrategy } from './types';

export interface GoldFactors {
  safeHaven: number;
  inflationHedge: number;
  dailyVolatility: number;
  meanDailyReturn: number;
}

/**
 * Factor scores for one gold proxy, or null when the history is too short
 * for the volatility or drift window.
 */
export function calculateGoldFactors(
  set: IndicatorSet,
  snapshot: IndicatorSnapshot,
  driftWindow: number = STRATEGY_THRESHOLDS.GOLD_DRIFT_WINDOW
): GoldFactors | null {
  if (!isDefined(snapshot.realizedVolatility)) return null;

  const returns = calculateReturns(set.closes).slice(-driftWindow);
  if (returns.length < driftWindow) return null;

  let sum = 0;
  for (const r of returns) {
    if (!isDefined(r)) return null;
    sum += r;
  }
  const meanDailyReturn = sum / driftWindow;
  const dailyVolatility = snapshot.realizedVolatility / Math.sqrt(TA_PERIODS.TRADING_DAYS_PER_YEAR);

  return {
    safeHaven: 1 - Math.min(dailyVolatility * 10, 1),
    inflationHedge: Math.min(Math.max(meanDailyReturn * 100, 0), 1),
    dailyVolatility,
    meanDailyReturn,
  };
}

export class GoldFactorStrategy implements TradingStrategy {
  name = 'Gold Factors';
  type = 'gold_factors' as const;
  family = 'specialized' as const;
  description = 'Safe-haven and inflation-hedge factor scoring for gold proxies';

  constructor(private readonly driftWindow: number = STRATEGY_THRESHOLDS.GOLD_DRIFT_WINDOW) {}

  evaluate(snapshot: IndicatorSnapshot, set: IndicatorSet, assetClass: AssetClass): Signal | null {
    const factors = calculateGoldFactors(set, snapshot, this.driftWindow);
    if (!factors) return null;

    const { safeHaven, inflationHedge } = factors;
    const scores = `safe-haven ${safeHaven.toFixed(2)}, inflation-hedge ${inflationHedge.toFixed(2)}`;
    const common = {
      snapshot,
      assetClass,
      strategy: this.type,
      family: this.family,
      strength: 2,
    };

    // Long-term trend filter applies only once SMA200 has warmed up
    const aboveLongTrend = !isDefined(snapshot.smaLong) || snapshot.price > snapshot.smaLong;

    if (safeHaven >= STRATEGY_THRESHOLDS.GOLD_SAFE_HAVEN_MIN &&
        inflationHedge >= STRATEGY_THRESHOLDS.GOLD_INFLATION_HEDGE_MIN &&
        aboveLongTrend) {
      return buildDirectionalSignal({
        ...common,
        direction: 'BUY',
        confidence: 0.5 + 0.4 * ((safeHaven + inflationHedge) / 2),
        rationale: `Gold factor support: ${scores}`,
        ...atrLevels('BUY', snapshot.price, snapshot.atr, 2, 3),
      });
    }

    if (inflationHedge === 0 && safeHaven < 0.5) {
      return buildDirectionalSignal({
        ...common,
        direction: 'SELL',
        confidence: 0.55,
        rationale: `Gold factor deterioration: ${scores}`,
        ...atrLevels('SELL', snapshot.price, snapshot.atr, 2, 3),
      });
    }

    return null;
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, (snapshot, set) => this.evaluate(snapshot, set, input.assetClass));
  }
}
