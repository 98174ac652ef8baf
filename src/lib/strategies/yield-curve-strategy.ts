/**
 * Yield Curve Strategy
 *
 * Reads curve shape from the relative 5-day momentum of a long-duration
 * treasury proxy against a short-duration one. The long proxy outrunning the
 * short one is read as steepening and buys duration; the reverse buys the
 * short end.
 */

import { STRATEGY_THRESHOLDS } from '../constants';
import { isDefined } from '../indicators/moving-averages';
import { snapshotIndicators } from '../indicators/indicator-set';
import { atrLevels, buildDirectionalSignal, formatPct } from './signal-builder';
import type { Signal, StrategyInput, TradingStrategy } from './types';

export interface YieldCurveOptions {
  longProxy: string;
  shortProxy: string;
  threshold: number;
}

export class YieldCurveStrategy implements TradingStrategy {
  name = 'Yield Curve';
  type = 'yield_curve' as const;
  family = 'specialized' as const;
  description = 'Long vs short treasury proxy momentum as a curve-shape signal';

  readonly options: YieldCurveOptions;

  constructor(options: Partial<YieldCurveOptions> = {}) {
    this.options = {
      longProxy: 'TLT',
      shortProxy: 'SHY',
      threshold: STRATEGY_THRESHOLDS.YIELD_CURVE_SPREAD,
      ...options,
    };
  }

  generate(input: StrategyInput): Signal[] {
    const { longProxy, shortProxy, threshold } = this.options;
    const longSet = input.indicators.get(longProxy);
    const shortSet = input.indicators.get(shortProxy);
    if (!longSet || !shortSet) return [];

    const long = snapshotIndicators(longSet);
    const short = snapshotIndicators(shortSet);
    if (!long || !short || !isDefined(long.momentum5) || !isDefined(short.momentum5)) return [];

    const spread = long.momentum5 - short.momentum5;
    const detail = `${longProxy} ${formatPct(long.momentum5)} vs ${shortProxy} ${formatPct(short.momentum5)} ` +
      `over 5d (spread ${formatPct(spread)})`;
    const common = {
      assetClass: input.assetClass,
      strategy: this.type,
      family: this.family,
      direction: 'BUY' as const,
      confidence: 0.8,
      strength: 1,
    };

    if (spread > threshold) {
      return [buildDirectionalSignal({
        ...common,
        snapshot: long,
        rationale: `Curve steepening: ${detail}`,
        ...atrLevels('BUY', long.price, long.atr, 2, 3),
      })];
    }

    if (spread < -threshold) {
      return [buildDirectionalSignal({
        ...common,
        snapshot: short,
        rationale: `Curve flattening: ${detail}`,
        ...atrLevels('BUY', short.price, short.atr, 1.5, 2),
      })];
    }

    return [];
  }
}
