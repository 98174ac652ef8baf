/**
 * Credit Spread Strategy
 *
 * High-yield outperforming investment-grade over 10 days reads as spreads
 * narrowing (risk-on credit); the reverse reads as widening.
 */

import { STRATEGY_THRESHOLDS } from '../constants';
import { isDefined } from '../indicators/moving-averages';
import { snapshotIndicators } from '../indicators/indicator-set';
import { atrLevels, buildDirectionalSignal, formatPct } from './signal-builder';
import type { Signal, StrategyInput, TradingStrategy } from './types';

export interface CreditSpreadOptions {
  highYieldProxy: string;
  investmentGradeProxy: string;
  threshold: number;
}

export class CreditSpreadStrategy implements TradingStrategy {
  name = 'Credit Spread';
  type = 'credit_spread' as const;
  family = 'specialized' as const;
  description = 'High-yield vs investment-grade momentum as a credit-spread signal';

  readonly options: CreditSpreadOptions;

  constructor(options: Partial<CreditSpreadOptions> = {}) {
    this.options = {
      highYieldProxy: 'HYG',
      investmentGradeProxy: 'LQD',
      threshold: STRATEGY_THRESHOLDS.CREDIT_SPREAD,
      ...options,
    };
  }

  generate(input: StrategyInput): Signal[] {
    const { highYieldProxy, investmentGradeProxy, threshold } = this.options;
    const hySet = input.indicators.get(highYieldProxy);
    const igSet = input.indicators.get(investmentGradeProxy);
    if (!hySet || !igSet) return [];

    const hy = snapshotIndicators(hySet);
    const ig = snapshotIndicators(igSet);
    if (!hy || !ig || !isDefined(hy.momentum10) || !isDefined(ig.momentum10)) return [];

    const detail = `${highYieldProxy} ${formatPct(hy.momentum10)} vs ${investmentGradeProxy} ` +
      `${formatPct(ig.momentum10)} over 10d`;
    const common = {
      assetClass: input.assetClass,
      strategy: this.type,
      family: this.family,
      direction: 'BUY' as const,
      confidence: 0.7,
      strength: 1,
    };

    if (hy.momentum10 - ig.momentum10 > threshold) {
      return [buildDirectionalSignal({
        ...common,
        snapshot: hy,
        rationale: `Credit spreads narrowing: ${detail}`,
        ...atrLevels('BUY', hy.price, hy.atr, 2, 3),
      })];
    }

    if (ig.momentum10 - hy.momentum10 > threshold) {
      return [buildDirectionalSignal({
        ...common,
        snapshot: ig,
        rationale: `Credit spreads widening: ${detail}`,
        ...atrLevels('BUY', ig.price, ig.atr, 1.5, 2),
      })];
    }

    return [];
  }
}
