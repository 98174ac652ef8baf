/**
 * Momentum Strategy
 *
 * Rides strong 10- and 20-day rate of change when MACD and RSI confirm.
 */

import type { IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { atrLevels, buildDirectionalSignal, evaluateEach, formatPct } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradingStrategy } from './types';

export interface MomentumOptions {
  shortThreshold: number;
  longThreshold: number;
}

export class MomentumStrategy implements TradingStrategy {
  name = 'Momentum';
  type = 'momentum' as const;
  family = 'generic' as const;
  description = 'Strong 10/20-day momentum confirmed by MACD and RSI';

  readonly options: MomentumOptions;

  constructor(options: Partial<MomentumOptions> = {}) {
    this.options = { shortThreshold: 0.03, longThreshold: 0.05, ...options };
  }

  evaluate(snapshot: IndicatorSnapshot, assetClass: AssetClass): Signal | null {
    const { momentum10, momentum20, macdLine, macdSignal, rsi, price, atr } = snapshot;
    if (!isDefined(momentum10) || !isDefined(momentum20) || !isDefined(macdLine) ||
        !isDefined(macdSignal) || !isDefined(rsi)) {
      return null;
    }

    const { shortThreshold, longThreshold } = this.options;
    let direction: 'BUY' | 'SELL' | null = null;

    if (momentum10 > shortThreshold && momentum20 > longThreshold && macdLine > macdSignal && rsi > 50) {
      direction = 'BUY';
    } else if (momentum10 < -shortThreshold && momentum20 < -longThreshold && macdLine < macdSignal && rsi < 50) {
      direction = 'SELL';
    }
    if (direction === null) return null;

    return buildDirectionalSignal({
      snapshot,
      assetClass,
      strategy: this.type,
      family: this.family,
      direction,
      confidence: 0.7,
      strength: 4,
      rationale: `Momentum ${formatPct(momentum10)} (10d), ${formatPct(momentum20)} (20d), ` +
        `MACD ${direction === 'BUY' ? 'above' : 'below'} signal, RSI ${rsi.toFixed(1)}`,
      ...atrLevels(direction, price, atr, 1.5, 2.5),
    });
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, snapshot => this.evaluate(snapshot, input.assetClass));
  }
}
