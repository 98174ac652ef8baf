/**
 * Fibonacci Retracement Strategy
 *
 * Buys an oversold touch of the 38.2% or 61.8% retracement of the recent
 * range and sells an overbought touch of the 78.6% level.
 */

import { STRATEGY_THRESHOLDS } from '../constants';
import type { IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { fibonacciPrice } from '../indicators/trend';
import { atrLevels, buildDirectionalSignal, evaluateEach } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradingStrategy } from './types';

const SUPPORT_RATIOS = [0.382, 0.618];
const RESISTANCE_RATIO = 0.786;

export class FibonacciRetracementStrategy implements TradingStrategy {
  name = 'Fibonacci Retracement';
  type = 'fibonacci_retracement' as const;
  family = 'specialized' as const;
  description = 'Oscillator-confirmed reactions at Fibonacci retracement levels';

  constructor(private readonly tolerance: number = STRATEGY_THRESHOLDS.FIBONACCI_TOLERANCE) {}

  private near(price: number, level: number | undefined): boolean {
    return isDefined(level) && Math.abs(price - level) / price < this.tolerance;
  }

  evaluate(snapshot: IndicatorSnapshot, assetClass: AssetClass): Signal | null {
    const { fibonacci, rsi, price, atr } = snapshot;
    if (!fibonacci || !isDefined(rsi)) return null;

    const common = {
      snapshot,
      assetClass,
      strategy: this.type,
      family: this.family,
      confidence: 0.6,
      strength: 2,
    };

    const support = SUPPORT_RATIOS.find(ratio => this.near(price, fibonacciPrice(fibonacci, ratio)));
    if (support !== undefined && rsi < 40) {
      return buildDirectionalSignal({
        ...common,
        direction: 'BUY',
        rationale: `Support at ${(support * 100).toFixed(1)}% retracement ` +
          `${fibonacciPrice(fibonacci, support)?.toFixed(2)} with RSI ${rsi.toFixed(1)}`,
        ...atrLevels('BUY', price, atr, 1.5, 2),
      });
    }

    const resistance = fibonacciPrice(fibonacci, RESISTANCE_RATIO);
    if (isDefined(resistance) && this.near(price, resistance) && rsi > 60) {
      return buildDirectionalSignal({
        ...common,
        direction: 'SELL',
        rationale: `Resistance at ${(RESISTANCE_RATIO * 100).toFixed(1)}% retracement ` +
          `${resistance.toFixed(2)} with RSI ${rsi.toFixed(1)}`,
        ...atrLevels('SELL', price, atr, 1.5, 2),
      });
    }

    return null;
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, snapshot => this.evaluate(snapshot, input.assetClass));
  }
}
