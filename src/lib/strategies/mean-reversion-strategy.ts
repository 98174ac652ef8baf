/**
 * Mean Reversion Strategy
 *
 * Fades RSI extremes that have pushed price outside the Bollinger Bands.
 * The target is the middle band; the stop sits 1.5 ATR beyond the entry.
 */

import { STRATEGY_THRESHOLDS } from '../constants';
import type { IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { atrLevels, buildDirectionalSignal, evaluateEach } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradingStrategy } from './types';

const STOP_ATR = 1.5;

export class MeanReversionStrategy implements TradingStrategy {
  name = 'Mean Reversion';
  type = 'mean_reversion' as const;
  family = 'generic' as const;
  description = 'RSI extreme outside the Bollinger Bands, targeting the middle band';

  constructor(
    private readonly oversold: number = STRATEGY_THRESHOLDS.RSI_OVERSOLD,
    private readonly overbought: number = STRATEGY_THRESHOLDS.RSI_OVERBOUGHT
  ) {}

  evaluate(snapshot: IndicatorSnapshot, assetClass: AssetClass): Signal | null {
    const { price, rsi, bbLower, bbUpper, bbMiddle, atr } = snapshot;
    if (!isDefined(rsi) || !isDefined(bbLower) || !isDefined(bbUpper) || !isDefined(bbMiddle)) {
      return null;
    }

    const common = { snapshot, assetClass, strategy: this.type, family: this.family };

    if (rsi < this.oversold && price < bbLower) {
      let confidence = 0.55;
      if (rsi <= 20) confidence = 0.75;
      else if (rsi <= 25) confidence = 0.65;

      return buildDirectionalSignal({
        ...common,
        direction: 'BUY',
        confidence,
        strength: 2,
        rationale: `Oversold: RSI ${rsi.toFixed(1)} with price ${price.toFixed(2)} below lower band ${bbLower.toFixed(2)}`,
        stopLoss: atrLevels('BUY', price, atr, STOP_ATR, 0).stopLoss,
        target: bbMiddle,
      });
    }

    if (rsi > this.overbought && price > bbUpper) {
      let confidence = 0.55;
      if (rsi >= 80) confidence = 0.75;
      else if (rsi >= 75) confidence = 0.65;

      return buildDirectionalSignal({
        ...common,
        direction: 'SELL',
        confidence,
        strength: 2,
        rationale: `Overbought: RSI ${rsi.toFixed(1)} with price ${price.toFixed(2)} above upper band ${bbUpper.toFixed(2)}`,
        stopLoss: atrLevels('SELL', price, atr, STOP_ATR, 0).stopLoss,
        target: bbMiddle,
      });
    }

    return null;
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, snapshot => this.evaluate(snapshot, input.assetClass));
  }
}
