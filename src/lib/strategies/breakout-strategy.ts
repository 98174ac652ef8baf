/**
 * Breakout Strategy
 *
 * Trades a close beyond a Bollinger Band edge on above-average volume while
 * RSI is not yet exhausted. Optionally requires the moving averages to be
 * stacked in the breakout direction.
 */

import { STRATEGY_THRESHOLDS } from '../constants';
import type { IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { atrLevels, buildDirectionalSignal, evaluateEach } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradeDirection, TradingStrategy } from './types';

export interface BreakoutOptions {
  /** Minimum volume as a multiple of its 20-day average */
  volumeMultiplier: number;
  /** Require price > SMA20 > SMA50 (or the mirror for a breakdown) */
  requireTrendAlignment: boolean;
  stopAtr: number;
  targetAtr: number;
}

const DEFAULT_OPTIONS: BreakoutOptions = {
  volumeMultiplier: STRATEGY_THRESHOLDS.BREAKOUT_VOLUME,
  requireTrendAlignment: false,
  stopAtr: 1.5,
  targetAtr: 2.5,
};

export class BreakoutStrategy implements TradingStrategy {
  name = 'Breakout';
  type = 'breakout' as const;
  family = 'generic' as const;
  description = 'Bollinger Band break with volume confirmation and ATR-based stops';

  readonly options: BreakoutOptions;

  constructor(options: Partial<BreakoutOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  private aligned(s: IndicatorSnapshot, direction: TradeDirection): boolean {
    if (!this.options.requireTrendAlignment) return true;
    if (!isDefined(s.smaShort) || !isDefined(s.smaMedium)) return false;
    return direction === 'BUY'
      ? s.price > s.smaShort && s.smaShort > s.smaMedium
      : s.price < s.smaShort && s.smaShort < s.smaMedium;
  }

  evaluate(snapshot: IndicatorSnapshot, assetClass: AssetClass): Signal | null {
    const { price, bbUpper, bbLower, rsi, volume, volumeSma, adx, atr } = snapshot;
    if (!isDefined(bbUpper) || !isDefined(bbLower) || !isDefined(rsi) || !isDefined(volumeSma)) {
      return null;
    }

    const volumeRatio = volumeSma > 0 ? volume / volumeSma : 0;
    if (volumeRatio < this.options.volumeMultiplier) return null;

    let direction: TradeDirection | null = null;
    if (price > bbUpper && rsi < STRATEGY_THRESHOLDS.BREAKOUT_RSI_CEILING) direction = 'BUY';
    else if (price < bbLower && rsi > STRATEGY_THRESHOLDS.BREAKOUT_RSI_FLOOR) direction = 'SELL';
    if (direction === null || !this.aligned(snapshot, direction)) return null;

    let confidence = 0.6;
    let strength = 3;
    if (volumeRatio >= 2) {
      confidence += 0.1;
      strength++;
    }
    const trending = isDefined(adx) && adx >= STRATEGY_THRESHOLDS.ADX_TRENDING;
    if (trending) {
      confidence += 0.1;
      strength++;
    }

    const edge = direction === 'BUY' ? bbUpper : bbLower;
    const verb = direction === 'BUY' ? 'above upper' : 'below lower';

    return buildDirectionalSignal({
      snapshot,
      assetClass,
      strategy: this.type,
      family: this.family,
      direction,
      confidence: Math.min(confidence, 1),
      strength,
      rationale: `Close ${price.toFixed(2)} ${verb} band ${edge.toFixed(2)} on ${volumeRatio.toFixed(1)}x volume` +
        (trending && isDefined(adx) ? `, ADX ${adx.toFixed(1)}` : ''),
      ...atrLevels(direction, price, atr, this.options.stopAtr, this.options.targetAtr),
    });
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, snapshot => this.evaluate(snapshot, input.assetClass));
  }
}
