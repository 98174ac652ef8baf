/**
 * Momentum Breakout Strategy
 *
 * Equity screen: price above both moving averages, the averages stacked,
 * and a volume spike behind the day's move. Three of four conditions fire.
 */

import type { IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { atrLevels, buildDirectionalSignal, evaluateEach } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradeDirection, TradingStrategy } from './types';

const VOLUME_SPIKE = 1.2;
const MIN_STRENGTH = 3;

export class MomentumBreakoutStrategy implements TradingStrategy {
  name = 'Momentum Breakout';
  type = 'momentum_breakout' as const;
  family = 'generic' as const;
  description = 'Price above stacked moving averages with a volume spike';

  private conditions(s: IndicatorSnapshot, direction: TradeDirection): string[] {
    const up = direction === 'BUY';
    const met: string[] = [];

    if (isDefined(s.smaShort) && (up ? s.price > s.smaShort : s.price < s.smaShort)) {
      met.push(up ? 'above SMA20' : 'below SMA20');
    }
    if (isDefined(s.smaMedium) && (up ? s.price > s.smaMedium : s.price < s.smaMedium)) {
      met.push(up ? 'above SMA50' : 'below SMA50');
    }
    if (isDefined(s.smaShort) && isDefined(s.smaMedium) &&
        (up ? s.smaShort > s.smaMedium : s.smaShort < s.smaMedium)) {
      met.push(up ? 'SMA20 > SMA50' : 'SMA20 < SMA50');
    }
    if (isDefined(s.volumeSma) && isDefined(s.previousClose) && s.volume > VOLUME_SPIKE * s.volumeSma &&
        (up ? s.price > s.previousClose : s.price < s.previousClose)) {
      met.push('volume spike');
    }

    return met;
  }

  evaluate(snapshot: IndicatorSnapshot, assetClass: AssetClass): Signal | null {
    for (const direction of ['BUY', 'SELL'] as const) {
      const met = this.conditions(snapshot, direction);
      if (met.length < MIN_STRENGTH) continue;

      return buildDirectionalSignal({
        snapshot,
        assetClass,
        strategy: this.type,
        family: this.family,
        direction,
        confidence: met.length / 4,
        strength: met.length,
        rationale: `Momentum ${direction === 'BUY' ? 'breakout' : 'breakdown'} ${met.length}/4: ${met.join(', ')}`,
        ...atrLevels(direction, snapshot.price, snapshot.atr, 2, 3),
      });
    }
    return null;
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, snapshot => this.evaluate(snapshot, input.assetClass));
  }
}
