/**
 * Trend Following Strategy
 *
 * Four sub-conditions must line up: price vs the short SMA, short vs medium
 * SMA, MACD vs its signal, and the sign of 10- and 20-day momentum. A signal
 * needs at least three of them pointing the same way.
 */

import type { IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { atrLevels, buildDirectionalSignal, evaluateEach } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradingStrategy } from './types';

const MIN_STRENGTH = 3;
const CONDITIONS = 4;

type Lean = 1 | -1 | 0;

function compare(a: number | undefined, b: number | undefined): Lean {
  if (!isDefined(a) || !isDefined(b)) return 0;
  if (a > b) return 1;
  if (a < b) return -1;
  return 0;
}

export class TrendFollowingStrategy implements TradingStrategy {
  name = 'Trend Following';
  type = 'trend_following' as const;
  family = 'generic' as const;
  description = 'Price, moving-average, MACD and momentum alignment';

  conditions(s: IndicatorSnapshot): Array<{ label: string; lean: Lean }> {
    let momentumLean: Lean = 0;
    if (isDefined(s.momentum10) && isDefined(s.momentum20)) {
      if (s.momentum10 > 0 && s.momentum20 > 0) momentumLean = 1;
      else if (s.momentum10 < 0 && s.momentum20 < 0) momentumLean = -1;
    }

    return [
      { label: 'price vs SMA20', lean: compare(s.price, s.smaShort) },
      { label: 'SMA20 vs SMA50', lean: compare(s.smaShort, s.smaMedium) },
      { label: 'MACD vs signal', lean: compare(s.macdLine, s.macdSignal) },
      { label: 'momentum 10/20', lean: momentumLean },
    ];
  }

  evaluate(snapshot: IndicatorSnapshot, assetClass: AssetClass): Signal | null {
    const conditions = this.conditions(snapshot);
    const bullish = conditions.filter(c => c.lean === 1);
    const bearish = conditions.filter(c => c.lean === -1);

    const direction = bullish.length >= MIN_STRENGTH ? 'BUY'
      : bearish.length >= MIN_STRENGTH ? 'SELL'
      : null;
    if (direction === null) return null;

    const agreeing = direction === 'BUY' ? bullish : bearish;
    const strength = agreeing.length;

    return buildDirectionalSignal({
      snapshot,
      assetClass,
      strategy: this.type,
      family: this.family,
      direction,
      confidence: strength / CONDITIONS,
      strength,
      rationale: `${direction === 'BUY' ? 'Uptrend' : 'Downtrend'} ${strength}/${CONDITIONS}: ` +
        agreeing.map(c => c.label).join(', '),
      ...atrLevels(direction, snapshot.price, snapshot.atr, 2, 3),
    });
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, snapshot => this.evaluate(snapshot, input.assetClass));
  }
}
