/**
 * Tests for Yield Curve and Credit Spread Strategies
 */

import { YieldCurveStrategy } from '@/lib/strategies/yield-curve-strategy';
import { CreditSpreadStrategy } from '@/lib/strategies/credit-spread-strategy';
import { isDirectional } from '@/lib/strategies/types';
import { barsFromCloses, flatBars, indicatorMap } from '../../fixtures/bars';

/** Flat at 100, then rising to 103 over the last `days` bars */
function risingTail(days: number, count: number = 60) {
  const base = Array<number>(count - days).fill(100);
  const tail = Array.from({ length: days }, (_, i) => 100 + (3 * (i + 1)) / days);
  return barsFromCloses([...base, ...tail], { spread: 0.5 });
}

describe('YieldCurveStrategy', () => {
  const strategy = new YieldCurveStrategy();

  it('should have correct metadata', () => {
    expect(strategy.type).toBe('yield_curve');
    expect(strategy.family).toBe('specialized');
  });

  it('should buy the long proxy when it outruns the short proxy', () => {
    const signals = strategy.generate({
      assetClass: 'bonds',
      indicators: indicatorMap({ TLT: risingTail(5), SHY: flatBars(60) }),
    });

    expect(signals).toHaveLength(1);
    const [signal] = signals;
    expect(signal.instrument).toBe('TLT');
    expect(signal.direction).toBe('BUY');
    expect(signal.confidence).toBe(0.8);
    expect(signal.rationale).toBe('Curve steepening: TLT +3.00% vs SHY +0.00% over 5d (spread +3.00%)');
    if (isDirectional(signal)) {
      expect(signal.stopLoss).toBeLessThan(signal.price);
      expect(signal.target).toBeGreaterThan(signal.price);
    }
  });

  it('should buy the short proxy when it outruns the long proxy', () => {
    const signals = strategy.generate({
      assetClass: 'bonds',
      indicators: indicatorMap({ TLT: flatBars(60), SHY: risingTail(5) }),
    });

    expect(signals).toHaveLength(1);
    expect(signals[0].instrument).toBe('SHY');
    expect(signals[0].rationale).toMatch(/^Curve flattening:/);
  });

  it('should stay silent inside the threshold', () => {
    expect(strategy.generate({
      assetClass: 'bonds',
      indicators: indicatorMap({ TLT: flatBars(60), SHY: flatBars(60) }),
    })).toEqual([]);
  });

  it('should stay silent when a proxy is missing', () => {
    expect(strategy.generate({
      assetClass: 'bonds',
      indicators: indicatorMap({ TLT: risingTail(5) }),
    })).toEqual([]);
  });
});

describe('CreditSpreadStrategy', () => {
  const strategy = new CreditSpreadStrategy();

  it('should have correct metadata', () => {
    expect(strategy.type).toBe('credit_spread');
    expect(strategy.family).toBe('specialized');
  });

  it('should buy high yield when spreads narrow', () => {
    const signals = strategy.generate({
      assetClass: 'bonds',
      indicators: indicatorMap({ HYG: risingTail(10), LQD: flatBars(60) }),
    });

    expect(signals).toHaveLength(1);
    expect(signals[0].instrument).toBe('HYG');
    expect(signals[0].confidence).toBe(0.7);
    expect(signals[0].rationale).toBe('Credit spreads narrowing: HYG +3.00% vs LQD +0.00% over 10d');
  });

  it('should buy investment grade when spreads widen', () => {
    const signals = strategy.generate({
      assetClass: 'bonds',
      indicators: indicatorMap({ HYG: flatBars(60), LQD: risingTail(10) }),
    });

    expect(signals).toHaveLength(1);
    expect(signals[0].instrument).toBe('LQD');
    expect(signals[0].rationale).toMatch(/^Credit spreads widening:/);
  });

  it('should honor custom proxies', () => {
    const custom = new CreditSpreadStrategy({ highYieldProxy: 'JNK', investmentGradeProxy: 'VCIT' });
    const signals = custom.generate({
      assetClass: 'bonds',
      indicators: indicatorMap({ JNK: risingTail(10), VCIT: flatBars(60) }),
    });
    expect(signals[0].instrument).toBe('JNK');
  });
});
