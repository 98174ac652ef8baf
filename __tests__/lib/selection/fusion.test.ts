/**
 * Tests for Signal Fusion
 */

import { compareCandidates, compareText, fuseAll, fuseCandidates, strategyPriority } from '@/lib/selection/fusion';
import type { DirectionalSignal, Signal, StrategyFamily, StrategyType, TradeDirection, WatchSignal } from '@/lib/strategies/types';

function directional(
  strategy: StrategyType,
  family: StrategyFamily,
  direction: TradeDirection,
  confidence: number,
  instrument: string = 'XOM'
): DirectionalSignal {
  return {
    instrument,
    assetClass: 'equities',
    strategy,
    family,
    direction,
    confidence,
    strength: 3,
    price: 100,
    asOf: '2024-03-01',
    rationale: `${strategy} ${direction}`,
    stopLoss: direction === 'BUY' ? 96 : 104,
    target: direction === 'BUY' ? 106 : 94,
  };
}

function watch(confidence: number, instrument: string = 'XOM'): WatchSignal {
  return {
    instrument,
    assetClass: 'equities',
    strategy: 'multi_indicator_voting',
    family: 'voting',
    direction: 'WATCH',
    confidence,
    strength: 2,
    price: 100,
    asOf: '2024-03-01',
    rationale: 'No majority: 2 buy / 1 sell / 4 neutral',
    votes: { buy: 2, sell: 1, neutral: 4, total: 7 },
  };
}

describe('Signal Fusion', () => {
  describe('strategyPriority', () => {
    it('should prefer the module table over the family default', () => {
      const signal = directional('breakout', 'generic', 'BUY', 0.6);
      expect(strategyPriority(signal)).toBe(10);
      expect(strategyPriority(signal, { breakout: 25 })).toBe(25);
    });
  });

  describe('fuseCandidates', () => {
    it('should return null for no candidates', () => {
      expect(fuseCandidates([])).toBeNull();
    });

    it('should keep a directional candidate over a WATCH', () => {
      const buy = directional('trend_following', 'generic', 'BUY', 0.8);
      const fused = fuseCandidates([watch(0.4), buy]);

      expect(fused?.direction).toBe('BUY');
      expect(fused?.confidence).toBe(0.8);
      expect(fused?.strategy).toBe('trend_following');
      expect(fused?.supportingStrategies).toEqual(['multi_indicator_voting']);
    });

    it('should return a lone candidate unchanged', () => {
      const buy = directional('momentum', 'generic', 'BUY', 0.7);
      expect(fuseCandidates([buy])).toBe(buy);
    });

    it('should be idempotent', () => {
      const fused = fuseCandidates([
        watch(0.4),
        directional('trend_following', 'generic', 'BUY', 0.8),
        directional('momentum_breakout', 'generic', 'BUY', 0.75),
      ]);
      if (!fused) throw new Error('expected a survivor');

      expect(fuseCandidates([fused])).toBe(fused);
    });

    it('should not depend on candidate order', () => {
      const candidates = [
        watch(0.4),
        directional('trend_following', 'generic', 'BUY', 0.75),
        directional('mean_reversion', 'generic', 'SELL', 0.55),
        directional('momentum_breakout', 'generic', 'BUY', 0.75),
      ];

      expect(fuseCandidates([...candidates].reverse())).toEqual(fuseCandidates(candidates));
    });

    it('should side with the larger summed confidence', () => {
      const fused = fuseCandidates([
        directional('trend_following', 'generic', 'BUY', 0.6),
        directional('momentum', 'generic', 'BUY', 0.3),
        directional('mean_reversion', 'generic', 'SELL', 0.8),
      ]);

      expect(fused?.direction).toBe('BUY');
      expect(fused?.strategy).toBe('trend_following');
      expect(fused?.supportingStrategies).toEqual(['mean_reversion', 'momentum']);
    });

    it('should pick the highest-priority candidate on the winning side', () => {
      const fused = fuseCandidates(
        [
          directional('trend_following', 'generic', 'BUY', 0.6),
          directional('momentum', 'generic', 'BUY', 0.3),
        ],
        { momentum: 50 }
      );

      expect(fused?.strategy).toBe('momentum');
    });

    it('should prefer specialized strategies by default', () => {
      const fused = fuseCandidates([
        directional('trend_following', 'generic', 'BUY', 0.9),
        directional('yield_curve', 'specialized', 'BUY', 0.8),
      ]);

      expect(fused?.strategy).toBe('yield_curve');
    });

    it('should turn an exact BUY/SELL tie into a conflict WATCH', () => {
      const fused = fuseCandidates([
        directional('trend_following', 'generic', 'BUY', 0.6),
        directional('mean_reversion', 'generic', 'SELL', 0.6),
        watch(0.4),
      ]);

      expect(fused?.direction).toBe('WATCH');
      expect(fused?.strategy).toBe('fusion_conflict');
      expect(fused?.family).toBe('fallback');
      expect(fused?.confidence).toBe(0.3);
      expect(fused?.rationale).toBe(
        'Conflicting candidates with equal weight: BUY (trend_following) vs SELL (mean_reversion)'
      );
      expect(fused?.votes).toEqual({ buy: 2, sell: 1, neutral: 4, total: 7 });
    });

    it('should keep the best WATCH when nothing is directional', () => {
      const weak = { ...watch(0.2), rationale: 'weaker' };
      expect(fuseCandidates([weak, watch(0.4)])?.confidence).toBe(0.4);
    });
  });

  describe('compareText', () => {
    it('should order by code unit rather than locale', () => {
      expect(['brk.b', 'BRK.B', 'Abc', 'ABC'].sort(compareText)).toEqual(['ABC', 'Abc', 'BRK.B', 'brk.b']);
      expect(compareText('BRK.B', 'BRKB')).toBe(-1);
      expect(compareText('XOM', 'XOM')).toBe(0);
    });
  });

  describe('compareCandidates', () => {
    it('should break confidence ties by strategy name', () => {
      const a = directional('breakout', 'generic', 'BUY', 0.6);
      const b = directional('trend_following', 'generic', 'BUY', 0.6);
      expect(compareCandidates(a, b)).toBeLessThan(0);
      expect(compareCandidates(b, a)).toBeGreaterThan(0);
    });
  });

  describe('fuseAll', () => {
    it('should fuse per instrument and drop instruments without candidates', () => {
      const fused = fuseAll(new Map<string, Signal[]>([
        ['XOM', [directional('trend_following', 'generic', 'BUY', 0.8)]],
        ['CVX', [watch(0.3, 'CVX')]],
        ['BP', []],
      ]));

      expect(Array.from(fused.keys())).toEqual(['XOM', 'CVX']);
      expect(fused.get('CVX')?.direction).toBe('WATCH');
    });
  });
});
