/**
 * Tests for the Selection Policy
 */

import {
  forcedEntryConfidence,
  rankSignals,
  selectSignals,
  type InstrumentReference,
} from '@/lib/selection/selection-policy';
import { snapshotIndicators } from '@/lib/indicators/indicator-set';
import { MultiIndicatorVotingStrategy } from '@/lib/strategies/voting-strategy';
import { isDirectional } from '@/lib/strategies/types';
import type { DirectionalSignal, Signal, VoteTally, WatchSignal } from '@/lib/strategies/types';
import { flatBars, indicatorMap } from '../../fixtures/bars';

function buy(instrument: string, confidence: number): DirectionalSignal {
  return {
    instrument,
    assetClass: 'equities',
    strategy: 'trend_following',
    family: 'generic',
    direction: 'BUY',
    confidence,
    strength: 3,
    price: 50,
    asOf: '2024-03-01',
    rationale: 'Uptrend',
    stopLoss: 48,
    target: 53,
  };
}

function watchWithVotes(instrument: string, votes: VoteTally): WatchSignal {
  return {
    instrument,
    assetClass: 'equities',
    strategy: 'multi_indicator_voting',
    family: 'voting',
    direction: 'WATCH',
    confidence: Math.max(votes.buy, votes.sell) / votes.total,
    strength: Math.max(votes.buy, votes.sell),
    price: 40,
    asOf: '2024-03-01',
    rationale: 'No majority',
    votes,
  };
}

describe('Selection Policy', () => {
  describe('rankSignals', () => {
    it('should order by confidence then instrument', () => {
      const ranked = rankSignals([buy('MSFT', 0.5), buy('AAPL', 0.5), buy('NVDA', 0.9)]);
      expect(ranked.map(s => s.instrument)).toEqual(['NVDA', 'AAPL', 'MSFT']);
    });
  });

  describe('forcedEntryConfidence', () => {
    it('should grow with the strongest vote share', () => {
      expect(forcedEntryConfidence({ buy: 0, sell: 0, neutral: 7, total: 7 }, Infinity)).toBe(0.1);
      expect(forcedEntryConfidence({ buy: 3, sell: 1, neutral: 3, total: 7 }, Infinity)).toBeCloseTo(0.1 + 0.2 * 3 / 7, 10);
    });

    it('should fall to half the ceiling when it would not stay below it', () => {
      expect(forcedEntryConfidence({ buy: 0, sell: 0, neutral: 7, total: 7 }, 0.1)).toBe(0.05);
    });
  });

  describe('selectSignals', () => {
    it('should force exactly three entries for five flat instruments', () => {
      const symbols = ['EEE', 'AAA', 'DDD', 'BBB', 'CCC'];
      const indicators = indicatorMap(Object.fromEntries(symbols.map(s => [s, flatBars(60)] as const)));
      const voting = new MultiIndicatorVotingStrategy();

      const candidates = new Map<string, Signal[]>();
      for (const signal of voting.generate({ assetClass: 'equities', indicators })) {
        candidates.set(signal.instrument, [signal]);
      }
      const references = new Map<string, InstrumentReference>();
      for (const [symbol, set] of indicators) {
        const snapshot = snapshotIndicators(set);
        if (snapshot) {
          references.set(symbol, { instrument: symbol, price: snapshot.price, atr: snapshot.atr, asOf: snapshot.asOf });
        }
      }

      const result = selectSignals({ assetClass: 'equities', candidates, references, minPositions: 3, maxPositions: 5 });

      expect(result.signals).toHaveLength(3);
      expect(result.forcedCount).toBe(3);
      expect(result.directionalCount).toBe(0);
      expect(result.signals.map(s => s.instrument)).toEqual(['AAA', 'BBB', 'CCC']);
      expect(result.watchlist.map(s => [s.instrument, s.direction])).toEqual([['DDD', 'WATCH'], ['EEE', 'WATCH']]);
      for (const signal of result.signals) {
        expect(signal.strategy).toBe('forced_entry');
        expect(signal.family).toBe('fallback');
        expect(signal.direction).toBe('BUY');
        expect(signal.confidence).toBe(0.1);
        expect(signal.rationale).toBe(
          'Forced entry: fallback to meet the minimum position count, not a validated opportunity ' +
          '(votes 0 buy / 0 sell / 7 neutral)'
        );
        if (isDirectional(signal)) {
          // ATR is zero on a flat series: 2% of price stands in
          expect(signal.stopLoss).toBe(97);
          expect(signal.target).toBe(104);
        }
      }
    });

    it('should keep WATCH survivors on the watchlist outside the bounds', () => {
      const sell: DirectionalSignal = {
        ...buy('AAA', 0.6),
        strategy: 'mean_reversion',
        direction: 'SELL',
        stopLoss: 53,
        target: 48,
      };
      const candidates = new Map<string, Signal[]>([
        ['AAA', [buy('AAA', 0.6), sell]],
        ['BBB', [watchWithVotes('BBB', { buy: 2, sell: 1, neutral: 4, total: 7 })]],
        ['CCC', [buy('CCC', 0.7)]],
      ]);

      const result = selectSignals({ assetClass: 'equities', candidates, minPositions: 1, maxPositions: 1 });

      expect(result.signals.map(s => s.instrument)).toEqual(['CCC']);
      expect(result.forcedCount).toBe(0);
      expect(result.watchlist.map(s => [s.instrument, s.strategy, s.confidence])).toEqual([
        ['AAA', 'fusion_conflict', 0.3],
        ['BBB', 'multi_indicator_voting', 2 / 7],
      ]);
      expect(result.watchlist[0].rationale).toBe(
        'Conflicting candidates with equal weight: BUY (trend_following) vs SELL (mean_reversion)'
      );
    });

    it('should cap the selection at maxPositions', () => {
      const candidates = new Map<string, Signal[]>(
        ['A', 'B', 'C', 'D', 'E'].map((s, i) => [s, [buy(s, 0.5 + i * 0.1)]])
      );
      const result = selectSignals({ assetClass: 'equities', candidates, minPositions: 1, maxPositions: 3 });

      expect(result.signals.map(s => s.instrument)).toEqual(['E', 'D', 'C']);
      expect(result.forcedCount).toBe(0);
      expect(result.candidateCount).toBe(5);
    });

    it('should keep forced confidence strictly below every selected signal', () => {
      const candidates = new Map<string, Signal[]>([
        ['AAA', [buy('AAA', 0.15)]],
        ['BBB', [watchWithVotes('BBB', { buy: 2, sell: 1, neutral: 4, total: 7 })]],
        ['CCC', [watchWithVotes('CCC', { buy: 0, sell: 0, neutral: 7, total: 7 })]],
      ]);

      const result = selectSignals({ assetClass: 'equities', candidates, minPositions: 3, maxPositions: 5 });

      expect(result.signals.map(s => [s.instrument, s.strategy])).toEqual([
        ['AAA', 'trend_following'],
        ['BBB', 'forced_entry'],
        ['CCC', 'forced_entry'],
      ]);
      expect(result.signals[1].confidence).toBe(0.075);
      expect(result.signals[2].confidence).toBe(0.1);
    });

    it('should take the stronger vote side for a forced entry', () => {
      const candidates = new Map<string, Signal[]>([
        ['BND', [watchWithVotes('BND', { buy: 1, sell: 2, neutral: 4, total: 7 })]],
      ]);

      const [signal] = selectSignals({ assetClass: 'bonds', candidates, minPositions: 1, maxPositions: 2 }).signals;

      expect(signal.direction).toBe('SELL');
      if (signal.direction === 'SELL') {
        // No reference ATR: 2% of the candidate price
        expect(signal.stopLoss).toBeCloseTo(41.2, 10);
        expect(signal.target).toBeCloseTo(38.4, 10);
      }
    });

    it('should rank forced candidates by their strongest vote side', () => {
      const candidates = new Map<string, Signal[]>([
        ['AAA', [watchWithVotes('AAA', { buy: 1, sell: 1, neutral: 5, total: 7 })]],
        ['ZZZ', [watchWithVotes('ZZZ', { buy: 0, sell: 2, neutral: 5, total: 7 })]],
      ]);

      const result = selectSignals({ assetClass: 'equities', candidates, minPositions: 1, maxPositions: 2 });
      expect(result.signals.map(s => s.instrument)).toEqual(['ZZZ']);
    });

    it('should not force more entries than the universe holds', () => {
      const candidates = new Map<string, Signal[]>([
        ['GLD', [watchWithVotes('GLD', { buy: 0, sell: 0, neutral: 7, total: 7 })]],
        ['IAU', [watchWithVotes('IAU', { buy: 0, sell: 0, neutral: 7, total: 7 })]],
      ]);

      const result = selectSignals({ assetClass: 'golds', candidates, minPositions: 5, maxPositions: 8 });
      expect(result.signals).toHaveLength(2);
      expect(result.universeSize).toBe(2);
    });

    it('should return nothing for an empty universe', () => {
      const result = selectSignals({ assetClass: 'golds', candidates: new Map(), minPositions: 1, maxPositions: 2 });
      expect(result.signals).toEqual([]);
      expect(result.universeSize).toBe(0);
    });

    it('should force entries for referenced instruments that produced no candidate', () => {
      const references = new Map<string, InstrumentReference>([
        ['USO', { instrument: 'USO', price: 70, atr: 1.4, asOf: '2024-03-01' }],
      ]);

      const [signal] = selectSignals({
        assetClass: 'commodities',
        candidates: new Map(),
        references,
        minPositions: 1,
        maxPositions: 3,
      }).signals;

      expect(signal.strategy).toBe('forced_entry');
      expect(signal.votes).toEqual({ buy: 0, sell: 0, neutral: 0, total: 0 });
      if (signal.direction === 'BUY') {
        expect(signal.stopLoss).toBeCloseTo(67.9, 10);
        expect(signal.target).toBeCloseTo(72.8, 10);
      }
    });
  });
});
