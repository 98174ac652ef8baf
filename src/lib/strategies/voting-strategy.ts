/**
 * Multi-Indicator Voting Strategy
 *
 * Seven indicators each vote BUY, SELL or neutral on the latest bar. A
 * direction needs a majority threshold of votes and strictly more votes than
 * the opposite side; anything else is WATCH with the tally in the rationale.
 */

import { STRATEGY_THRESHOLDS } from '../constants';
import type { IndicatorSnapshot } from '../indicators/types';
import { isDefined } from '../indicators/moving-averages';
import { atrLevels, buildDirectionalSignal, buildWatchSignal, evaluateEach } from './signal-builder';
import type { AssetClass, Signal, StrategyInput, TradingStrategy, VoteTally } from './types';

export type Vote = 'BUY' | 'SELL' | 'NEUTRAL';

export interface IndicatorVote {
  indicator: string;
  vote: Vote;
}

export interface VotingOptions {
  majorityThreshold: number;
  rsiOversold: number;
  rsiOverbought: number;
  atrMove: number;
  volumeSpike: number;
}

const DEFAULT_OPTIONS: VotingOptions = {
  majorityThreshold: STRATEGY_THRESHOLDS.VOTE_MAJORITY,
  rsiOversold: STRATEGY_THRESHOLDS.RSI_OVERSOLD,
  rsiOverbought: STRATEGY_THRESHOLDS.RSI_OVERBOUGHT,
  atrMove: STRATEGY_THRESHOLDS.VOTE_ATR_MOVE,
  volumeSpike: STRATEGY_THRESHOLDS.VOTE_VOLUME_SPIKE,
};

export function formatTally(tally: VoteTally): string {
  return `${tally.buy} buy / ${tally.sell} sell / ${tally.neutral} neutral`;
}

export function tallyVotes(votes: IndicatorVote[]): VoteTally {
  const buy = votes.filter(v => v.vote === 'BUY').length;
  const sell = votes.filter(v => v.vote === 'SELL').length;
  return { buy, sell, neutral: votes.length - buy - sell, total: votes.length };
}

function orderedVote(a: number | undefined, b: number | undefined, c: number | undefined): Vote {
  if (!isDefined(a) || !isDefined(b) || !isDefined(c)) return 'NEUTRAL';
  if (a > b && b > c) return 'BUY';
  if (a < b && b < c) return 'SELL';
  return 'NEUTRAL';
}

function moveDirection(s: IndicatorSnapshot): Vote {
  if (!isDefined(s.previousClose)) return 'NEUTRAL';
  if (s.price > s.previousClose) return 'BUY';
  if (s.price < s.previousClose) return 'SELL';
  return 'NEUTRAL';
}

export class MultiIndicatorVotingStrategy implements TradingStrategy {
  name = 'Multi-Indicator Voting';
  type = 'multi_indicator_voting' as const;
  family = 'voting' as const;
  description = 'Majority vote of SMA, EMA, RSI, MACD, Bollinger, ATR move and volume';

  private readonly options: VotingOptions;

  constructor(options: Partial<VotingOptions> = {}) {
    this.options = {
      majorityThreshold: options.majorityThreshold ?? DEFAULT_OPTIONS.majorityThreshold,
      rsiOversold: options.rsiOversold ?? DEFAULT_OPTIONS.rsiOversold,
      rsiOverbought: options.rsiOverbought ?? DEFAULT_OPTIONS.rsiOverbought,
      atrMove: options.atrMove ?? DEFAULT_OPTIONS.atrMove,
      volumeSpike: options.volumeSpike ?? DEFAULT_OPTIONS.volumeSpike,
    };
  }

  castVotes(s: IndicatorSnapshot): IndicatorVote[] {
    const { rsiOversold, rsiOverbought, atrMove, volumeSpike } = this.options;

    let rsiVote: Vote = 'NEUTRAL';
    if (isDefined(s.rsi) && s.rsi < rsiOversold) rsiVote = 'BUY';
    else if (isDefined(s.rsi) && s.rsi > rsiOverbought) rsiVote = 'SELL';

    let macdVote: Vote = 'NEUTRAL';
    if (isDefined(s.macdLine) && isDefined(s.macdSignal)) {
      if (s.macdLine > s.macdSignal && s.macdLine > 0) macdVote = 'BUY';
      else if (s.macdLine < s.macdSignal && s.macdLine < 0) macdVote = 'SELL';
    }

    let bollingerVote: Vote = 'NEUTRAL';
    if (isDefined(s.bbLower) && s.price < s.bbLower) bollingerVote = 'BUY';
    else if (isDefined(s.bbUpper) && s.price > s.bbUpper) bollingerVote = 'SELL';

    let atrVote: Vote = 'NEUTRAL';
    if (isDefined(s.atr) && isDefined(s.previousClose)) {
      if (Math.abs(s.price - s.previousClose) > atrMove * s.atr) atrVote = moveDirection(s);
    }

    let volumeVote: Vote = 'NEUTRAL';
    if (isDefined(s.volumeSma) && s.volume > volumeSpike * s.volumeSma) {
      volumeVote = moveDirection(s);
    }

    return [
      { indicator: 'SMA trend', vote: orderedVote(s.price, s.smaShort, s.smaMedium) },
      { indicator: 'EMA trend', vote: orderedVote(s.price, s.emaFast, s.emaSlow) },
      { indicator: 'RSI', vote: rsiVote },
      { indicator: 'MACD', vote: macdVote },
      { indicator: 'Bollinger', vote: bollingerVote },
      { indicator: 'ATR move', vote: atrVote },
      { indicator: 'Volume', vote: volumeVote },
    ];
  }

  evaluate(snapshot: IndicatorSnapshot, assetClass: AssetClass): Signal {
    const votes = this.castVotes(snapshot);
    const tally = tallyVotes(votes);
    const { majorityThreshold } = this.options;

    const common = {
      snapshot,
      assetClass,
      strategy: this.type,
      family: this.family,
      votes: tally,
    };

    let direction: 'BUY' | 'SELL' | null = null;
    if (tally.buy >= majorityThreshold && tally.buy > tally.sell) direction = 'BUY';
    else if (tally.sell >= majorityThreshold && tally.sell > tally.buy) direction = 'SELL';

    if (direction === null) {
      return buildWatchSignal({
        ...common,
        confidence: Math.max(tally.buy, tally.sell) / tally.total,
        strength: Math.max(tally.buy, tally.sell),
        rationale: `No majority: ${formatTally(tally)}`,
      });
    }

    const count = direction === 'BUY' ? tally.buy : tally.sell;
    const agreeing = votes
      .filter(v => v.vote === direction)
      .map(v => v.indicator)
      .join(', ');

    return buildDirectionalSignal({
      ...common,
      direction,
      confidence: count / tally.total,
      strength: count,
      rationale: `${direction} majority ${count}/${tally.total} (${formatTally(tally)}): ${agreeing}`,
      ...atrLevels(direction, snapshot.price, snapshot.atr, 2, 3),
    });
  }

  generate(input: StrategyInput): Signal[] {
    return evaluateEach(input, snapshot => this.evaluate(snapshot, input.assetClass));
  }
}
