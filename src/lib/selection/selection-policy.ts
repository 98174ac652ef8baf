/**
 * Selection Policy
 *
 * Fusion, ranking and bounding of one asset class's candidates into the final
 * trade list, with forced entry when too few directional signals survive.
 * Fused WATCH survivors that did not become a forced entry form the
 * watchlist, which sits outside the position bounds.
 */

import { SELECTION_DEFAULTS } from '../constants';
import { formatTally } from '../strategies/voting-strategy';
import { atrLevels, clampConfidence } from '../strategies/signal-builder';
import { isDirectional, isWatch } from '../strategies/types';
import type { AssetClass, DirectionalSignal, Signal, VoteTally, WatchSignal } from '../strategies/types';
import { compareText, fuseAll, type FusionPriorityTable } from './fusion';

/**
 * Latest price context for an instrument with a usable history
 */
export interface InstrumentReference {
  instrument: string;
  price: number;
  atr: number | undefined;
  asOf: string;
}

export interface SelectionInput {
  assetClass: AssetClass;
  candidates: ReadonlyMap<string, readonly Signal[]>;
  /** Every instrument with a usable history, fired or not */
  references?: ReadonlyMap<string, InstrumentReference>;
  minPositions: number;
  maxPositions: number;
  fusionPriority?: FusionPriorityTable;
}

export interface SelectionResult {
  /** Bounded trade list: ranked directional survivors, then forced entries */
  signals: Signal[];
  /** WATCH survivors for instruments not in `signals`, ranked */
  watchlist: WatchSignal[];
  universeSize: number;
  candidateCount: number;
  fusedCount: number;
  directionalCount: number;
  forcedCount: number;
}

const EMPTY_TALLY: VoteTally = { buy: 0, sell: 0, neutral: 0, total: 0 };

/**
 * Confidence descending, ties by instrument symbol
 */
export function rankSignals<T extends Signal>(signals: readonly T[]): T[] {
  return [...signals].sort((a, b) => b.confidence - a.confidence || compareText(a.instrument, b.instrument));
}

function tallyFor(candidates: readonly Signal[] | undefined): VoteTally {
  return candidates?.find(c => c.votes !== undefined)?.votes ?? EMPTY_TALLY;
}

/**
 * Forced entries sort by their strongest side, then by vote margin, then symbol
 */
function compareForForcedEntry(
  a: { instrument: string; tally: VoteTally },
  b: { instrument: string; tally: VoteTally }
): number {
  const strongest = (t: VoteTally) => Math.max(t.buy, t.sell);
  const margin = (t: VoteTally) => Math.abs(t.buy - t.sell);
  return (
    strongest(b.tally) - strongest(a.tally) ||
    margin(b.tally) - margin(a.tally) ||
    compareText(a.instrument, b.instrument)
  );
}

export function forcedEntryConfidence(tally: VoteTally, ceiling: number): number {
  const share = tally.total > 0 ? Math.max(tally.buy, tally.sell) / tally.total : 0;
  const base = SELECTION_DEFAULTS.FORCED_BASE_CONFIDENCE + SELECTION_DEFAULTS.FORCED_TALLY_WEIGHT * share;
  return clampConfidence(base < ceiling ? base : ceiling / 2);
}

function buildForcedEntry(
  assetClass: AssetClass,
  reference: InstrumentReference,
  tally: VoteTally,
  ceiling: number
): DirectionalSignal {
  const direction = tally.buy >= tally.sell ? 'BUY' : 'SELL';
  return {
    instrument: reference.instrument,
    assetClass,
    strategy: 'forced_entry',
    family: 'fallback',
    direction,
    confidence: forcedEntryConfidence(tally, ceiling),
    strength: Math.max(tally.buy, tally.sell),
    price: reference.price,
    asOf: reference.asOf,
    rationale: `Forced entry: fallback to meet the minimum position count, not a validated opportunity ` +
      `(votes ${formatTally(tally)})`,
    votes: tally,
    ...atrLevels(
      direction,
      reference.price,
      reference.atr,
      SELECTION_DEFAULTS.FORCED_STOP_ATR,
      SELECTION_DEFAULTS.FORCED_TARGET_ATR
    ),
  };
}

function referenceFrom(candidates: readonly Signal[] | undefined): InstrumentReference | undefined {
  const first = candidates?.[0];
  if (!first) return undefined;
  return { instrument: first.instrument, price: first.price, atr: undefined, asOf: first.asOf };
}

/**
 * Fuse, rank and bound the candidates of one asset class
 */
export function selectSignals(input: SelectionInput): SelectionResult {
  const { assetClass, candidates, minPositions, maxPositions } = input;
  const references = input.references ?? new Map<string, InstrumentReference>();

  const universe = new Set<string>([...references.keys(), ...candidates.keys()]);
  let candidateCount = 0;
  for (const list of candidates.values()) candidateCount += list.length;

  const fused = fuseAll(candidates, input.fusionPriority);
  const directional = rankSignals(Array.from(fused.values()).filter(isDirectional));
  const selected: Signal[] = directional.slice(0, maxPositions);

  const floor = Math.min(minPositions, maxPositions);
  const forced: DirectionalSignal[] = [];

  if (selected.length < floor) {
    const taken = new Set(selected.map(s => s.instrument));
    const ceiling = selected.length > 0
      ? Math.min(...selected.map(s => s.confidence))
      : Number.POSITIVE_INFINITY;

    const pool = Array.from(universe)
      .filter(instrument => !taken.has(instrument))
      .map(instrument => ({
        instrument,
        tally: tallyFor(candidates.get(instrument)),
        reference: references.get(instrument) ?? referenceFrom(candidates.get(instrument)),
      }))
      .sort(compareForForcedEntry);

    for (const entry of pool) {
      if (selected.length + forced.length >= floor) break;
      if (!entry.reference) continue;
      forced.push(buildForcedEntry(assetClass, entry.reference, entry.tally, ceiling));
    }
  }

  const signals = [...selected, ...forced];
  const traded = new Set(signals.map(s => s.instrument));
  const watchlist = rankSignals(
    Array.from(fused.values()).filter(isWatch).filter(s => !traded.has(s.instrument))
  );

  return {
    signals,
    watchlist,
    universeSize: universe.size,
    candidateCount,
    fusedCount: fused.size,
    directionalCount: directional.length,
    forcedCount: forced.length,
  };
}
