/**
 * Signal Fusion
 *
 * Collapses every candidate for one instrument into a single survivor.
 *
 *   1. No directional candidate: the best WATCH survives.
 *   2. Directional candidates disagree: the side with the larger summed
 *      confidence wins; an exact tie becomes a WATCH conflict signal.
 *   3. Within the winning side: highest priority, then confidence, then
 *      strategy name.
 *
 * The ordering is total, so the result does not depend on input order and
 * fusing a survivor again returns it unchanged.
 */

import { SELECTION_DEFAULTS } from '../constants';
import { isDirectional } from '../strategies/types';
import type { Signal, StrategyFamily, StrategyType, WatchSignal } from '../strategies/types';

export type FusionPriorityTable = Partial<Record<StrategyType, number>>;

/** Used for any strategy a module's table does not list */
export const FAMILY_PRIORITY: Record<StrategyFamily, number> = {
  specialized: 30,
  voting: 20,
  generic: 10,
  fallback: 0,
};

const WEIGHT_EPSILON = 1e-12;

export function strategyPriority(signal: Signal, table: FusionPriorityTable = {}): number {
  return table[signal.strategy] ?? FAMILY_PRIORITY[signal.family];
}

/**
 * Code-unit order, independent of locale
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Preferred candidate first
 */
export function compareCandidates(a: Signal, b: Signal, table: FusionPriorityTable = {}): number {
  return (
    strategyPriority(b, table) - strategyPriority(a, table) ||
    b.confidence - a.confidence ||
    compareText(a.strategy, b.strategy) ||
    compareText(a.direction, b.direction) ||
    compareText(a.rationale, b.rationale)
  );
}

function best(pool: readonly Signal[], table: FusionPriorityTable): Signal {
  return [...pool].sort((a, b) => compareCandidates(a, b, table))[0];
}

function conflictSignal(candidates: readonly Signal[], table: FusionPriorityTable): WatchSignal {
  const anchor = best(candidates, table);
  const names = (direction: 'BUY' | 'SELL') =>
    candidates
      .filter(c => c.direction === direction)
      .map(c => c.strategy)
      .sort()
      .join(', ');

  return {
    instrument: anchor.instrument,
    assetClass: anchor.assetClass,
    strategy: 'fusion_conflict',
    family: 'fallback',
    direction: 'WATCH',
    confidence: SELECTION_DEFAULTS.CONFLICT_CONFIDENCE,
    strength: 0,
    price: anchor.price,
    asOf: anchor.asOf,
    rationale: `Conflicting candidates with equal weight: BUY (${names('BUY')}) vs SELL (${names('SELL')})`,
    votes: candidates.find(c => c.votes !== undefined)?.votes,
  };
}

/**
 * Fuse the candidates of one instrument. Returns null for an empty list.
 */
export function fuseCandidates(
  candidates: readonly Signal[],
  table: FusionPriorityTable = {}
): Signal | null {
  if (candidates.length === 0) return null;
  if (candidates.length === 1) return candidates[0];

  const directional = candidates.filter(isDirectional);
  let survivor: Signal;

  if (directional.length === 0) {
    survivor = best(candidates, table);
  } else {
    const buys = directional.filter(c => c.direction === 'BUY');
    const sells = directional.filter(c => c.direction === 'SELL');
    const buyWeight = buys.reduce((sum, c) => sum + c.confidence, 0);
    const sellWeight = sells.reduce((sum, c) => sum + c.confidence, 0);

    if (buys.length > 0 && sells.length > 0 && Math.abs(buyWeight - sellWeight) < WEIGHT_EPSILON) {
      survivor = conflictSignal(candidates, table);
    } else if (sells.length === 0 || (buys.length > 0 && buyWeight > sellWeight)) {
      survivor = best(buys, table);
    } else {
      survivor = best(sells, table);
    }
  }

  const supporting = Array.from(
    new Set(candidates.filter(c => c !== survivor).map(c => c.strategy))
  )
    .filter(strategy => strategy !== survivor.strategy)
    .sort();

  return supporting.length > 0 ? { ...survivor, supportingStrategies: supporting } : survivor;
}

/**
 * Fuse every instrument's candidates. Instruments with no candidates are absent.
 */
export function fuseAll(
  candidates: ReadonlyMap<string, readonly Signal[]>,
  table: FusionPriorityTable = {}
): Map<string, Signal> {
  const fused = new Map<string, Signal>();
  for (const [instrument, list] of candidates) {
    const survivor = fuseCandidates(list, table);
    if (survivor) fused.set(instrument, survivor);
  }
  return fused;
}
