/**
 * Asset-Class Strategy Module
 *
 * Pairs an asset class's trading profile (universe, history, position bounds,
 * fusion table) with the strategies that run against it.
 */

import type { IndicatorSet } from '../indicators/types';
import { createLogger, serializeError } from '../logger';
import type { FusionPriorityTable } from '../selection/fusion';
import { createStrategy } from '../strategies/strategy-factory';
import type { AssetClass, Signal, TradingStrategy } from '../strategies/types';

const log = createLogger('asset-class-module');

export interface AssetClassProfile {
  assetClass: AssetClass;
  label: string;
  defaultUniverse: readonly string[];
  /** Daily bars requested per instrument */
  lookbackBars: number;
  /** Shorter histories are excluded before indicators run */
  minHistoryBars: number;
  minPositions: number;
  maxPositions: number;
  fusionPriority: FusionPriorityTable;
}

/**
 * Settings a configuration file may change on a built-in profile
 */
export interface ProfileOverrides {
  lookbackBars?: number;
  minHistoryBars?: number;
  minPositions?: number;
  maxPositions?: number;
}

export class AssetClassStrategyModule {
  readonly profile: AssetClassProfile;
  readonly strategies: readonly TradingStrategy[];

  constructor(profile: AssetClassProfile, strategies: readonly TradingStrategy[]) {
    if (profile.minPositions > profile.maxPositions) {
      throw new Error(
        `${profile.assetClass}: minPositions (${profile.minPositions}) exceeds maxPositions (${profile.maxPositions})`
      );
    }
    this.profile = profile;
    this.strategies = strategies;
  }

  get assetClass(): AssetClass {
    return this.profile.assetClass;
  }

  /**
   * Run every strategy and group the candidates by instrument. Each
   * instrument in `indicators` gets an entry, even when nothing fired.
   */
  generateCandidates(indicators: ReadonlyMap<string, IndicatorSet>): Map<string, Signal[]> {
    const grouped = new Map<string, Signal[]>();
    for (const instrument of indicators.keys()) grouped.set(instrument, []);

    for (const strategy of this.strategies) {
      let signals: Signal[];
      try {
        signals = strategy.generate({ assetClass: this.assetClass, indicators });
      } catch (error) {
        log.warn('Strategy failed, skipping its candidates', {
          assetClass: this.assetClass,
          strategy: strategy.type,
          ...serializeError(error),
        });
        continue;
      }

      for (const signal of signals) {
        const list = grouped.get(signal.instrument);
        if (list) list.push(signal);
        else grouped.set(signal.instrument, [signal]);
      }
    }

    return grouped;
  }
}

export function applyOverrides(profile: AssetClassProfile, overrides: ProfileOverrides = {}): AssetClassProfile {
  return {
    ...profile,
    lookbackBars: overrides.lookbackBars ?? profile.lookbackBars,
    minHistoryBars: overrides.minHistoryBars ?? profile.minHistoryBars,
    minPositions: overrides.minPositions ?? profile.minPositions,
    maxPositions: overrides.maxPositions ?? profile.maxPositions,
  };
}

export interface ModuleOptions {
  overrides?: ProfileOverrides;
  majorityThreshold?: number;
  /** Replaces the built-in strategy list */
  strategies?: readonly TradingStrategy[];
  /**
   * Strategy types to run, in order. A type the module already runs keeps
   * the module's own configuration; any other comes from the factory.
   */
  strategyTypes?: readonly string[];
}

/**
 * The strategies a module runs, given its built-in list and the options
 */
export function resolveStrategies(
  builtIn: readonly TradingStrategy[],
  options: ModuleOptions
): readonly TradingStrategy[] {
  if (options.strategies) return options.strategies;
  if (!options.strategyTypes) return builtIn;
  return options.strategyTypes.map(type => builtIn.find(s => s.type === type) ?? createStrategy(type));
}
