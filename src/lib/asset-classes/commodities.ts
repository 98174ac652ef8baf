/**
 * Commodities Module
 *
 * Energy, metals and broad commodity baskets traded on trend, band
 * breakouts and reversions. Holds 2-3.
 */

import { MultiIndicatorVotingStrategy } from '../strategies/voting-strategy';
import { TrendFollowingStrategy } from '../strategies/trend-following-strategy';
import { BreakoutStrategy } from '../strategies/breakout-strategy';
import { MeanReversionStrategy } from '../strategies/mean-reversion-strategy';
import {
  AssetClassStrategyModule,
  applyOverrides,
  resolveStrategies,
  type AssetClassProfile,
  type ModuleOptions,
} from './asset-class-module';

export const COMMODITIES_PROFILE: AssetClassProfile = {
  assetClass: 'commodities',
  label: 'Commodities',
  defaultUniverse: ['USO', 'UNG', 'GLD', 'SLV', 'DBC', 'GSG', 'COMT', 'PDBC'],
  lookbackBars: 120,
  minHistoryBars: 50,
  minPositions: 2,
  maxPositions: 3,
  fusionPriority: {
    multi_indicator_voting: 20,
    trend_following: 14,
    breakout: 12,
    mean_reversion: 10,
  },
};

export function createCommoditiesModule(options: ModuleOptions = {}): AssetClassStrategyModule {
  return new AssetClassStrategyModule(
    applyOverrides(COMMODITIES_PROFILE, options.overrides),
    resolveStrategies(
      [
        new MultiIndicatorVotingStrategy({ majorityThreshold: options.majorityThreshold }),
        new TrendFollowingStrategy(),
        new BreakoutStrategy(),
        new MeanReversionStrategy(),
      ],
      options
    )
  );
}
