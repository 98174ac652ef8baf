/**
 * Equities Module
 *
 * Broad single-stock screen: momentum breakouts and oversold reversions on
 * top of the voting system. Holds 5-8 names.
 */

import { MultiIndicatorVotingStrategy } from '../strategies/voting-strategy';
import { MomentumBreakoutStrategy } from '../strategies/momentum-breakout-strategy';
import { MeanReversionStrategy } from '../strategies/mean-reversion-strategy';
import {
  AssetClassStrategyModule,
  applyOverrides,
  resolveStrategies,
  type AssetClassProfile,
  type ModuleOptions,
} from './asset-class-module';

export const EQUITIES_PROFILE: AssetClassProfile = {
  assetClass: 'equities',
  label: 'Equities',
  defaultUniverse: [
    'AAPL', 'MSFT', 'GOOGL', 'AMZN', 'NVDA', 'META', 'TSLA',
    'JPM', 'V', 'JNJ', 'PG', 'XOM', 'UNH', 'HD', 'KO',
  ],
  lookbackBars: 60,
  minHistoryBars: 50,
  minPositions: 5,
  maxPositions: 8,
  fusionPriority: {
    multi_indicator_voting: 20,
    momentum_breakout: 12,
    mean_reversion: 10,
  },
};

export function createEquitiesModule(options: ModuleOptions = {}): AssetClassStrategyModule {
  return new AssetClassStrategyModule(
    applyOverrides(EQUITIES_PROFILE, options.overrides),
    resolveStrategies(
      [
        new MultiIndicatorVotingStrategy({ majorityThreshold: options.majorityThreshold }),
        new MomentumBreakoutStrategy(),
        new MeanReversionStrategy(),
      ],
      options
    )
  );
}
