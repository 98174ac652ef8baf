/**
 * Bonds Module
 *
 * Treasury and credit ETFs. Curve-shape and credit-spread reads from proxy
 * pairs take precedence over the per-instrument technicals. Holds 2-3.
 */

import { MultiIndicatorVotingStrategy } from '../strategies/voting-strategy';
import { YieldCurveStrategy } from '../strategies/yield-curve-strategy';
import { CreditSpreadStrategy } from '../strategies/credit-spread-strategy';
import { TrendFollowingStrategy } from '../strategies/trend-following-strategy';
import { MeanReversionStrategy } from '../strategies/mean-reversion-strategy';
import {
  AssetClassStrategyModule,
  applyOverrides,
  resolveStrategies,
  type AssetClassProfile,
  type ModuleOptions,
} from './asset-class-module';

export const BONDS_PROFILE: AssetClassProfile = {
  assetClass: 'bonds',
  label: 'Bonds',
  defaultUniverse: ['TLT', 'IEF', 'SHY', 'LQD', 'HYG', 'TIP', 'BND', 'AGG'],
  lookbackBars: 90,
  minHistoryBars: 50,
  minPositions: 2,
  maxPositions: 3,
  fusionPriority: {
    yield_curve: 32,
    credit_spread: 30,
    multi_indicator_voting: 20,
    trend_following: 10,
    mean_reversion: 10,
  },
};

export function createBondsModule(options: ModuleOptions = {}): AssetClassStrategyModule {
  return new AssetClassStrategyModule(
    applyOverrides(BONDS_PROFILE, options.overrides),
    resolveStrategies(
      [
        new MultiIndicatorVotingStrategy({ majorityThreshold: options.majorityThreshold }),
        new YieldCurveStrategy(),
        new CreditSpreadStrategy(),
        new TrendFollowingStrategy(),
        new MeanReversionStrategy(),
      ],
      options
    )
  );
}
