/**
 * Gold Module
 *
 * Physically backed and leveraged gold ETFs. Holds 1-2.
 */

import { MultiIndicatorVotingStrategy } from '../strategies/voting-strategy';
import { BreakoutStrategy } from '../strategies/breakout-strategy';
import { FibonacciRetracementStrategy } from '../strategies/fibonacci-strategy';
import { MomentumStrategy } from '../strategies/momentum-strategy';
import { GoldFactorStrategy } from '../strategies/gold-factor-strategy';
import {
  AssetClassStrategyModule,
  applyOverrides,
  resolveStrategies,
  type AssetClassProfile,
  type ModuleOptions,
} from './asset-class-module';

export const GOLDS_PROFILE: AssetClassProfile = {
  assetClass: 'golds',
  label: 'Gold',
  defaultUniverse: ['GLD', 'IAU', 'SGOL', 'GLDM', 'BAR', 'OUNZ', 'UGL', 'DGL'],
  lookbackBars: 120,
  minHistoryBars: 50,
  minPositions: 1,
  maxPositions: 2,
  fusionPriority: {
    gold_factors: 32,
    fibonacci_retracement: 30,
    multi_indicator_voting: 20,
    breakout: 14,
    momentum: 12,
  },
};

export function createGoldsModule(options: ModuleOptions = {}): AssetClassStrategyModule {
  return new AssetClassStrategyModule(
    applyOverrides(GOLDS_PROFILE, options.overrides),
    resolveStrategies(
      [
        new MultiIndicatorVotingStrategy({ majorityThreshold: options.majorityThreshold }),
        new BreakoutStrategy({ volumeMultiplier: 1.2, requireTrendAlignment: true, stopAtr: 2, targetAtr: 3 }),
        new FibonacciRetracementStrategy(),
        new MomentumStrategy(),
        new GoldFactorStrategy(),
      ],
      options
    )
  );
}
