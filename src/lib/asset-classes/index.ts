/**
 * Asset-Class Modules
 *
 * One strategy module per asset class, created by name.
 */

import type { AssetClass } from '../strategies/types';
import type { AssetClassProfile, AssetClassStrategyModule, ModuleOptions } from './asset-class-module';
import { EQUITIES_PROFILE, createEquitiesModule } from './equities';
import { BONDS_PROFILE, createBondsModule } from './bonds';
import { COMMODITIES_PROFILE, createCommoditiesModule } from './commodities';
import { GOLDS_PROFILE, createGoldsModule } from './golds';

/** Built-in profiles, before configuration overrides */
export const ASSET_CLASS_PROFILES: Record<AssetClass, AssetClassProfile> = {
  equities: EQUITIES_PROFILE,
  bonds: BONDS_PROFILE,
  commodities: COMMODITIES_PROFILE,
  golds: GOLDS_PROFILE,
};

const MODULE_FACTORIES: Record<AssetClass, (options?: ModuleOptions) => AssetClassStrategyModule> = {
  equities: createEquitiesModule,
  bonds: createBondsModule,
  commodities: createCommoditiesModule,
  golds: createGoldsModule,
};

export function createAssetClassModule(assetClass: AssetClass, options: ModuleOptions = {}): AssetClassStrategyModule {
  return MODULE_FACTORIES[assetClass](options);
}

export {
  AssetClassStrategyModule,
  applyOverrides,
  resolveStrategies,
  type AssetClassProfile,
  type ProfileOverrides,
  type ModuleOptions,
} from './asset-class-module';
export { EQUITIES_PROFILE, createEquitiesModule } from './equities';
export { BONDS_PROFILE, createBondsModule } from './bonds';
export { COMMODITIES_PROFILE, createCommoditiesModule } from './commodities';
export { GOLDS_PROFILE, createGoldsModule } from './golds';
