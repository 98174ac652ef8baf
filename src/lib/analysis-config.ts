/**
 * Analysis Configuration
 *
 * Optional YAML file layered over the environment defaults. Every field is
 * optional; a missing file means "use the defaults".
 *
 *   concurrency: 2
 *   assetClasses:
 *     bonds:
 *       maxPositions: 4
 *       universe: [TLT, IEF, SHY]
 *     golds:
 *       enabled: false
 */

import { readFile } from 'node:fs/promises';
import yaml from 'yaml';
import { ASSET_CLASS_PROFILES } from './asset-classes';
import { engineConfig } from './env';
import { createLogger } from './logger';
import { isMissingFileError } from './retry';
import { getAvailableStrategyTypes } from './strategies/strategy-factory';
import { ASSET_CLASSES, type AssetClass } from './strategies/types';
import {
  isRecord,
  validateArray,
  validateBoolean,
  validateEnum,
  validateNumber,
  validateString,
  validateSymbol,
  type ValidationResult,
} from './validation';

const log = createLogger('analysis-config');

export interface AssetClassSettings {
  enabled: boolean;
  minPositions?: number;
  maxPositions?: number;
  lookbackBars?: number;
  minHistoryBars?: number;
  majorityThreshold?: number;
  /** Replaces the universe file for this class */
  universe?: string[];
  /** Strategy types to run instead of the module's built-in list */
  strategies?: string[];
}

export interface AnalysisConfig {
  tickersDir: string;
  reportDir: string;
  concurrency: number;
  writeReports: boolean;
  assetClasses: Record<AssetClass, AssetClassSettings>;
}

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export function defaultAnalysisConfig(): AnalysisConfig {
  return {
    tickersDir: engineConfig.tickersDir,
    reportDir: engineConfig.reportDir,
    concurrency: engineConfig.concurrency,
    writeReports: engineConfig.writeReports,
    assetClasses: {
      equities: { enabled: true },
      bonds: { enabled: true },
      commodities: { enabled: true },
      golds: { enabled: true },
    },
  };
}

const POSITIVE_INT = { min: 1, integer: true };

function parseAssetClassSettings(
  assetClass: AssetClass,
  raw: unknown,
  path: string,
  issues: string[]
): AssetClassSettings {
  const settings: AssetClassSettings = { enabled: true };
  if (raw === null || raw === undefined) return settings;
  if (!isRecord(raw)) {
    issues.push(`${path} must be a mapping`);
    return settings;
  }

  const collect = <T>(result: ValidationResult<T>, assign: (value: T) => void): void => {
    if (result.valid) assign(result.value);
    else issues.push(result.error);
  };

  if (raw.enabled !== undefined) {
    collect(validateBoolean(raw.enabled, `${path}.enabled`), v => { settings.enabled = v; });
  }
  if (raw.minPositions !== undefined) {
    collect(validateNumber(raw.minPositions, `${path}.minPositions`, { min: 0, integer: true }), v => { settings.minPositions = v; });
  }
  if (raw.maxPositions !== undefined) {
    collect(validateNumber(raw.maxPositions, `${path}.maxPositions`, POSITIVE_INT), v => { settings.maxPositions = v; });
  }
  if (raw.lookbackBars !== undefined) {
    collect(validateNumber(raw.lookbackBars, `${path}.lookbackBars`, POSITIVE_INT), v => { settings.lookbackBars = v; });
  }
  if (raw.minHistoryBars !== undefined) {
    collect(validateNumber(raw.minHistoryBars, `${path}.minHistoryBars`, POSITIVE_INT), v => { settings.minHistoryBars = v; });
  }
  if (raw.majorityThreshold !== undefined) {
    collect(
      validateNumber(raw.majorityThreshold, `${path}.majorityThreshold`, { min: 1, max: 7, integer: true }),
      v => { settings.majorityThreshold = v; }
    );
  }
  if (raw.universe !== undefined) {
    collect(validateArray(raw.universe, `${path}.universe`, item => validateSymbol(item)), v => { settings.universe = v; });
  }
  if (raw.strategies !== undefined) {
    const available = getAvailableStrategyTypes();
    collect(
      validateArray(raw.strategies, `${path}.strategies`, (item, name) => validateEnum(item, name, available)),
      v => { settings.strategies = v; }
    );
  }

  // An override on one bound is checked against the built-in other bound
  const profile = ASSET_CLASS_PROFILES[assetClass];
  const minPositions = settings.minPositions ?? profile.minPositions;
  const maxPositions = settings.maxPositions ?? profile.maxPositions;
  if (minPositions > maxPositions) {
    issues.push(`${path}.minPositions (${minPositions}) must not exceed maxPositions (${maxPositions})`);
  }

  return settings;
}

/**
 * Validate a parsed YAML document and merge it over `defaults`
 */
export function parseAnalysisConfig(
  raw: unknown,
  source: string = 'configuration',
  defaults: AnalysisConfig = defaultAnalysisConfig()
): AnalysisConfig {
  if (raw === null || raw === undefined) return defaults;
  if (!isRecord(raw)) {
    throw new ConfigValidationError(source, ['top level must be a mapping']);
  }

  const issues: string[] = [];
  const config: AnalysisConfig = { ...defaults, assetClasses: { ...defaults.assetClasses } };

  if (raw.tickersDir !== undefined) {
    const result = validateString(raw.tickersDir, 'tickersDir', { minLength: 1 });
    if (result.valid) config.tickersDir = result.value;
    else issues.push(result.error);
  }
  if (raw.reportDir !== undefined) {
    const result = validateString(raw.reportDir, 'reportDir', { minLength: 1 });
    if (result.valid) config.reportDir = result.value;
    else issues.push(result.error);
  }
  if (raw.concurrency !== undefined) {
    const result = validateNumber(raw.concurrency, 'concurrency', POSITIVE_INT);
    if (result.valid) config.concurrency = result.value;
    else issues.push(result.error);
  }
  if (raw.writeReports !== undefined) {
    const result = validateBoolean(raw.writeReports, 'writeReports');
    if (result.valid) config.writeReports = result.value;
    else issues.push(result.error);
  }

  if (raw.assetClasses !== undefined) {
    if (!isRecord(raw.assetClasses)) {
      issues.push('assetClasses must be a mapping');
    } else {
      for (const key of Object.keys(raw.assetClasses)) {
        const assetClass = validateEnum(key, 'assetClasses key', ASSET_CLASSES);
        if (!assetClass.valid) {
          issues.push(assetClass.error);
          continue;
        }
        config.assetClasses[assetClass.value] = parseAssetClassSettings(
          assetClass.value,
          raw.assetClasses[key],
          `assetClasses.${key}`,
          issues
        );
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(source, issues);
  }
  return config;
}

/**
 * Read and validate the YAML file at `path`. A missing file yields the
 * defaults; malformed YAML or invalid values throw ConfigValidationError.
 */
export async function loadAnalysisConfig(path: string = engineConfig.configPath): Promise<AnalysisConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      log.debug('No configuration file, using defaults', { path });
      return defaultAnalysisConfig();
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ConfigValidationError(path, [error instanceof Error ? error.message : String(error)]);
  }

  const config = parseAnalysisConfig(parsed, path);
  log.info('Loaded analysis configuration', { path });
  return config;
}
