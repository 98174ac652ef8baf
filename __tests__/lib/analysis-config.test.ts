/**
 * Tests for Analysis Configuration
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigValidationError,
  defaultAnalysisConfig,
  loadAnalysisConfig,
  parseAnalysisConfig,
  type AnalysisConfig,
} from '@/lib/analysis-config';

const DEFAULTS: AnalysisConfig = {
  tickersDir: 'tickers',
  reportDir: 'reports',
  concurrency: 4,
  writeReports: true,
  assetClasses: {
    equities: { enabled: true },
    bonds: { enabled: true },
    commodities: { enabled: true },
    golds: { enabled: true },
  },
};

function issuesOf(raw: unknown): string[] {
  try {
    parseAnalysisConfig(raw, 'test.yaml', DEFAULTS);
  } catch (error) {
    if (error instanceof ConfigValidationError) return error.issues;
    throw error;
  }
  return [];
}

describe('Analysis Configuration', () => {
  describe('defaultAnalysisConfig', () => {
    it('should enable every asset class', () => {
      const config = defaultAnalysisConfig();
      expect(Object.values(config.assetClasses).every(c => c.enabled)).toBe(true);
      expect(config.concurrency).toBeGreaterThanOrEqual(1);
    });
  });

  describe('parseAnalysisConfig', () => {
    it('should return the defaults for an empty document', () => {
      expect(parseAnalysisConfig(null, 'test.yaml', DEFAULTS)).toBe(DEFAULTS);
    });

    it('should merge top-level settings and per-class overrides', () => {
      const config = parseAnalysisConfig({
        concurrency: 2,
        writeReports: false,
        assetClasses: {
          bonds: { maxPositions: 4, universe: ['tlt', 'IEF'] },
          golds: { enabled: false },
        },
      }, 'test.yaml', DEFAULTS);

      expect(config.concurrency).toBe(2);
      expect(config.writeReports).toBe(false);
      expect(config.tickersDir).toBe('tickers');
      expect(config.assetClasses.bonds).toEqual({ enabled: true, maxPositions: 4, universe: ['TLT', 'IEF'] });
      expect(config.assetClasses.golds).toEqual({ enabled: false });
      expect(config.assetClasses.equities).toEqual({ enabled: true });
    });

    it('should not mutate the defaults', () => {
      parseAnalysisConfig({ assetClasses: { golds: { enabled: false } } }, 'test.yaml', DEFAULTS);
      expect(DEFAULTS.assetClasses.golds).toEqual({ enabled: true });
    });

    it('should accept a strategy list of known types', () => {
      const config = parseAnalysisConfig(
        { assetClasses: { commodities: { strategies: ['trend_following', 'breakout'] } } },
        'test.yaml',
        DEFAULTS
      );
      expect(config.assetClasses.commodities.strategies).toEqual(['trend_following', 'breakout']);
    });

    it('should reject a non-mapping document', () => {
      expect(() => parseAnalysisConfig(['a'], 'test.yaml', DEFAULTS)).toThrow(
        'Invalid configuration in test.yaml: top level must be a mapping'
      );
    });

    it('should collect every issue', () => {
      expect(issuesOf({
        concurrency: 0,
        assetClasses: {
          crypto: {},
          equities: { minPositions: 9, maxPositions: 3, majorityThreshold: 8 },
          bonds: 'yes',
        },
      })).toEqual([
        'concurrency must be at least 1',
        'assetClasses key must be one of: equities, bonds, commodities, golds',
        'assetClasses.equities.majorityThreshold must be at most 7',
        'assetClasses.equities.minPositions (9) must not exceed maxPositions (3)',
        'assetClasses.bonds must be a mapping',
      ]);
    });

    it('should check a single bound against the built-in profile', () => {
      expect(issuesOf({ assetClasses: { bonds: { maxPositions: 1 } } })).toEqual([
        'assetClasses.bonds.minPositions (2) must not exceed maxPositions (1)',
      ]);
      expect(issuesOf({ assetClasses: { golds: { minPositions: 3 } } })).toEqual([
        'assetClasses.golds.minPositions (3) must not exceed maxPositions (2)',
      ]);
    });

    it('should accept a single bound that fits the built-in profile', () => {
      const config = parseAnalysisConfig({ assetClasses: { bonds: { minPositions: 0 } } }, 'test.yaml', DEFAULTS);
      expect(config.assetClasses.bonds).toEqual({ enabled: true, minPositions: 0 });
    });

    it('should throw a ConfigValidationError for a contradicting bound', () => {
      expect(() => parseAnalysisConfig({ assetClasses: { bonds: { maxPositions: 1 } } }, 'test.yaml', DEFAULTS))
        .toThrow(ConfigValidationError);
    });

    it('should reject unknown strategies and invalid symbols', () => {
      expect(issuesOf({ assetClasses: { golds: { strategies: ['forced_entry'], universe: ['GL D'] } } })).toEqual([
        'symbol has invalid format',
        expect.stringMatching(/^assetClasses\.golds\.strategies\[0\] must be one of: /),
      ]);
    });
  });

  describe('loadAnalysisConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'analysis-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should fall back to the defaults when the file is missing', async () => {
      const config = await loadAnalysisConfig(join(dir, 'missing.yaml'));
      expect(config.assetClasses).toEqual(defaultAnalysisConfig().assetClasses);
    });

    it('should parse a YAML file', async () => {
      const path = join(dir, 'technical-analysis.yaml');
      await writeFile(path, [
        'concurrency: 1',
        'assetClasses:',
        '  golds:',
        '    maxPositions: 1',
        '    universe: [GLD, IAU]',
        '',
      ].join('\n'));

      const config = await loadAnalysisConfig(path);

      expect(config.concurrency).toBe(1);
      expect(config.assetClasses.golds).toEqual({ enabled: true, maxPositions: 1, universe: ['GLD', 'IAU'] });
    });

    it('should report malformed YAML as a validation error', async () => {
      const path = join(dir, 'broken.yaml');
      await writeFile(path, 'assetClasses: [unclosed\n');

      await expect(loadAnalysisConfig(path)).rejects.toBeInstanceOf(ConfigValidationError);
    });
  });
});
