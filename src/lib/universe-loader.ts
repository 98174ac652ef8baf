/**
 * Universe Loader
 *
 * Reads `<tickersDir>/<assetClass>_list.txt`, one symbol per line. Blank
 * lines and `#` comments are skipped, invalid symbols are dropped with a
 * warning, and duplicates keep their first position. A missing file falls
 * back to the module's default universe.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger } from './logger';
import { isMissingFileError } from './retry';
import type { AssetClass } from './strategies/types';
import { validateSymbol } from './validation';

const log = createLogger('universe-loader');

export function universeFilePath(tickersDir: string, assetClass: AssetClass): string {
  return join(tickersDir, `${assetClass}_list.txt`);
}

/**
 * Parse universe file contents into a clean symbol list
 */
export function parseUniverse(content: string, source: string = 'universe'): string[] {
  const symbols: string[] = [];
  const seen = new Set<string>();

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) return;

    const result = validateSymbol(line);
    if (!result.valid) {
      log.warn('Skipping invalid symbol', { source, line: index + 1, value: line, error: result.error });
      return;
    }
    if (seen.has(result.value)) return;

    seen.add(result.value);
    symbols.push(result.value);
  });

  return symbols;
}

export interface UniverseSource {
  load(assetClass: AssetClass, fallback: readonly string[]): Promise<string[]>;
}

/**
 * Universe files on disk
 */
export class FileUniverseSource implements UniverseSource {
  constructor(private readonly tickersDir: string) {}

  async load(assetClass: AssetClass, fallback: readonly string[]): Promise<string[]> {
    const path = universeFilePath(this.tickersDir, assetClass);
    try {
      const content = await readFile(path, 'utf-8');
      const symbols = parseUniverse(content, path);
      log.debug('Loaded universe file', { assetClass, path, count: symbols.length });
      return symbols;
    } catch (error) {
      if (isMissingFileError(error)) {
        log.info('Universe file not found, using default universe', { assetClass, path, count: fallback.length });
        return [...fallback];
      }
      throw error;
    }
  }
}

/**
 * Fixed universes, used when the configuration lists symbols inline
 */
export class StaticUniverseSource implements UniverseSource {
  constructor(private readonly universes: Partial<Record<AssetClass, readonly string[]>>) {}

  async load(assetClass: AssetClass, fallback: readonly string[]): Promise<string[]> {
    return [...(this.universes[assetClass] ?? fallback)];
  }
}
