/**
 * Report Sinks
 *
 * Where selection results and the comprehensive report end up. The file sink
 * writes timestamped CSV and JSON files; the null sink discards everything.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { formatReportTimestamp, formatSignalsCsv, toSignalRow } from './formatters';
import { createLogger } from './logger';
import type { AssetClass, Signal } from './strategies/types';

const log = createLogger('report-writer');

export interface ReportSink {
  /** Returns the written location, or null when nothing was written */
  writeAssetClassReport(assetClass: AssetClass, signals: readonly Signal[], generatedAt: Date): Promise<string | null>;
  writeComprehensiveReport(report: unknown, generatedAt: Date): Promise<string | null>;
}

export function assetClassReportName(assetClass: AssetClass, generatedAt: Date): string {
  return `${assetClass}_technical_signals_${formatReportTimestamp(generatedAt)}.csv`;
}

export function comprehensiveReportName(generatedAt: Date): string {
  return `technical_analysis_report_${formatReportTimestamp(generatedAt)}.json`;
}

export class FileReportSink implements ReportSink {
  constructor(private readonly directory: string) {}

  async writeAssetClassReport(
    assetClass: AssetClass,
    signals: readonly Signal[],
    generatedAt: Date
  ): Promise<string | null> {
    if (signals.length === 0) return null;

    const path = join(this.directory, assetClassReportName(assetClass, generatedAt));
    await mkdir(this.directory, { recursive: true });
    await writeFile(path, formatSignalsCsv(signals.map(toSignalRow)), 'utf-8');
    log.info('Wrote signal report', { assetClass, path, count: signals.length });
    return path;
  }

  async writeComprehensiveReport(report: unknown, generatedAt: Date): Promise<string | null> {
    const path = join(this.directory, comprehensiveReportName(generatedAt));
    await mkdir(this.directory, { recursive: true });
    await writeFile(path, JSON.stringify(report, null, 2), 'utf-8');
    log.info('Wrote comprehensive report', { path });
    return path;
  }
}

export const nullReportSink: ReportSink = {
  writeAssetClassReport: () => Promise.resolve(null),
  writeComprehensiveReport: () => Promise.resolve(null),
};
