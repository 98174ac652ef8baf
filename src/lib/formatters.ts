/**
 * Signal Formatters
 *
 * Converts signals into the flat row shape the query surface returns and the
 * CSV text the report sink writes.
 */

import type { AssetClass, Direction, Signal, StrategyType } from './strategies/types';

// =============================================================================
// TABLE ROWS
// =============================================================================

export interface SignalTableRow {
  instrument: string;
  assetClass: AssetClass;
  strategy: StrategyType;
  direction: Direction;
  confidence: number;
  strength: number;
  price: number;
  stopLoss: number | null;
  target: number | null;
  asOf: string;
  rationale: string;
}

export function toSignalRow(signal: Signal): SignalTableRow {
  return {
    instrument: signal.instrument,
    assetClass: signal.assetClass,
    strategy: signal.strategy,
    direction: signal.direction,
    confidence: signal.confidence,
    strength: signal.strength,
    price: signal.price,
    stopLoss: signal.direction === 'WATCH' ? null : signal.stopLoss,
    target: signal.direction === 'WATCH' ? null : signal.target,
    asOf: signal.asOf,
    rationale: signal.rationale,
  };
}

// =============================================================================
// CSV
// =============================================================================

export const CSV_COLUMNS = [
  'instrument',
  'strategy',
  'direction',
  'confidence',
  'strength',
  'price',
  'stop_loss',
  'target',
  'as_of',
  'rationale',
] as const;

/**
 * Quote a field when it holds a comma, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatNumber(value: number | null, digits: number): string {
  return value === null ? '' : value.toFixed(digits);
}

export function formatSignalsCsv(rows: readonly SignalTableRow[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push([
      row.instrument,
      row.strategy,
      row.direction,
      formatNumber(row.confidence, 4),
      String(row.strength),
      formatNumber(row.price, 4),
      formatNumber(row.stopLoss, 4),
      formatNumber(row.target, 4),
      row.asOf,
      row.rationale,
    ].map(escapeCsvField).join(','));
  }
  return lines.join('\n') + '\n';
}

// =============================================================================
// TIMESTAMPS
// =============================================================================

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * UTC timestamp for report file names: YYYYMMDD_HHmmss
 */
export function formatReportTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
