/**
 * Tests for Signal Formatters
 */

import {
  CSV_COLUMNS,
  escapeCsvField,
  formatReportTimestamp,
  formatSignalsCsv,
  toSignalRow,
  type SignalTableRow,
} from '@/lib/formatters';
import type { DirectionalSignal, WatchSignal } from '@/lib/strategies/types';

const buySignal: DirectionalSignal = {
  instrument: 'XOM',
  assetClass: 'equities',
  strategy: 'momentum_breakout',
  family: 'generic',
  direction: 'BUY',
  confidence: 0.75,
  strength: 4,
  price: 112.5,
  asOf: '2024-03-01',
  rationale: 'Breakout above 20-day high, volume 1.8x average',
  stopLoss: 108.25,
  target: 119.6,
};

const watchSignal: WatchSignal = {
  instrument: 'TLT',
  assetClass: 'bonds',
  strategy: 'multi_indicator_voting',
  family: 'voting',
  direction: 'WATCH',
  confidence: 2 / 7,
  strength: 2,
  price: 91,
  asOf: '2024-03-01',
  rationale: 'No majority: 2 buy / 1 sell / 4 neutral',
  votes: { buy: 2, sell: 1, neutral: 4, total: 7 },
};

describe('toSignalRow', () => {
  it('should flatten a directional signal', () => {
    expect(toSignalRow(buySignal)).toEqual({
      instrument: 'XOM',
      assetClass: 'equities',
      strategy: 'momentum_breakout',
      direction: 'BUY',
      confidence: 0.75,
      strength: 4,
      price: 112.5,
      stopLoss: 108.25,
      target: 119.6,
      asOf: '2024-03-01',
      rationale: 'Breakout above 20-day high, volume 1.8x average',
    });
  });

  it('should leave levels empty for WATCH', () => {
    const row = toSignalRow(watchSignal);
    expect(row.stopLoss).toBeNull();
    expect(row.target).toBeNull();
    expect(row.direction).toBe('WATCH');
  });
});

describe('escapeCsvField', () => {
  it('should pass plain text through', () => {
    expect(escapeCsvField('GLD')).toBe('GLD');
  });

  it('should quote fields with commas', () => {
    expect(escapeCsvField('a, b')).toBe('"a, b"');
  });

  it('should double embedded quotes', () => {
    expect(escapeCsvField('the "gap" closed')).toBe('"the ""gap"" closed"');
  });

  it('should quote line breaks', () => {
    expect(escapeCsvField('line1\nline2')).toBe('"line1\nline2"');
  });
});

describe('formatSignalsCsv', () => {
  it('should write only the header for no rows', () => {
    expect(formatSignalsCsv([])).toBe(CSV_COLUMNS.join(',') + '\n');
  });

  it('should write one line per signal with fixed precision', () => {
    const rows: SignalTableRow[] = [toSignalRow(buySignal), toSignalRow(watchSignal)];
    const lines = formatSignalsCsv(rows).split('\n');

    expect(lines[0]).toBe('instrument,strategy,direction,confidence,strength,price,stop_loss,target,as_of,rationale');
    expect(lines[1]).toBe(
      'XOM,momentum_breakout,BUY,0.7500,4,112.5000,108.2500,119.6000,2024-03-01,' +
      '"Breakout above 20-day high, volume 1.8x average"'
    );
    expect(lines[2]).toBe(
      'TLT,multi_indicator_voting,WATCH,0.2857,2,91.0000,,,2024-03-01,No majority: 2 buy / 1 sell / 4 neutral'
    );
    expect(lines[3]).toBe('');
    expect(lines).toHaveLength(4);
  });
});

describe('formatReportTimestamp', () => {
  it('should format in UTC with zero padding', () => {
    expect(formatReportTimestamp(new Date('2024-03-05T07:08:09.000Z'))).toBe('20240305_070809');
  });

  it('should not depend on the local time zone', () => {
    expect(formatReportTimestamp(new Date(Date.UTC(2023, 11, 31, 23, 59, 59)))).toBe('20231231_235959');
  });
});
