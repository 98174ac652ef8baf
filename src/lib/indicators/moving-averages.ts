/**
 * Moving Averages
 *
 * Simple, exponential and Wilder-smoothed averages over aligned series.
 */

import type { Series } from './types';

export function isDefined(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value);
}

export function emptySeries(length: number): Series {
  return new Array<number | undefined>(length).fill(undefined);
}

/**
 * Last element of a series, or undefined for an empty one
 */
export function latest(series: Series): number | undefined {
  return series.length > 0 ? series[series.length - 1] : undefined;
}

/**
 * Second-to-last element of a series
 */
export function previous(series: Series): number | undefined {
  return series.length > 1 ? series[series.length - 2] : undefined;
}

/**
 * Trailing arithmetic mean. Defined at index i >= window - 1 when every
 * value in the window is defined.
 */
export function calculateSMA(values: Series, window: number): Series {
  const result = emptySeries(values.length);
  if (window <= 0) return result;

  for (let i = window - 1; i < values.length; i++) {
    let sum = 0;
    let complete = true;
    for (let j = i - window + 1; j <= i; j++) {
      const value = values[j];
      if (!isDefined(value)) {
        complete = false;
        break;
      }
      sum += value;
    }
    if (complete) result[i] = sum / window;
  }

  return result;
}

/**
 * Recursive smoothing shared by EMA and Wilder averages.
 *
 * The state is seeded with the mean of the first run of `period` consecutive
 * defined values. After the seed an undefined input leaves the state as it
 * was and yields undefined at that index.
 */
export function smoothSeries(values: Series, period: number, alpha: number): Series {
  const result = emptySeries(values.length);
  if (period <= 0) return result;

  let state: number | undefined;
  let run: number[] = [];

  for (let i = 0; i < values.length; i++) {
    const value = values[i];

    if (state === undefined) {
      if (!isDefined(value)) {
        run = [];
        continue;
      }
      run.push(value);
      if (run.length === period) {
        state = run.reduce((a, b) => a + b, 0) / period;
        result[i] = state;
      }
      continue;
    }

    if (!isDefined(value)) continue;
    state = state + alpha * (value - state);
    result[i] = state;
  }

  return result;
}

/**
 * Exponential moving average, k = 2 / (window + 1)
 */
export function calculateEMA(values: Series, window: number): Series {
  return smoothSeries(values, window, 2 / (window + 1));
}

/**
 * Wilder's smoothing: avg = (prev * (period - 1) + x) / period
 */
export function wilderSmooth(values: Series, period: number): Series {
  return smoothSeries(values, period, 1 / period);
}
