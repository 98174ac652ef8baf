/**
 * Volatility Indicators
 *
 * True range, ATR, Bollinger Bands and realized volatility.
 */

import type { BollingerSeries, Series } from './types';
import { calculateSMA, emptySeries, isDefined, wilderSmooth } from './moving-averages';

/**
 * Calculate True Range for a single bar
 */
export function calculateTrueRange(high: number, low: number, prevClose: number): number {
  const hl = high - low;
  const hpc = Math.abs(high - prevClose);
  const lpc = Math.abs(low - prevClose);

  return Math.max(hl, hpc, lpc);
}

/**
 * True range series. Index 0 has no previous close and stays undefined.
 */
export function calculateTrueRangeSeries(highs: Series, lows: Series, closes: Series): Series {
  const result = emptySeries(closes.length);
  for (let i = 1; i < closes.length; i++) {
    const high = highs[i];
    const low = lows[i];
    const prevClose = closes[i - 1];
    if (isDefined(high) && isDefined(low) && isDefined(prevClose)) {
      result[i] = calculateTrueRange(high, low, prevClose);
    }
  }
  return result;
}

/**
 * Average True Range, Wilder-smoothed. First value at index `period`.
 */
export function calculateATR(
  highs: Series,
  lows: Series,
  closes: Series,
  period: number = 14
): Series {
  return wilderSmooth(calculateTrueRangeSeries(highs, lows, closes), period);
}

/**
 * Bollinger Bands: the middle band is the SMA itself, the outer bands sit
 * `stdDevs` population standard deviations away.
 */
export function calculateBollingerBands(
  closes: Series,
  period: number = 20,
  stdDevs: number = 2
): BollingerSeries {
  const middle = calculateSMA(closes, period);
  const upper = emptySeries(closes.length);
  const lower = emptySeries(closes.length);

  for (let i = 0; i < closes.length; i++) {
    const mean = middle[i];
    if (!isDefined(mean)) continue;

    let squared = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const value = closes[j];
      if (isDefined(value)) squared += Math.pow(value - mean, 2);
    }
    const deviation = Math.sqrt(squared / period);

    upper[i] = mean + stdDevs * deviation;
    lower[i] = mean - stdDevs * deviation;
  }

  return { upper, middle, lower };
}

/**
 * Simple returns aligned to the closes (index 0 undefined)
 */
export function calculateReturns(closes: Series): Series {
  const result = emptySeries(closes.length);
  for (let i = 1; i < closes.length; i++) {
    const current = closes[i];
    const prior = closes[i - 1];
    if (isDefined(current) && isDefined(prior) && prior !== 0) {
      result[i] = (current - prior) / prior;
    }
  }
  return result;
}

/**
 * Population standard deviation of the last `window` returns, annualized
 * with sqrt(annualization). Pass 1 to get the daily figure.
 */
export function calculateRealizedVolatility(
  closes: Series,
  window: number = 20,
  annualization: number = 252
): Series {
  const returns = calculateReturns(closes);
  const means = calculateSMA(returns, window);
  const result = emptySeries(closes.length);

  for (let i = 0; i < closes.length; i++) {
    const mean = means[i];
    if (!isDefined(mean)) continue;

    let squared = 0;
    for (let j = i - window + 1; j <= i; j++) {
      const value = returns[j];
      if (isDefined(value)) squared += Math.pow(value - mean, 2);
    }
    result[i] = Math.sqrt(squared / window) * Math.sqrt(annualization);
  }

  return result;
}
