/**
 * Oscillators: RSI, MACD and rate-of-change momentum.
 */

import type { MacdSeries, Series } from './types';
import { calculateEMA, emptySeries, isDefined, wilderSmooth } from './moving-averages';

/**
 * Relative Strength Index with Wilder smoothing.
 *
 * The first value appears at index `period` (the mean of the first `period`
 * changes). With no losses RSI is 100; with neither gains nor losses over
 * the smoothing window it is undefined.
 */
export function calculateRSI(closes: Series, period: number = 14): Series {
  const gains = emptySeries(closes.length);
  const losses = emptySeries(closes.length);

  for (let i = 1; i < closes.length; i++) {
    const current = closes[i];
    const prior = closes[i - 1];
    if (!isDefined(current) || !isDefined(prior)) continue;
    const change = current - prior;
    gains[i] = change > 0 ? change : 0;
    losses[i] = change < 0 ? -change : 0;
  }

  const avgGains = wilderSmooth(gains, period);
  const avgLosses = wilderSmooth(losses, period);

  return avgGains.map((avgGain, i) => {
    const avgLoss = avgLosses[i];
    if (!isDefined(avgGain) || !isDefined(avgLoss)) return undefined;
    if (avgLoss === 0) return avgGain === 0 ? undefined : 100;
    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  });
}

/**
 * MACD line (fast EMA - slow EMA), its signal EMA and the histogram
 */
export function calculateMACD(
  closes: Series,
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MacdSeries {
  const fast = calculateEMA(closes, fastPeriod);
  const slow = calculateEMA(closes, slowPeriod);

  const line: Series = fast.map((f, i) => {
    const s = slow[i];
    return isDefined(f) && isDefined(s) ? f - s : undefined;
  });
  const signal = calculateEMA(line, signalPeriod);
  const histogram: Series = line.map((l, i) => {
    const s = signal[i];
    return isDefined(l) && isDefined(s) ? l - s : undefined;
  });

  return { line, signal, histogram };
}

/**
 * Rate of change over `lookback` bars: close[i] / close[i - lookback] - 1
 */
export function calculateMomentum(closes: Series, lookback: number): Series {
  const result = emptySeries(closes.length);
  for (let i = lookback; i < closes.length; i++) {
    const current = closes[i];
    const base = closes[i - lookback];
    if (isDefined(current) && isDefined(base) && base !== 0) {
      result[i] = current / base - 1;
    }
  }
  return result;
}
