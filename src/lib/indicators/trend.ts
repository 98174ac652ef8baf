/**
 * Trend Strength and Range Indicators
 *
 * Wilder's directional movement system (ADX, +DI, -DI), rolling
 * high/low windows and Fibonacci retracement levels.
 */

import { FIBONACCI_RATIOS } from '../constants';
import type { DirectionalIndexSeries, FibonacciLevels, Series } from './types';
import { emptySeries, isDefined, wilderSmooth } from './moving-averages';
import { calculateTrueRangeSeries } from './volatility';

/**
 * Calculate Directional Movement components (+DM, -DM), aligned to the bars
 */
export function calculateDirectionalMovement(
  highs: Series,
  lows: Series
): { plusDM: Series; minusDM: Series } {
  const plusDM = emptySeries(highs.length);
  const minusDM = emptySeries(highs.length);

  for (let i = 1; i < highs.length; i++) {
    const high = highs[i];
    const prevHigh = highs[i - 1];
    const low = lows[i];
    const prevLow = lows[i - 1];
    if (!isDefined(high) || !isDefined(prevHigh) || !isDefined(low) || !isDefined(prevLow)) {
      continue;
    }

    const upMove = high - prevHigh;
    const downMove = prevLow - low;

    plusDM[i] = upMove > downMove && upMove > 0 ? upMove : 0;
    minusDM[i] = downMove > upMove && downMove > 0 ? downMove : 0;
  }

  return { plusDM, minusDM };
}

/**
 * Average Directional Index with its DI components.
 *
 * A bar whose smoothed true range is zero has no DI; a bar whose DIs sum to
 * zero has no DX. Both propagate as undefined into the ADX average.
 */
export function calculateADX(
  highs: Series,
  lows: Series,
  closes: Series,
  period: number = 14
): DirectionalIndexSeries {
  const { plusDM, minusDM } = calculateDirectionalMovement(highs, lows);
  const smoothedTR = wilderSmooth(calculateTrueRangeSeries(highs, lows, closes), period);
  const smoothedPlus = wilderSmooth(plusDM, period);
  const smoothedMinus = wilderSmooth(minusDM, period);

  const plusDI = emptySeries(closes.length);
  const minusDI = emptySeries(closes.length);
  const dx = emptySeries(closes.length);

  for (let i = 0; i < closes.length; i++) {
    const tr = smoothedTR[i];
    const plus = smoothedPlus[i];
    const minus = smoothedMinus[i];
    if (!isDefined(tr) || !isDefined(plus) || !isDefined(minus) || tr === 0) continue;

    const pdi = (100 * plus) / tr;
    const mdi = (100 * minus) / tr;
    plusDI[i] = pdi;
    minusDI[i] = mdi;

    const diSum = pdi + mdi;
    if (diSum > 0) {
      dx[i] = (100 * Math.abs(pdi - mdi)) / diSum;
    }
  }

  return { adx: wilderSmooth(dx, period), plusDI, minusDI };
}

function rollingExtreme(values: Series, window: number, pick: (a: number, b: number) => number): Series {
  const result = emptySeries(values.length);
  for (let i = window - 1; i < values.length; i++) {
    let extreme: number | undefined;
    for (let j = i - window + 1; j <= i; j++) {
      const value = values[j];
      if (!isDefined(value)) {
        extreme = undefined;
        break;
      }
      extreme = extreme === undefined ? value : pick(extreme, value);
    }
    result[i] = extreme;
  }
  return result;
}

export function calculateRollingHigh(highs: Series, window: number = 50): Series {
  return rollingExtreme(highs, window, Math.max);
}

export function calculateRollingLow(lows: Series, window: number = 50): Series {
  return rollingExtreme(lows, window, Math.min);
}

/**
 * Retracement levels measured up from the low: low + ratio * (high - low)
 */
export function calculateFibonacciLevels(high: number, low: number): FibonacciLevels {
  const range = high - low;
  return {
    high,
    low,
    levels: FIBONACCI_RATIOS.map(ratio => ({ ratio, price: low + ratio * range })),
  };
}

/**
 * Look up the price of one retracement ratio
 */
export function fibonacciPrice(levels: FibonacciLevels, ratio: number): number | undefined {
  return levels.levels.find(level => level.ratio === ratio)?.price;
}
