/**
 * Indicator Set Construction
 *
 * Turns a daily bar history into the full per-instrument indicator bundle
 * and the latest-bar snapshot strategies read from.
 */

import { MOMENTUM_WINDOWS, TA_PERIODS } from '../constants';
import type { IndicatorSet, IndicatorSnapshot, PriceBar } from './types';
import { calculateEMA, calculateSMA, isDefined, latest } from './moving-averages';
import { calculateMACD, calculateMomentum, calculateRSI } from './oscillators';
import { calculateADX, calculateFibonacciLevels, calculateRollingHigh, calculateRollingLow } from './trend';
import { calculateATR, calculateBollingerBands, calculateRealizedVolatility } from './volatility';

export type IndicatorPeriods = typeof TA_PERIODS;

/**
 * Drop unusable bars and put the rest in date order.
 *
 * A bar needs a finite positive close and finite high, low and volume. When a
 * date repeats, the later bar wins.
 */
export function sanitizeBars(bars: readonly PriceBar[]): PriceBar[] {
  const byDate = new Map<string, PriceBar>();

  for (const bar of bars) {
    if (!Number.isFinite(bar.close) || bar.close <= 0) continue;
    if (!Number.isFinite(bar.high) || !Number.isFinite(bar.low) || !Number.isFinite(bar.volume)) continue;
    byDate.set(bar.date, bar);
  }

  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Compute every indicator for one instrument. `bars` must already be
 * sanitized and chronological.
 */
export function computeIndicatorSet(
  instrument: string,
  bars: readonly PriceBar[],
  periods: IndicatorPeriods = TA_PERIODS
): IndicatorSet {
  const closes = bars.map(b => b.close);
  const highs = bars.map(b => b.high);
  const lows = bars.map(b => b.low);
  const volumes = bars.map(b => b.volume);

  const rollingHigh = calculateRollingHigh(highs, periods.ROLLING_RANGE);
  const rollingLow = calculateRollingLow(lows, periods.ROLLING_RANGE);
  const recentHigh = latest(rollingHigh);
  const recentLow = latest(rollingLow);
  const [shortMomentum, mediumMomentum, longMomentum] = MOMENTUM_WINDOWS;

  return {
    instrument,
    dates: bars.map(b => b.date),
    closes,
    highs,
    lows,
    volumes,
    smaShort: calculateSMA(closes, periods.SMA_SHORT),
    smaMedium: calculateSMA(closes, periods.SMA_MEDIUM),
    smaLong: calculateSMA(closes, periods.SMA_LONG),
    emaFast: calculateEMA(closes, periods.EMA_FAST),
    emaSlow: calculateEMA(closes, periods.EMA_SLOW),
    rsi: calculateRSI(closes, periods.RSI),
    macd: calculateMACD(closes, periods.EMA_FAST, periods.EMA_SLOW, periods.MACD_SIGNAL),
    bollinger: calculateBollingerBands(closes, periods.BOLLINGER, periods.BOLLINGER_STD_DEV),
    atr: calculateATR(highs, lows, closes, periods.ATR),
    realizedVolatility: calculateRealizedVolatility(
      closes,
      periods.REALIZED_VOL,
      periods.TRADING_DAYS_PER_YEAR
    ),
    momentum5: calculateMomentum(closes, shortMomentum),
    momentum10: calculateMomentum(closes, mediumMomentum),
    momentum20: calculateMomentum(closes, longMomentum),
    directional: calculateADX(highs, lows, closes, periods.ADX),
    volumeSma: calculateSMA(volumes, periods.VOLUME_SMA),
    rollingHigh,
    rollingLow,
    fibonacci: isDefined(recentHigh) && isDefined(recentLow)
      ? calculateFibonacciLevels(recentHigh, recentLow)
      : undefined,
  };
}

/**
 * Latest-bar view of an indicator set. Returns null for an empty history.
 */
export function snapshotIndicators(set: IndicatorSet): IndicatorSnapshot | null {
  const last = set.closes.length - 1;
  if (last < 0) return null;

  return {
    instrument: set.instrument,
    asOf: set.dates[last],
    price: set.closes[last],
    previousClose: last > 0 ? set.closes[last - 1] : undefined,
    volume: set.volumes[last],
    smaShort: latest(set.smaShort),
    smaMedium: latest(set.smaMedium),
    smaLong: latest(set.smaLong),
    emaFast: latest(set.emaFast),
    emaSlow: latest(set.emaSlow),
    rsi: latest(set.rsi),
    macdLine: latest(set.macd.line),
    macdSignal: latest(set.macd.signal),
    macdHistogram: latest(set.macd.histogram),
    bbUpper: latest(set.bollinger.upper),
    bbMiddle: latest(set.bollinger.middle),
    bbLower: latest(set.bollinger.lower),
    atr: latest(set.atr),
    realizedVolatility: latest(set.realizedVolatility),
    momentum5: latest(set.momentum5),
    momentum10: latest(set.momentum10),
    momentum20: latest(set.momentum20),
    adx: latest(set.directional.adx),
    plusDI: latest(set.directional.plusDI),
    minusDI: latest(set.directional.minusDI),
    volumeSma: latest(set.volumeSma),
    fibonacci: set.fibonacci,
  };
}
