/**
 * Indicator Types
 *
 * Every series is aligned to the bar index of the history it was computed
 * from. A position whose warm-up is longer than the available history holds
 * `undefined`, never zero.
 */

/**
 * One trading day for one instrument
 */
export interface PriceBar {
  /** ISO date (YYYY-MM-DD) */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type Series = Array<number | undefined>;

export interface MacdSeries {
  line: Series;
  signal: Series;
  histogram: Series;
}

export interface BollingerSeries {
  upper: Series;
  middle: Series;
  lower: Series;
}

export interface DirectionalIndexSeries {
  adx: Series;
  plusDI: Series;
  minusDI: Series;
}

export interface FibonacciLevel {
  ratio: number;
  price: number;
}

export interface FibonacciLevels {
  high: number;
  low: number;
  levels: FibonacciLevel[];
}

/**
 * Full indicator bundle for one instrument.
 * Period names refer to the defaults in TA_PERIODS (20/50/200, 12/26, ...).
 */
export interface IndicatorSet {
  instrument: string;
  dates: string[];
  closes: number[];
  highs: number[];
  lows: number[];
  volumes: number[];

  smaShort: Series;
  smaMedium: Series;
  smaLong: Series;
  emaFast: Series;
  emaSlow: Series;
  rsi: Series;
  macd: MacdSeries;
  bollinger: BollingerSeries;
  atr: Series;
  realizedVolatility: Series;
  momentum5: Series;
  momentum10: Series;
  momentum20: Series;
  directional: DirectionalIndexSeries;
  volumeSma: Series;
  rollingHigh: Series;
  rollingLow: Series;
  /** Levels from the most recent rolling high/low window */
  fibonacci: FibonacciLevels | undefined;
}

/**
 * Latest-bar view of an IndicatorSet, the shape strategies read from.
 */
export interface IndicatorSnapshot {
  instrument: string;
  asOf: string;
  price: number;
  previousClose: number | undefined;
  volume: number;
  smaShort: number | undefined;
  smaMedium: number | undefined;
  smaLong: number | undefined;
  emaFast: number | undefined;
  emaSlow: number | undefined;
  rsi: number | undefined;
  macdLine: number | undefined;
  macdSignal: number | undefined;
  macdHistogram: number | undefined;
  bbUpper: number | undefined;
  bbMiddle: number | undefined;
  bbLower: number | undefined;
  atr: number | undefined;
  realizedVolatility: number | undefined;
  momentum5: number | undefined;
  momentum10: number | undefined;
  momentum20: number | undefined;
  adx: number | undefined;
  plusDI: number | undefined;
  minusDI: number | undefined;
  volumeSma: number | undefined;
  fibonacci: FibonacciLevels | undefined;
}
