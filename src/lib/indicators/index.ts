/**
 * Indicator Library
 *
 * Pure functions over aligned numeric series. No I/O.
 */

export * from './types';
export * from './moving-averages';
export * from './oscillators';
export * from './volatility';
export * from './trend';
export { sanitizeBars, computeIndicatorSet, snapshotIndicators, type IndicatorPeriods } from './indicator-set';
