/**
 * Technical Analysis Constants
 *
 * Centralized indicator periods, strategy thresholds and data-fetch limits.
 * These can be overridden via environment variables for different environments.
 */

import { getNumericEnv } from './env';

// =============================================================================
// INDICATOR PERIODS
// =============================================================================

export const TA_PERIODS = {
  SMA_SHORT: getNumericEnv('TA_SMA_SHORT', 20),
  SMA_MEDIUM: getNumericEnv('TA_SMA_MEDIUM', 50),
  SMA_LONG: getNumericEnv('TA_SMA_LONG', 200),
  EMA_FAST: getNumericEnv('TA_EMA_FAST', 12),
  EMA_SLOW: getNumericEnv('TA_EMA_SLOW', 26),
  MACD_SIGNAL: getNumericEnv('TA_MACD_SIGNAL', 9),
  RSI: getNumericEnv('TA_RSI_PERIOD', 14),
  ATR: getNumericEnv('TA_ATR_PERIOD', 14),
  ADX: getNumericEnv('TA_ADX_PERIOD', 14),
  BOLLINGER: getNumericEnv('TA_BB_PERIOD', 20),
  BOLLINGER_STD_DEV: getNumericEnv('TA_BB_STD_DEV', 2),
  REALIZED_VOL: getNumericEnv('TA_REALIZED_VOL', 20),
  VOLUME_SMA: getNumericEnv('TA_VOLUME_SMA', 20),
  ROLLING_RANGE: getNumericEnv('TA_ROLLING_RANGE', 50),
  TRADING_DAYS_PER_YEAR: 252,
} as const;

/** Momentum lookbacks carried in every IndicatorSet */
export const MOMENTUM_WINDOWS = [5, 10, 20] as const;

export const FIBONACCI_RATIOS = [0, 0.236, 0.382, 0.5, 0.618, 0.786, 1] as const;

// =============================================================================
// STRATEGY THRESHOLDS
// =============================================================================

export const STRATEGY_THRESHOLDS = {
  // RSI bands
  RSI_OVERSOLD: getNumericEnv('STRAT_RSI_OVERSOLD', 30),
  RSI_OVERBOUGHT: getNumericEnv('STRAT_RSI_OVERBOUGHT', 70),

  // Multi-indicator voting
  VOTE_MAJORITY: getNumericEnv('STRAT_VOTE_MAJORITY', 3),
  VOTE_ATR_MOVE: getNumericEnv('STRAT_VOTE_ATR_MOVE', 1.5),       // |Δclose| in ATRs
  VOTE_VOLUME_SPIKE: getNumericEnv('STRAT_VOTE_VOLUME_SPIKE', 1.5), // × volume SMA

  // Breakout confirmation
  BREAKOUT_VOLUME: getNumericEnv('STRAT_BREAKOUT_VOLUME', 1.5),
  BREAKOUT_RSI_CEILING: 80,
  BREAKOUT_RSI_FLOOR: 20,
  ADX_TRENDING: getNumericEnv('STRAT_ADX_TRENDING', 25),

  // Bond proxies
  YIELD_CURVE_SPREAD: getNumericEnv('STRAT_YIELD_CURVE_SPREAD', 0.01),
  CREDIT_SPREAD: getNumericEnv('STRAT_CREDIT_SPREAD', 0.02),

  // Gold
  FIBONACCI_TOLERANCE: getNumericEnv('STRAT_FIB_TOLERANCE', 0.02),
  GOLD_DRIFT_WINDOW: getNumericEnv('STRAT_GOLD_DRIFT_WINDOW', 60),
  GOLD_SAFE_HAVEN_MIN: getNumericEnv('STRAT_GOLD_SAFE_HAVEN_MIN', 0.8),
  GOLD_INFLATION_HEDGE_MIN: getNumericEnv('STRAT_GOLD_INFLATION_MIN', 0.05),
} as const;

// =============================================================================
// SELECTION
// =============================================================================

export const SELECTION_DEFAULTS = {
  FORCED_BASE_CONFIDENCE: 0.1,
  FORCED_TALLY_WEIGHT: 0.2,
  FORCED_STOP_ATR: 1.5,
  FORCED_TARGET_ATR: 2,
  CONFLICT_CONFIDENCE: 0.3,
  STRONGEST_SIGNALS: 5,
  REPORT_TOP_SIGNALS: 20,
} as const;

// =============================================================================
// DATA FETCHING
// =============================================================================

export const DATA_FETCH = {
  // Token bucket for the price source
  REQUESTS_PER_SECOND: getNumericEnv('DATA_REQUESTS_PER_SECOND', 2),
  BURST: getNumericEnv('DATA_REQUEST_BURST', 20),

  MAX_RETRIES: getNumericEnv('DATA_MAX_RETRIES', 3),
  RETRY_BASE_DELAY_MS: getNumericEnv('DATA_RETRY_BASE_DELAY_MS', 500),

  CIRCUIT_FAILURE_THRESHOLD: getNumericEnv('DATA_CIRCUIT_FAILURES', 5),
  CIRCUIT_COOLDOWN_MS: getNumericEnv('DATA_CIRCUIT_COOLDOWN_MS', 15_000),
} as const;
