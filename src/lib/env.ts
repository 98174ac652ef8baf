/**
 * Environment Variable Access
 *
 * Type-safe access to environment variables with descriptive errors.
 */

import { createLogger } from './logger';

/**
 * Get a required environment variable
 * Throws descriptive error if missing
 */
export function getRequiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${name}. ` +
      `Please set it in your .env file or environment.`
    );
  }
  return value;
}

/**
 * Get an optional environment variable with a default value
 */
export function getOptionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

/**
 * Get a boolean environment variable
 */
export function getBooleanEnv(name: string, defaultValue: boolean = false): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get a numeric environment variable
 */
export function getNumericEnv(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    createLogger('env').warn('Invalid numeric env var', { name, value, defaultValue });
    return defaultValue;
  }
  return parsed;
}

/**
 * Check the variables the Alpaca price source needs.
 * Engines built on another PriceSource can skip this.
 */
export function validateEnvironment(): { valid: boolean; missing: string[] } {
  const required = [
    'ALPACA_API_KEY',
    'ALPACA_API_SECRET',
  ];

  const missing = required.filter(name => !process.env[name]);

  if (missing.length > 0) {
    createLogger('env').error('Missing required environment variables', { missing });
  }

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Alpaca market-data configuration
 */
export const alpacaConfig = {
  get apiKey(): string {
    return getRequiredEnv('ALPACA_API_KEY');
  },
  get apiSecret(): string {
    return getRequiredEnv('ALPACA_API_SECRET');
  },
  get isPaper(): boolean {
    return getBooleanEnv('ALPACA_PAPER', true);
  },
  /** 'iex' works on free accounts; 'sip' needs a paid data plan */
  get dataFeed(): string {
    return getOptionalEnv('ALPACA_DATA_FEED', 'iex');
  },
} as const;

/**
 * Engine paths and run settings
 */
export const engineConfig = {
  get tickersDir(): string {
    return getOptionalEnv('TICKERS_DIR', 'tickers');
  },
  get reportDir(): string {
    return getOptionalEnv('REPORT_DIR', 'reports/technical_analysis');
  },
  get configPath(): string {
    return getOptionalEnv('TECHNICAL_CONFIG_PATH', 'technical-analysis.yaml');
  },
  get concurrency(): number {
    return Math.max(1, Math.floor(getNumericEnv('ANALYSIS_CONCURRENCY', 4)));
  },
  get writeReports(): boolean {
    return getBooleanEnv('WRITE_REPORTS', true);
  },
} as const;
