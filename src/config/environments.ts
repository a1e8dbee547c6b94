/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, LEDGER_CONFIG, API_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const initialBalance = LEDGER_CONFIG.initialBalance;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// PARSING HELPERS
// =============================================================================

/**
 * Read a non-negative integer setting, failing fast on anything else
 */
export const readIntegerEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  port: readIntegerEnv('PORT', 9097),
  // Amounts are short decimal strings; anything larger is rejected by the parser
  bodyLimit: process.env.BODY_LIMIT || '1kb',
};

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

/**
 * Opening counters for the in-memory ledger.
 * Nothing is persisted; every process starts from these values.
 */
export const LEDGER_CONFIG = {
  initialBalance: readIntegerEnv('INITIAL_BALANCE', 1000),
  initialBank: readIntegerEnv('INITIAL_BANK', 0),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level:
    process.env.LOG_LEVEL || (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  pretty: isDevelopment,
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  port: API_CONFIG.port,
  logLevel: LOG_CONFIG.level,
});
