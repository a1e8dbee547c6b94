import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

// Import environment-specific configurations
import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  API_CONFIG,
  LEDGER_CONFIG,
  LOG_CONFIG,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export { getEnvironmentInfo };

/**
 * Main application configuration object
 *
 * This consolidates all environment-specific settings.
 * Import this for general app configuration needs.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
  },

  // Ledger
  ledger: LEDGER_CONFIG,

  // Logging
  logging: LOG_CONFIG,
};
