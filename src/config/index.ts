import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

// Import environment-specific configurations
import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  JWT_CONFIG,
  LEDGER_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * This consolidates all environment-specific settings.
 * For environment-specific values, you can also import directly from './environments'
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Redis
  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  // JWT Authentication
  jwt: JWT_CONFIG,

  // Ledger
  ledger: LEDGER_CONFIG,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  // Logging
  logging: LOG_CONFIG,
};
