/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, LEDGER_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/request-ledger'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/request-ledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/request-ledger';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT Secret - MUST be set in production (enforced by validateProductionEnv)
 */
export const JWT_SECRET = isProduction
  ? process.env.JWT_SECRET || ''
  : process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  accessTokenExpiresIn: process.env.JWT_ACCESS_TOKEN_EXPIRES_IN || (isProduction ? '15m' : '1h'),
};

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

export type ExpiryPolicy = 'speculative' | 'committed';

/**
 * Ledger behaviour
 *
 * expiryPolicy:
 *   - speculative: a payment attempt on a lapsed request fails and its EXPIRED
 *     write is discarded with the rest of the call (stored status stays PENDING)
 *   - committed: the EXPIRED write survives the failed call and is persisted
 */
const EXPIRY_POLICY: ExpiryPolicy =
  process.env.LEDGER_EXPIRY_POLICY === 'committed' ? 'committed' : 'speculative';

export const LEDGER_CONFIG = {
  expiryPolicy: EXPIRY_POLICY,
  publishEvents: process.env.LEDGER_PUBLISH_EVENTS !== 'false',
  persistence: process.env.LEDGER_PERSISTENCE !== 'false',
  maxDescriptionLength: parseInt(process.env.LEDGER_MAX_DESCRIPTION_LENGTH || '500', 10),
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['JWT_SECRET', 'MONGODB_URI', 'REDIS_HOST', 'CORS_ORIGINS'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: new URL(MONGODB_URI).host, // Don't leak credentials
  redisHost: REDIS_HOST,
  expiryPolicy: LEDGER_CONFIG.expiryPolicy,
});
