/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires a proper JWT secret (validated at startup)
 * - Development uses an auto-generated secret if not provided
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getRequired() for mandatory production values
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    if (devDefault) {
      console.warn(`[CONFIG] ${key} not set, using development default`);
      return devDefault;
    }
    const generated = randomBytes(32).toString('hex');
    console.warn(`[CONFIG] ${key} not set, auto-generated for development`);
    return generated;
  }

  throw new Error(
    `FATAL: ${key} is required in production!\n` +
    `   Set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

const nodeEnv = getOptional('NODE_ENV', 'development');

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', 'localhost'),

  // JSON document store. Empty string keeps data in memory only.
  dataFile: getOptional('DATA_FILE', nodeEnv === 'test' ? '' : 'data/marketplace.json'),

  // Redis (locks, rate limits, rating cache)
  redis: {
    enabled: getBoolean('REDIS_ENABLED', false),
    url: getOptional('REDIS_URL', 'redis://localhost:6379'),
  },

  // JWT - callers arrive with a token issued by the auth service
  jwt: {
    secret: getRequired('JWT_SECRET'),
  },

  // Geocoding (Google Geocoding API). Disabled without a key.
  geocoding: {
    apiKey: getOptional('GEOCODING_API_KEY', ''),
    enabled: getOptional('GEOCODING_API_KEY', '').length > 0,
    timeoutMs: getNumber('GEOCODING_TIMEOUT_MS', 5000),
  },

  // Matching
  matching: {
    defaultLimit: getNumber('MATCHING_DEFAULT_LIMIT', 5),
    maxLimit: getNumber('MATCHING_MAX_LIMIT', 50),
  },

  // Booking
  booking: {
    // At most one pending/confirmed booking per provider, date and slot
    slotGuard: getBoolean('BOOKING_SLOT_GUARD', false),
  },

  // Rating
  rating: {
    lockTtlSeconds: getNumber('RATING_LOCK_TTL_SECONDS', 10),
    lockRetries: getNumber('RATING_LOCK_RETRIES', 20),
    lockRetryDelayMs: getNumber('RATING_LOCK_RETRY_DELAY_MS', 50),
    summaryCacheTtlSeconds: getNumber('RATING_CACHE_TTL_SECONDS', 300),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 100),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', nodeEnv === 'production' ? 'info' : 'debug'),

  // CORS
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
} as const;

export type AppConfig = typeof config;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.redis.enabled) {
      errors.push('REDIS_ENABLED must be true in production (rating locks are shared)');
    }

    if (!config.geocoding.enabled) {
      warnings.push('GEOCODING_API_KEY is not set - new addresses will have no location');
    }
  }

  if (config.matching.defaultLimit < 1 || config.matching.defaultLimit > config.matching.maxLimit) {
    errors.push('MATCHING_DEFAULT_LIMIT must be between 1 and MATCHING_MAX_LIMIT');
  }

  if (warnings.length > 0) {
    console.warn('\nConfiguration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
