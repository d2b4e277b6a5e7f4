/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates per client IP.
 *
 * - Redis-backed store when Redis is enabled, so every instance shares one
 *   counter; express-rate-limit's in-memory store otherwise
 * - Redis errors let the request through
 * =============================================================================
 */

import rateLimit, { ClientRateLimitInfo, Options, Store } from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode } from '../../core/constants';
import { redisService } from '../services/redis.service';
import { logger } from '../services/logger.service';

// =============================================================================
// REDIS RATE LIMIT STORE
// =============================================================================

/**
 * express-rate-limit Store over the shared Redis service
 *
 * - increment() -> INCR + EXPIRE on first hit
 * - decrement() -> INCRBY -1
 * - resetKey()  -> DEL
 */
export class RedisRateLimitStore implements Store {
  private windowMs: number;
  readonly prefix: string;

  constructor(windowMs: number, prefix: string = 'rl:') {
    this.windowMs = windowMs;
    this.prefix = prefix;
  }

  init(options: Options): void {
    this.windowMs = options.windowMs;
  }

  private getKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async increment(key: string): Promise<ClientRateLimitInfo> {
    const redisKey = this.getKey(key);
    const windowSeconds = Math.ceil(this.windowMs / 1000);

    try {
      const totalHits = await redisService.incrementWithTTL(redisKey, windowSeconds);
      const ttl = await redisService.ttl(redisKey);
      const resetTime = new Date(Date.now() + (ttl > 0 ? ttl * 1000 : this.windowMs));

      return { totalHits, resetTime };
    } catch (error: unknown) {
      logger.warn(`[RateLimit] Redis increment failed for ${key}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return { totalHits: 0, resetTime: new Date(Date.now() + this.windowMs) };
    }
  }

  async decrement(key: string): Promise<void> {
    try {
      await redisService.incrBy(this.getKey(key), -1);
    } catch (error: unknown) {
      logger.warn(`[RateLimit] Redis decrement failed for ${key}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  async resetKey(key: string): Promise<void> {
    try {
      await redisService.del(this.getKey(key));
    } catch (error: unknown) {
      logger.warn(`[RateLimit] Redis resetKey failed for ${key}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}

/**
 * Redis store when Redis is enabled, undefined (built-in memory store) otherwise
 */
function createStore(windowMs: number, name: string): Store | undefined {
  if (config.redis.enabled) {
    logger.info(`[RateLimit] Redis store enabled for "${name}" limiter`);
    return new RedisRateLimitStore(windowMs, `rl:${name}:`);
  }
  return undefined;
}

// =============================================================================
// RATE LIMITERS
// =============================================================================

/**
 * Default rate limiter for all API routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message: 'Too many requests. Please try again later.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  store: createStore(config.rateLimit.windowMs, 'global'),
  skip: () => config.isTest
});
