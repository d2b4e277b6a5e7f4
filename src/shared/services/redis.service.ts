/**
 * =============================================================================
 * REDIS SERVICE - Key/value layer for locks, rate limits and caches
 * =============================================================================
 *
 * WHAT THIS DOES:
 * - Provides a unified Redis interface for all services
 * - Falls back to in-memory when Redis is unavailable (dev mode, tests)
 *
 * FEATURES:
 * 1. BASIC OPERATIONS     - get, set, delete, exists (with TTL)
 * 2. JSON CACHE           - getJSON (schema-checked), setJSON
 * 3. DISTRIBUTED LOCKS    - acquireLock, releaseLock, withLock (rating recompute)
 * 4. RATE LIMITING        - checkRateLimit (rating submissions)
 *
 * USAGE:
 * ```typescript
 * import { redisService } from './redis.service';
 *
 * await redisService.set('key', 'value', 300); // 5 min TTL
 * const value = await redisService.get('key');
 *
 * await redisService.withLock('rating:provider:p1', holderId, 10, async () => {
 *   // serialized per provider
 * });
 * ```
 * =============================================================================
 */

import Redis from 'ioredis';
import type { ZodType } from 'zod';
import { logger } from './logger.service';
import { DependencyError } from '../../core/errors/AppError';
import { ErrorCode } from '../../core/constants';

// =============================================================================
// TYPES
// =============================================================================

interface LockResult {
  acquired: boolean;
  ttl?: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetIn: number;
}

export interface LockOptions {
  retries?: number;
  retryDelayMs?: number;
}

// =============================================================================
// REDIS CLIENT INTERFACE (allows swapping implementations)
// =============================================================================

interface IRedisClient {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** SET NX with expiry. Resolves true when the key was written. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  /** Delete only when the stored value matches. */
  deleteIfEquals(key: string, expected: string): Promise<boolean>;
  del(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  ttl(key: string): Promise<number>;
  incrBy(key: string, delta: number): Promise<number>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION (Development / Tests / Fallback)
// =============================================================================

interface MemoryEntry {
  value: string;
  expiresAt?: number;
}

class InMemoryRedisClient implements IRedisClient {
  private store = new Map<string, MemoryEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor() {
    // Cleanup expired keys every 10 seconds; never keeps the process alive
    this.cleanupInterval = setInterval(() => this.cleanup(), 10000);
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.expiresAt && now > entry.expiresAt) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`[Redis] Cleanup: removed ${cleaned} expired keys`);
    }
  }

  private live(key: string): MemoryEntry | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }

  async connect(): Promise<void> {
    logger.info('[Redis] In-memory mode - no connection needed');
  }

  async disconnect(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
  }

  isConnected(): boolean {
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const entry: MemoryEntry = { value };
    if (ttlSeconds && ttlSeconds > 0) {
      entry.expiresAt = Date.now() + (ttlSeconds * 1000);
    }
    this.store.set(key, entry);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) return false;
    await this.set(key, value, ttlSeconds);
    return true;
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== expected) return false;
    return this.store.delete(key);
  }

  async del(key: string): Promise<boolean> {
    return this.store.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = Date.now() + (ttlSeconds * 1000);
    return true;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (!entry.expiresAt) return -1;
    return Math.ceil((entry.expiresAt - Date.now()) / 1000);
  }

  async incrBy(key: string, delta: number): Promise<number> {
    const entry = this.live(key);
    const value = (entry ? parseInt(entry.value, 10) || 0 : 0) + delta;

    if (entry) {
      entry.value = value.toString();
    } else {
      this.store.set(key, { value: value.toString() });
    }

    return value;
  }
}

// =============================================================================
// REAL REDIS IMPLEMENTATION (Production)
// =============================================================================

const RELEASE_IF_HOLDER_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
else
  return 0
end
`;

class RealRedisClient implements IRedisClient {
  private client: Redis;
  private connected = false;

  constructor(url: string, private connectionTimeoutMs: number) {
    this.client = new Redis(url, {
      lazyConnect: true,
      maxRetriesPerRequest: 3,
      connectTimeout: connectionTimeoutMs,
      // Reject commands while disconnected instead of queueing forever
      enableOfflineQueue: false,
      tls: url.startsWith('rediss://') ? {} : undefined,
    });

    this.client.on('ready', () => {
      this.connected = true;
      logger.info('[Redis] Client ready');
    });
    this.client.on('error', (err: Error) => {
      logger.error(`[Redis] Error: ${err.message}`);
    });
    this.client.on('close', () => {
      this.connected = false;
      logger.warn('[Redis] Connection closed');
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
    this.connected = true;
    logger.info(`[Redis] Connected (timeout ${this.connectionTimeoutMs}ms)`);
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
    this.connected = false;
    logger.info('[Redis] Disconnected');
  }

  isConnected(): boolean {
    return this.connected;
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.client.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.client.set(key, value);
    }
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.client.set(key, value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const result = await this.client.eval(RELEASE_IF_HOLDER_SCRIPT, 1, key, expected);
    return result === 1;
  }

  async del(key: string): Promise<boolean> {
    return (await this.client.del(key)) > 0;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) === 1;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return (await this.client.expire(key, ttlSeconds)) === 1;
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  async incrBy(key: string, delta: number): Promise<number> {
    return this.client.incrby(key, delta);
  }
}

// =============================================================================
// REDIS SERVICE
// =============================================================================

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class RedisService {
  private client: IRedisClient;
  private initialized = false;
  private useRedis = false;

  constructor() {
    // In-memory by default
    this.client = new InMemoryRedisClient();
  }

  /**
   * Initialize Redis connection
   * Call this at server startup
   */
  async initialize(options: { enabled: boolean; url: string; isProduction: boolean }): Promise<void> {
    if (this.initialized) return;

    if (options.enabled) {
      try {
        const realClient = new RealRedisClient(options.url, 10000);
        await realClient.connect();

        await this.client.disconnect();
        this.client = realClient;
        this.useRedis = true;
        logger.info('[Redis] Production Redis connected successfully');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`[Redis] Failed to connect to Redis: ${message}`);
        if (options.isProduction) {
          throw new DependencyError('Redis connection failed', ErrorCode.DEPENDENCY_UNAVAILABLE, true);
        }
        logger.warn('[Redis] Connection failed, falling back to in-memory mode');
      }
    } else {
      if (options.isProduction) {
        throw new Error('Redis is required in production mode');
      }
      logger.info('[Redis] Using in-memory storage (set REDIS_ENABLED=true for production)');
    }

    this.initialized = true;
  }

  isRedisEnabled(): boolean {
    return this.useRedis;
  }

  isConnected(): boolean {
    return this.client.isConnected();
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
    this.initialized = false;
  }

  // ===========================================================================
  // BASIC OPERATIONS
  // ===========================================================================

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    return this.client.set(key, value, ttlSeconds);
  }

  async del(key: string): Promise<boolean> {
    return this.client.del(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.client.exists(key);
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  // ===========================================================================
  // JSON CACHE
  // ===========================================================================

  /**
   * Read a cached JSON value. Entries that no longer match the schema are
   * dropped and reported as a miss.
   */
  async getJSON<T>(key: string, schema: ZodType<T>): Promise<T | null> {
    const raw = await this.client.get(key);
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      await this.client.del(key);
      return null;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      await this.client.del(key);
      return null;
    }
    return result.data;
  }

  async setJSON(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    await this.client.set(key, JSON.stringify(value), ttlSeconds);
  }

  // ===========================================================================
  // RATE LIMITING
  // ===========================================================================

  /**
   * INCR, setting the expiry on the first hit of a window
   */
  async incrementWithTTL(key: string, windowSeconds: number): Promise<number> {
    const count = await this.client.incrBy(key, 1);
    if (count === 1) {
      await this.client.expire(key, windowSeconds);
    }
    return count;
  }

  async incrBy(key: string, delta: number): Promise<number> {
    return this.client.incrBy(key, delta);
  }

  /**
   * Fixed-window counter: INCR, EXPIRE on first hit
   */
  async checkRateLimit(key: string, limit: number, windowSeconds: number): Promise<RateLimitResult> {
    const count = await this.incrementWithTTL(key, windowSeconds);
    const ttl = await this.client.ttl(key);

    return {
      allowed: count <= limit,
      remaining: Math.max(0, limit - count),
      resetIn: ttl > 0 ? ttl : windowSeconds
    };
  }

  // ===========================================================================
  // DISTRIBUTED LOCKS
  // ===========================================================================

  /**
   * Acquire a lock (SET NX with expiry). Re-entrant for the same holder.
   */
  async acquireLock(lockKey: string, holderId: string, ttlSeconds: number): Promise<LockResult> {
    const key = `lock:${lockKey}`;

    if (await this.client.setIfAbsent(key, holderId, ttlSeconds)) {
      return { acquired: true, ttl: ttlSeconds };
    }

    if ((await this.client.get(key)) === holderId) {
      await this.client.expire(key, ttlSeconds);
      return { acquired: true, ttl: ttlSeconds };
    }

    return { acquired: false };
  }

  /**
   * Release a lock. Only releases if the holder matches.
   */
  async releaseLock(lockKey: string, holderId: string): Promise<boolean> {
    return this.client.deleteIfEquals(`lock:${lockKey}`, holderId);
  }

  /**
   * Run `work` while holding `lockKey`, retrying acquisition with a fixed
   * delay. Throws DependencyError when the lock stays taken.
   */
  async withLock<T>(
    lockKey: string,
    holderId: string,
    ttlSeconds: number,
    work: () => Promise<T>,
    options: LockOptions = {}
  ): Promise<T> {
    const retries = options.retries ?? 20;
    const retryDelayMs = options.retryDelayMs ?? 50;

    let lock = await this.acquireLock(lockKey, holderId, ttlSeconds);
    for (let attempt = 0; !lock.acquired && attempt < retries; attempt++) {
      await sleep(retryDelayMs);
      lock = await this.acquireLock(lockKey, holderId, ttlSeconds);
    }

    if (!lock.acquired) {
      throw new DependencyError(
        'Resource is busy, please retry',
        ErrorCode.LOCK_NOT_ACQUIRED,
        true,
        { lockKey }
      );
    }

    try {
      return await work();
    } finally {
      await this.releaseLock(lockKey, holderId).catch((error: unknown) => {
        logger.warn('[Redis] Lock release failed', {
          lockKey,
          error: error instanceof Error ? error.message : String(error)
        });
      });
    }
  }
}

export const redisService = new RedisService();
