import { DeliveryIdentity, IdempotencyEntry } from './types.js';
import type { IdempotencyStore } from '../persistence/types.js';
import { getRedisClient, isRedisHealthy } from '../persistence/redis-client.js';
import { logger } from '../observability/logger.js';

const MAX_ENTRIES = 1000;
const TTL_MS = 3600000;
const TTL_SECONDS = 3600;

export function deliveryKey(identity: DeliveryIdentity): string {
  return `${identity.deliveryId}:${identity.ref}:${identity.afterSha}`;
}

export class InMemoryIdempotencyGuard implements IdempotencyStore {
  private entries: Map<string, IdempotencyEntry> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  async checkAndMark(key: string): Promise<{ status: 'new' | 'duplicate_recent'; firstSeenAt?: Date }> {
    this.evictExpired();

    const existing = this.entries.get(key);

    if (existing) {
      existing.lastSeenAt = new Date(this.now());
      existing.count++;

      return {
        status: 'duplicate_recent',
        firstSeenAt: existing.firstSeenAt,
      };
    }

    if (this.entries.size >= MAX_ENTRIES) {
      this.evictOldest();
    }

    this.entries.set(key, {
      key,
      firstSeenAt: new Date(this.now()),
      lastSeenAt: new Date(this.now()),
      count: 1,
    });

    return { status: 'new' };
  }

  async forget(key: string): Promise<void> {
    this.entries.delete(key);
  }

  private evictExpired(): void {
    const now = this.now();

    for (const [key, entry] of this.entries.entries()) {
      if (now - entry.lastSeenAt.getTime() > TTL_MS) {
        this.entries.delete(key);
      }
    }
  }

  private evictOldest(): void {
    // Map iteration follows insertion order.
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
    }
  }

  getStats(): { size: number; maxSize: number; ttlMs: number; type: 'redis' | 'memory' } {
    return {
      size: this.entries.size,
      maxSize: MAX_ENTRIES,
      ttlMs: TTL_MS,
      type: 'memory',
    };
  }
}

export class RedisIdempotencyGuard implements IdempotencyStore {
  async checkAndMark(key: string): Promise<{ status: 'new' | 'duplicate_recent'; firstSeenAt?: Date }> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      logger.warn('idempotency_degraded', 'Redis unavailable, cannot enforce distributed idempotency', {
        key,
      });
      return { status: 'new' };
    }

    try {
      const redisKey = `idem:${key}`;
      const result = await redis.set(redisKey, '1', 'EX', TTL_SECONDS, 'NX');

      if (result === null) {
        const ttl = await redis.ttl(redisKey);
        const firstSeenAt = new Date(Date.now() - ((TTL_SECONDS - ttl) * 1000));

        return {
          status: 'duplicate_recent',
          firstSeenAt,
        };
      }

      return { status: 'new' };
    } catch (error) {
      logger.error('idempotency_redis_error', 'Redis operation failed, failing open', {
        error: error instanceof Error ? error.message : 'Unknown error',
        key,
      });
      return { status: 'new' };
    }
  }

  async forget(key: string): Promise<void> {
    const redis = getRedisClient();
    if (!redis || !isRedisHealthy()) {
      return;
    }

    try {
      await redis.del(`idem:${key}`);
    } catch (error) {
      logger.error('idempotency_redis_error', 'Failed to forget idempotency key', {
        error: error instanceof Error ? error.message : 'Unknown error',
        key,
      });
    }
  }

  getStats(): { size: number; maxSize: number; ttlMs: number; type: 'redis' | 'memory' } {
    return {
      size: 0,
      maxSize: 0,
      ttlMs: TTL_MS,
      type: 'redis',
    };
  }
}

/** Call after initializeRedis; the choice of backend is made once. */
export function createIdempotencyGuard(): IdempotencyStore {
  if (getRedisClient()) {
    logger.info('idempotency_initialization', 'Using Redis-backed idempotency guard');
    return new RedisIdempotencyGuard();
  }
  logger.info('idempotency_initialization', 'Using in-memory idempotency guard');
  return new InMemoryIdempotencyGuard();
}
