import type Redis from 'ioredis';
import { getRedisClient, isRedisHealthy } from '../persistence/redis-client.js';
import { logger } from '../observability/logger.js';
import { safeCheckInvariants } from '../invariants/checker.js';
import type { DistributedSemaphore } from '../persistence/types.js';

/** Non-blocking counting semaphore; callers that miss a permit shed load instead of queueing. */
export class InMemorySemaphore implements DistributedSemaphore {
  private permits: number;
  private maxPermits: number;
  private currentInFlight: number = 0;
  private peakInFlight: number = 0;

  constructor(maxPermits: number) {
    if (maxPermits <= 0) {
      throw new Error('Semaphore maxPermits must be > 0');
    }
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  async tryAcquire(): Promise<boolean> {
    if (this.permits > 0) {
      this.permits--;
      this.currentInFlight++;
      if (this.currentInFlight > this.peakInFlight) {
        this.peakInFlight = this.currentInFlight;
      }

      this.checkPermits();
      return true;
    }
    return false;
  }

  async release(): Promise<void> {
    if (this.currentInFlight === 0) {
      logger.warn('semaphore_release', 'Release without a matching acquire ignored');
      return;
    }

    this.currentInFlight--;
    this.permits++;
    this.checkPermits();
  }

  async getInFlight(): Promise<number> {
    return this.currentInFlight;
  }

  getPeak(): number {
    return this.peakInFlight;
  }

  async getAvailable(): Promise<number> {
    return this.permits;
  }

  private checkPermits(): void {
    safeCheckInvariants({
      semaphorePermits: this.permits,
      semaphoreInFlight: this.currentInFlight,
      semaphoreMaxPermits: this.maxPermits,
    }, ['SEMAPHORE_PERMITS_NON_NEGATIVE', 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED']);
  }
}

// Take a permit only while the shared count stays within the limit.
const ACQUIRE_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count > tonumber(ARGV[1]) then
  redis.call('DECR', KEYS[1])
  return 0
end
redis.call('EXPIRE', KEYS[1], ARGV[2])
return 1
`;

const RELEASE_SCRIPT = `
if tonumber(redis.call('GET', KEYS[1]) or '0') > 0 then
  return redis.call('DECR', KEYS[1])
end
return 0
`;

/**
 * Permit counter shared by every service instance. The key's TTL outlives the
 * longest run, so a crashed holder cannot pin a permit forever. While Redis is
 * unreachable, acquisition fails open: releases keep flowing, unbounded.
 */
export class RedisSemaphore implements DistributedSemaphore {
  private readonly key: string;
  /** Permits held by this instance; the peak is reported per instance. */
  private held = 0;
  private peakHeld = 0;

  constructor(
    name: string,
    private readonly maxPermits: number,
    private readonly ttlSeconds: number = 3600
  ) {
    this.key = `sem:${name}`;
  }

  async tryAcquire(): Promise<boolean> {
    const granted = await this.withRedis('tryAcquire', true, async redis => {
      const result: unknown = await redis.eval(ACQUIRE_SCRIPT, 1, this.key, this.maxPermits, this.ttlSeconds);
      return result === 1;
    });
    if (granted) {
      this.held++;
      this.peakHeld = Math.max(this.peakHeld, this.held);
    }
    return granted;
  }

  async release(): Promise<void> {
    this.held = Math.max(0, this.held - 1);
    await this.withRedis<void>('release', undefined, async redis => {
      await redis.eval(RELEASE_SCRIPT, 1, this.key);
    });
  }

  async getInFlight(): Promise<number> {
    return this.withRedis('getInFlight', 0, async redis => Number((await redis.get(this.key)) ?? 0));
  }

  getPeak(): number {
    return this.peakHeld;
  }

  async getAvailable(): Promise<number> {
    return Math.max(0, this.maxPermits - (await this.getInFlight()));
  }

  private async withRedis<T>(operation: string, fallback: T, action: (redis: Redis) => Promise<T>): Promise<T> {
    const redis = getRedisClient();
    if (!redis || !isRedisHealthy()) {
      return fallback;
    }
    try {
      return await action(redis);
    } catch (error) {
      logger.error('semaphore_redis_error', 'Redis semaphore operation failed', {
        operation,
        key: this.key,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return fallback;
    }
  }
}

export function createReleaseSemaphore(maxPermits: number): DistributedSemaphore {
  if (getRedisClient()) {
    logger.info('semaphore_initialization', 'Using Redis-backed release semaphore', { maxPermits });
    return new RedisSemaphore('releases', maxPermits);
  }
  logger.info('semaphore_initialization', 'Using in-memory release semaphore', { maxPermits });
  return new InMemorySemaphore(maxPermits);
}
