import { getRedisClient, isRedisHealthy } from '../persistence/redis-client.js';
import { logger } from '../observability/logger.js';
import type { OutcomeStore } from '../persistence/types.js';
import type { ReleaseOutcome, ReleaseStatus } from '../types.js';

const MAX_IN_MEMORY_OUTCOMES = 100;
const MAX_REDIS_OUTCOMES = 500;
const REDIS_KEY = 'releases:history';

const STATUSES: ReadonlySet<string> = new Set<ReleaseStatus>(['rejected', 'success', 'partial', 'failed', 'aborted']);

function isReleaseOutcome(value: unknown): value is ReleaseOutcome {
  if (typeof value !== 'object' || value === null) return false;
  return 'runId' in value && typeof value.runId === 'string'
    && 'ref' in value && typeof value.ref === 'string'
    && 'status' in value && typeof value.status === 'string' && STATUSES.has(value.status)
    && 'published' in value && Array.isArray(value.published)
    && 'failed' in value && typeof value.failed === 'object' && value.failed !== null
    && 'targets' in value && Array.isArray(value.targets);
}

function parseOutcome(serialized: string): ReleaseOutcome | null {
  try {
    const parsed: unknown = JSON.parse(serialized);
    return isReleaseOutcome(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

class InMemoryOutcomeHistory {
  private outcomes: ReleaseOutcome[] = [];

  append(outcome: ReleaseOutcome): void {
    this.outcomes.push(outcome);

    if (this.outcomes.length > MAX_IN_MEMORY_OUTCOMES) {
      this.outcomes.shift();
    }
  }

  getRecent(limit: number = 50): ReleaseOutcome[] {
    const actualLimit = Math.min(limit, this.outcomes.length);
    return this.outcomes.slice(this.outcomes.length - actualLimit).reverse();
  }

  getStats(): { count: number; maxSize: number; type: 'memory' } {
    return {
      count: this.outcomes.length,
      maxSize: MAX_IN_MEMORY_OUTCOMES,
      type: 'memory',
    };
  }
}

class RedisOutcomeHistory {
  async append(outcome: ReleaseOutcome): Promise<void> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      logger.warn('outcome_history_degraded', 'Redis unavailable, outcome not persisted', {
        runId: outcome.runId,
      });
      return;
    }

    try {
      await redis.lpush(REDIS_KEY, JSON.stringify(outcome));
      await redis.ltrim(REDIS_KEY, 0, MAX_REDIS_OUTCOMES - 1);
    } catch (error) {
      logger.error('outcome_history_error', 'Failed to append outcome to Redis', {
        error: error instanceof Error ? error.message : 'Unknown error',
        runId: outcome.runId,
      });
    }
  }

  async getRecent(limit: number = 50): Promise<ReleaseOutcome[]> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      return [];
    }

    try {
      const actualLimit = Math.min(limit, MAX_REDIS_OUTCOMES);
      const serialized = await redis.lrange(REDIS_KEY, 0, actualLimit - 1);
      return serialized
        .map(parseOutcome)
        .filter((outcome): outcome is ReleaseOutcome => outcome !== null);
    } catch (error) {
      logger.error('outcome_history_error', 'Failed to retrieve outcomes from Redis', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return [];
    }
  }

  async getStats(): Promise<{ count: number; maxSize: number; type: 'redis' }> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      return { count: 0, maxSize: MAX_REDIS_OUTCOMES, type: 'redis' };
    }

    try {
      const count = await redis.llen(REDIS_KEY);
      return { count, maxSize: MAX_REDIS_OUTCOMES, type: 'redis' };
    } catch (error) {
      logger.warn('outcome_history_error', 'Failed to read history length', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return { count: 0, maxSize: MAX_REDIS_OUTCOMES, type: 'redis' };
    }
  }
}

/**
 * Keeps the latest outcomes in process and, when Redis is configured, in a
 * capped list shared by every instance. Reads prefer Redis while it is healthy.
 */
export class HybridOutcomeHistory implements OutcomeStore {
  private inMemory = new InMemoryOutcomeHistory();
  private redis = new RedisOutcomeHistory();

  constructor(private readonly useRedis: boolean) {}

  async append(outcome: ReleaseOutcome): Promise<void> {
    this.inMemory.append(outcome);

    if (this.useRedis) {
      await this.redis.append(outcome);
    }
  }

  async getRecent(limit: number = 50): Promise<ReleaseOutcome[]> {
    if (this.useRedis && isRedisHealthy()) {
      return await this.redis.getRecent(limit);
    }
    return this.inMemory.getRecent(limit);
  }

  async getStats(): Promise<{ count: number; maxSize: number; type: 'memory' | 'redis' }> {
    if (this.useRedis && isRedisHealthy()) {
      return await this.redis.getStats();
    }
    return this.inMemory.getStats();
  }
}

export function createOutcomeHistory(useRedis: boolean): OutcomeStore {
  return new HybridOutcomeHistory(useRedis);
}
