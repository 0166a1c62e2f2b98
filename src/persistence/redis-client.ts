import Redis from 'ioredis';
import { logger } from '../observability/logger.js';

/** Every key tagship writes lives under this prefix. */
const KEY_PREFIX = 'tagship:';

let redisClient: Redis | null = null;
let healthy = false;

// ioredis errors can echo the connection URL, password included.
function redactUrl(message: string): string {
  return message.replace(/\/\/[^@/]*@/g, '//***@');
}

/** Up to three reconnects with a linear backoff, then give up and stay degraded. */
function reconnectDelay(attempt: number): number | null {
  if (attempt > 3) {
    logger.error('redis_connection', 'Giving up on Redis', { attempt });
    return null;
  }
  return Math.min(attempt * 200, 2000);
}

/** Connects when REDIS_URL is set; without it every store stays in memory. */
export function initializeRedis(url?: string): void {
  if (!url) {
    logger.info('redis_initialization', 'REDIS_URL not set, state stays in memory');
    return;
  }

  try {
    const client = new Redis(url, {
      keyPrefix: KEY_PREFIX,
      connectTimeout: 5000,
      commandTimeout: 2000,
      maxRetriesPerRequest: 2,
      retryStrategy: reconnectDelay,
    });
    client.on('ready', () => {
      healthy = true;
      logger.info('redis_lifecycle', 'Redis ready', { keyPrefix: KEY_PREFIX });
    });
    client.on('error', (error: Error) => {
      healthy = false;
      logger.error('redis_lifecycle', 'Redis error', { error: redactUrl(error.message) });
    });
    client.on('close', () => {
      healthy = false;
    });
    redisClient = client;
  } catch (error) {
    logger.error('redis_initialization', 'Invalid Redis configuration, state stays in memory', {
      error: error instanceof Error ? redactUrl(error.message) : 'Unknown error',
    });
    redisClient = null;
  }
}

export function getRedisClient(): Redis | null {
  return redisClient;
}

export function isRedisHealthy(): boolean {
  return redisClient !== null && healthy;
}

export async function shutdownRedis(): Promise<void> {
  if (!redisClient) return;
  const client = redisClient;
  redisClient = null;
  healthy = false;
  await client.quit();
}
