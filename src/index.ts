import dotenv from 'dotenv';
import { createReleaseSemaphore } from './concurrency/semaphore.js';
import { getConcurrencyLimits } from './concurrency/limits.js';
import { loadEnv } from './config/env.js';
import { loadReleaseConfig } from './config/release-config.js';
import { ConfigError } from './errors/errors.js';
import { createOutcomeHistory } from './history/outcome-history.js';
import { createIdempotencyGuard } from './idempotency/guard.js';
import { logger } from './observability/logger.js';
import { initializeRedis, shutdownRedis } from './persistence/redis-client.js';
import { createReleaseOrchestrator } from './pipeline/factory.js';
import { ReleaseService } from './pipeline/service.js';
import { createApp } from './server.js';

dotenv.config();

async function main(): Promise<void> {
  const env = loadEnv();
  const config = loadReleaseConfig(env.RELEASE_CONFIG_PATH);
  const orchestrator = await createReleaseOrchestrator({ config, env });

  initializeRedis(env.REDIS_URL);
  const redisEnabled = !!env.REDIS_URL;

  const limits = getConcurrencyLimits(env);
  const semaphore = createReleaseSemaphore(limits.releaseRuns);
  const idempotency = createIdempotencyGuard();
  const history = createOutcomeHistory(redisEnabled);
  const service = new ReleaseService({ orchestrator, semaphore, history });

  const app = createApp({
    service,
    idempotency,
    semaphore,
    history,
    webhookSecret: env.GITHUB_WEBHOOK_SECRET,
    adminToken: env.ADMIN_TOKEN,
    repository: env.GITHUB_REPOSITORY,
    maxConcurrentReleases: limits.releaseRuns,
    redisEnabled,
  });

  const server = app.listen(env.PORT, () => {
    logger.info('startup', 'tagship listening', {
      port: env.PORT,
      mode: redisEnabled ? 'distributed (Redis)' : 'single-instance (in-memory)',
      targets: orchestrator.configuredTargets.map(target => target.name),
      maxConcurrentReleases: limits.releaseRuns,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('shutdown', `${signal} received, graceful shutdown`, {
      activeRuns: service.activeRuns().length,
    });
    server.close(() => {
      shutdownRedis()
        .catch(error => {
          logger.error('shutdown', 'Redis shutdown failed', {
            error: error instanceof Error ? error.message : 'Unknown error',
          });
        })
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  if (error instanceof ConfigError) {
    logger.error('startup', 'Configuration invalid, refusing to start', { error: error.message });
  } else {
    logger.error('startup', 'Startup failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  process.exit(1);
});
