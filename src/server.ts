import crypto from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { getConcurrencyLimits } from './concurrency/limits.js';
import { UnknownTargetError } from './errors/errors.js';
import { metrics as defaultMetrics, type Metrics } from './metrics/metrics.js';
import { logger as rootLogger, type Logger } from './observability/logger.js';
import type { DistributedSemaphore, IdempotencyStore, OutcomeStore } from './persistence/types.js';
import type { ReleaseService } from './pipeline/service.js';
import { captureRawBody, createWebhookHandler } from './webhook/handler.js';

export interface AppDependencies {
  service: ReleaseService;
  idempotency: IdempotencyStore;
  semaphore: DistributedSemaphore;
  history: OutcomeStore;
  webhookSecret?: string;
  adminToken?: string;
  repository?: string;
  maxConcurrentReleases?: number;
  redisEnabled?: boolean;
  metrics?: Metrics;
  logger?: Logger;
}

const rerunSchema = z.object({
  ref: z.string().min(1),
  targets: z.array(z.string().min(1)).optional(),
});

function tokensMatch(received: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(received).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export function createApp(deps: AppDependencies): express.Express {
  const metrics = deps.metrics ?? defaultMetrics;
  const logger = deps.logger ?? rootLogger;
  const app = express();

  app.use(express.json({ verify: captureRawBody, limit: '5mb' }));

  const requireAdmin = (req: Request, res: Response, next: NextFunction) => {
    if (!deps.adminToken) {
      res.status(403).json({ error: 'Operator endpoints are disabled' });
      return;
    }
    const authorization = req.headers.authorization ?? '';
    const token = authorization.startsWith('Bearer ') ? authorization.slice('Bearer '.length) : '';
    if (!token || !tokensMatch(token, deps.adminToken)) {
      logger.warn('admin_auth', 'Rejected operator request', { path: req.path });
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };

  const webhookHandler = createWebhookHandler({
    service: deps.service,
    idempotency: deps.idempotency,
    secret: deps.webhookSecret,
    repository: deps.repository,
    metrics,
    logger,
  });

  app.post('/webhook', async (req, res, next) => {
    try {
      await webhookHandler(req, res);
    } catch (error) {
      logger.error('webhook_error', 'Unhandled webhook error', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      next(error);
    }
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/metrics', async (_req, res) => {
    try {
      const snapshot = await metrics.snapshot(deps.semaphore, deps.idempotency, deps.redisEnabled);
      res.status(200).json({
        ...snapshot,
        limits: getConcurrencyLimits({ MAX_CONCURRENT_RELEASES: deps.maxConcurrentReleases }),
      });
    } catch (error) {
      logger.error('metrics_error', 'Failed to generate metrics snapshot', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  });

  app.get('/releases', async (req, res) => {
    try {
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) || 50 : 50;
      const actualLimit = Math.min(Math.max(1, limit), 100);

      const outcomes = await deps.history.getRecent(actualLimit);
      const stats = await deps.history.getStats();

      res.status(200).json({
        active: deps.service.activeRuns(),
        releases: outcomes,
        meta: {
          count: outcomes.length,
          limit: actualLimit,
          total: stats.count,
          maxSize: stats.maxSize,
          storageType: stats.type,
        },
      });
    } catch (error) {
      logger.error('releases_error', 'Failed to retrieve release history', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      res.status(500).json({ error: 'Failed to retrieve releases' });
    }
  });

  app.post('/releases/rerun', requireAdmin, async (req, res) => {
    const parsed = rerunSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request',
        issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
      });
      return;
    }

    try {
      const started = await deps.service.start(parsed.data.ref, parsed.data.targets);
      if (started.status === 'saturated') {
        res.status(429).json({ error: 'Release capacity exhausted, retry later' });
        return;
      }
      res.status(202).json({ message: 'Release started', runId: started.runId });
    } catch (error) {
      if (error instanceof UnknownTargetError) {
        res.status(400).json({ error: error.message, unknown: error.unknown, known: error.known });
        return;
      }
      logger.error('rerun_error', 'Failed to start re-run', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      res.status(500).json({ error: 'Failed to start release' });
    }
  });

  app.post('/releases/:runId/cancel', requireAdmin, (req, res) => {
    const { runId } = req.params;
    if (!deps.service.cancel(runId)) {
      res.status(404).json({ error: 'No active run with that id', runId });
      return;
    }
    res.status(202).json({ message: 'Cancellation requested', runId });
  });

  app.get('/releases/:runId', async (req, res) => {
    const { runId } = req.params;
    try {
      const active = deps.service.activeRuns().find(run => run.runId === runId);
      if (active) {
        res.status(200).json({ status: 'running', run: active });
        return;
      }

      const outcome = await deps.service.findOutcome(runId);
      if (!outcome) {
        res.status(404).json({ error: 'Release not found', runId });
        return;
      }
      res.status(200).json(outcome);
    } catch (error) {
      logger.error('releases_error', 'Failed to retrieve release', {
        error: error instanceof Error ? error.message : 'Unknown error',
        runId,
      });
      res.status(500).json({ error: 'Failed to retrieve release' });
    }
  });

  return app;
}
