import type { IncomingMessage } from 'http';
import { Request, Response } from 'express';
import crypto from 'crypto';
import { z } from 'zod';
import { deliveryKey } from '../idempotency/guard.js';
import { metrics as defaultMetrics, type Metrics } from '../metrics/metrics.js';
import { logger as rootLogger, type Logger } from '../observability/logger.js';
import type { IdempotencyStore } from '../persistence/types.js';
import type { ReleaseService } from '../pipeline/service.js';

/** Raw request bodies, captured by express.json's verify hook; the signature covers these exact bytes. */
const rawBodies = new WeakMap<IncomingMessage, Buffer>();

export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function signPayload(payload: string | Buffer, secret: string): string {
  return 'sha256=' + crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

export function verifySignature(payload: Buffer, signature: string, secret: string): boolean {
  const expected = Buffer.from(signPayload(payload, secret));
  const received = Buffer.from(signature);
  return received.length === expected.length && crypto.timingSafeEqual(received, expected);
}

const pushPayloadSchema = z.object({
  ref: z.string().min(1),
  after: z.string().default(''),
  deleted: z.boolean().default(false),
  repository: z
    .object({
      full_name: z.string(),
    })
    .optional(),
});

export interface WebhookDependencies {
  service: ReleaseService;
  idempotency: IdempotencyStore;
  secret?: string;
  /** When set, pushes from any other repository are ignored. */
  repository?: string;
  metrics?: Metrics;
  logger?: Logger;
}

function header(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function createWebhookHandler(deps: WebhookDependencies) {
  const metrics = deps.metrics ?? defaultMetrics;
  const logger = deps.logger ?? rootLogger;

  return async function webhookHandler(req: Request, res: Response): Promise<void> {
    const signature = header(req, 'x-hub-signature-256');
    const event = header(req, 'x-github-event');
    const deliveryId = header(req, 'x-github-delivery') ?? 'unknown';

    if (!signature) {
      logger.warn('webhook_validation', 'Missing signature header', { deliveryId });
      res.status(401).json({ error: 'Missing signature' });
      return;
    }

    if (!deps.secret) {
      logger.error('webhook_validation', 'GITHUB_WEBHOOK_SECRET not configured');
      res.status(500).json({ error: 'Server misconfiguration' });
      return;
    }

    const raw = rawBodies.get(req) ?? Buffer.from(JSON.stringify(req.body ?? {}));
    if (!verifySignature(raw, signature, deps.secret)) {
      logger.warn('webhook_validation', 'Invalid signature', { deliveryId });
      res.status(401).json({ error: 'Invalid signature' });
      return;
    }

    metrics.recordWebhookReceived();

    if (event !== 'push') {
      logger.info('webhook_filtering', 'Non-push event ignored', { event, deliveryId });
      metrics.recordWebhookIgnored();
      res.status(200).json({ message: 'Event ignored' });
      return;
    }

    const parsed = pushPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn('webhook_validation', 'Push payload is malformed', {
        deliveryId,
        issues: parsed.error.issues.map(issue => issue.path.join('.')),
      });
      res.status(400).json({ error: 'Malformed push payload' });
      return;
    }

    const push = parsed.data;

    if (deps.repository && push.repository?.full_name !== deps.repository) {
      logger.info('webhook_filtering', 'Push from another repository ignored', {
        deliveryId,
        repository: push.repository?.full_name,
      });
      metrics.recordWebhookIgnored();
      res.status(200).json({ message: 'Repository ignored' });
      return;
    }

    if (push.deleted) {
      logger.info('webhook_filtering', 'Ref deletion ignored', { deliveryId, ref: push.ref });
      metrics.recordWebhookIgnored();
      res.status(200).json({ message: 'Deletion ignored' });
      return;
    }

    if (!push.ref.startsWith('refs/tags/')) {
      logger.info('webhook_filtering', 'Branch push ignored', { deliveryId, ref: push.ref });
      metrics.recordWebhookIgnored();
      res.status(200).json({ message: 'Not a tag push' });
      return;
    }

    const idempotencyKey = deliveryKey({ deliveryId, ref: push.ref, afterSha: push.after });
    const seen = await deps.idempotency.checkAndMark(idempotencyKey);
    if (seen.status === 'duplicate_recent') {
      logger.info('idempotency_guard', 'Duplicate delivery detected, skipping run', {
        idempotencyKey,
        firstSeenAt: seen.firstSeenAt?.toISOString(),
      });
      metrics.recordDuplicateWebhook();
      res.status(200).json({ message: 'Duplicate delivery', idempotencyKey });
      return;
    }

    const started = await deps.service.start(push.ref);
    if (started.status === 'saturated') {
      await deps.idempotency.forget(idempotencyKey);
      res.status(429).json({ error: 'Release capacity exhausted, redeliver later' });
      return;
    }

    logger.info('webhook_received', 'Release run accepted', {
      deliveryId,
      idempotencyKey,
      runId: started.runId,
    });
    res.status(202).json({ message: 'Release started', runId: started.runId, idempotencyKey });
  };
}
