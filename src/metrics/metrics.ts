import { isRedisHealthy } from '../persistence/redis-client.js';
import type { DistributedSemaphore, IdempotencyStore } from '../persistence/types.js';
import type { ErrorKind, ReleaseOutcome } from '../types.js';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  redis: {
    enabled: boolean;
    healthy: boolean;
    mode: 'distributed' | 'degraded' | 'single-instance';
  };
  releases: {
    total: number;
    rejected: number;
    success: number;
    partial: number;
    failed: number;
    aborted: number;
    loadShed: number;
  };
  targets: {
    published: number;
    buildFailures: number;
    verificationFailures: number;
    publishFailures: number;
    duplicateReleases: number;
  };
  webhooks: {
    received: number;
    ignored: number;
    duplicates: number;
  };
  concurrency: {
    releaseRuns: {
      inFlight: number;
      peak: number;
      available: number;
    };
  };
  idempotency: {
    guardSize: number;
    guardMaxSize: number;
    guardTTLMs: number;
    type: 'redis' | 'memory';
  };
}

export class Metrics {
  private startTime: Date = new Date();

  private counters = {
    releasesTotal: 0,
    releasesRejected: 0,
    releasesSuccess: 0,
    releasesPartial: 0,
    releasesFailed: 0,
    releasesAborted: 0,
    releasesLoadShed: 0,
    targetsPublished: 0,
    buildFailures: 0,
    verificationFailures: 0,
    publishFailures: 0,
    duplicateReleases: 0,
    webhooksReceived: 0,
    webhooksIgnored: 0,
    webhooksDuplicate: 0,
  };

  recordOutcome(outcome: ReleaseOutcome): void {
    this.counters.releasesTotal++;

    switch (outcome.status) {
      case 'rejected':
        this.counters.releasesRejected++;
        break;
      case 'success':
        this.counters.releasesSuccess++;
        break;
      case 'partial':
        this.counters.releasesPartial++;
        break;
      case 'failed':
        this.counters.releasesFailed++;
        break;
      case 'aborted':
        this.counters.releasesAborted++;
        break;
    }

    this.counters.targetsPublished += outcome.published.length;
    for (const error of Object.values(outcome.failed)) {
      this.recordTargetFailure(error.kind);
    }
  }

  private recordTargetFailure(kind: ErrorKind): void {
    switch (kind) {
      case 'BuildFailure':
        this.counters.buildFailures++;
        break;
      case 'VerificationFailure':
        this.counters.verificationFailures++;
        break;
      case 'PublishFailure':
        this.counters.publishFailures++;
        break;
      case 'DuplicateRelease':
        this.counters.duplicateReleases++;
        break;
    }
  }

  recordLoadShed(): void {
    this.counters.releasesLoadShed++;
  }

  recordWebhookReceived(): void {
    this.counters.webhooksReceived++;
  }

  recordWebhookIgnored(): void {
    this.counters.webhooksIgnored++;
  }

  recordDuplicateWebhook(): void {
    this.counters.webhooksDuplicate++;
  }

  async snapshot(
    releaseSemaphore?: DistributedSemaphore,
    idempotencyGuard?: IdempotencyStore,
    redisEnabled?: boolean
  ): Promise<MetricsSnapshot> {
    const uptimeMs = Date.now() - this.startTime.getTime();
    const uptimeSeconds = Math.floor(uptimeMs / 1000);

    const idempotencyStats = idempotencyGuard?.getStats() ?? { size: 0, maxSize: 0, ttlMs: 0, type: 'memory' as const };
    const redisHealthy = isRedisHealthy();

    let redisMode: 'distributed' | 'degraded' | 'single-instance' = 'single-instance';
    if (redisEnabled) {
      redisMode = redisHealthy ? 'distributed' : 'degraded';
    }

    const inFlight = releaseSemaphore ? await releaseSemaphore.getInFlight() : 0;
    const available = releaseSemaphore ? await releaseSemaphore.getAvailable() : 0;

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds,
      redis: {
        enabled: redisEnabled ?? false,
        healthy: redisHealthy,
        mode: redisMode,
      },
      releases: {
        total: this.counters.releasesTotal,
        rejected: this.counters.releasesRejected,
        success: this.counters.releasesSuccess,
        partial: this.counters.releasesPartial,
        failed: this.counters.releasesFailed,
        aborted: this.counters.releasesAborted,
        loadShed: this.counters.releasesLoadShed,
      },
      targets: {
        published: this.counters.targetsPublished,
        buildFailures: this.counters.buildFailures,
        verificationFailures: this.counters.verificationFailures,
        publishFailures: this.counters.publishFailures,
        duplicateReleases: this.counters.duplicateReleases,
      },
      webhooks: {
        received: this.counters.webhooksReceived,
        ignored: this.counters.webhooksIgnored,
        duplicates: this.counters.webhooksDuplicate,
      },
      concurrency: {
        releaseRuns: {
          inFlight,
          peak: releaseSemaphore?.getPeak() ?? 0,
          available,
        },
      },
      idempotency: {
        guardSize: idempotencyStats.size,
        guardMaxSize: idempotencyStats.maxSize,
        guardTTLMs: idempotencyStats.ttlMs,
        type: idempotencyStats.type,
      },
    };
  }
}

export const metrics = new Metrics();
