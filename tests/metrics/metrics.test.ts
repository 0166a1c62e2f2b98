import { InMemorySemaphore } from '../../src/concurrency/semaphore.js';
import { InMemoryIdempotencyGuard } from '../../src/idempotency/guard.js';
import { Metrics } from '../../src/metrics/metrics.js';
import type { ReleaseOutcome } from '../../src/types.js';

function outcome(overrides: Partial<ReleaseOutcome>): ReleaseOutcome {
  return {
    runId: 'run',
    ref: 'v2.3.0',
    status: 'success',
    published: [],
    failed: {},
    targets: [],
    stateHistory: [],
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:01:00.000Z',
    ...overrides,
  };
}

describe('Metrics', () => {
  test('counts releases by status and failures by kind', async () => {
    const metrics = new Metrics();

    metrics.recordOutcome(outcome({ status: 'success', published: ['package', 'exe-linux'] }));
    metrics.recordOutcome(
      outcome({
        status: 'partial',
        published: ['exe-linux'],
        failed: {
          package: { kind: 'DuplicateRelease', code: 'already_exists', message: 'already on the index' },
          'exe-macos': { kind: 'VerificationFailure', code: 'timeout', message: 'too slow' },
        },
      })
    );
    metrics.recordOutcome(outcome({ status: 'rejected' }));
    metrics.recordLoadShed();

    const snapshot = await metrics.snapshot();

    expect(snapshot.releases).toEqual({
      total: 3,
      rejected: 1,
      success: 1,
      partial: 1,
      failed: 0,
      aborted: 0,
      loadShed: 1,
    });
    expect(snapshot.targets).toEqual({
      published: 3,
      buildFailures: 0,
      verificationFailures: 1,
      publishFailures: 0,
      duplicateReleases: 1,
    });
    expect(snapshot.redis).toEqual({ enabled: false, healthy: false, mode: 'single-instance' });
  });

  test('reports concurrency and idempotency state', async () => {
    const metrics = new Metrics();
    const semaphore = new InMemorySemaphore(2);
    const guard = new InMemoryIdempotencyGuard();
    await semaphore.tryAcquire();
    await semaphore.tryAcquire();
    await semaphore.release();
    await guard.checkAndMark('d-1:refs/tags/v2.3.0:abc');
    metrics.recordWebhookReceived();
    metrics.recordWebhookIgnored();
    metrics.recordDuplicateWebhook();

    const snapshot = await metrics.snapshot(semaphore, guard, true);

    expect(snapshot.concurrency.releaseRuns).toEqual({ inFlight: 1, peak: 2, available: 1 });
    expect(snapshot.idempotency).toEqual({ guardSize: 1, guardMaxSize: 1000, guardTTLMs: 3_600_000, type: 'memory' });
    expect(snapshot.webhooks).toEqual({ received: 1, ignored: 1, duplicates: 1 });
    expect(snapshot.redis.mode).toBe('degraded');
  });
});
