import { RunCancelledError } from '../concurrency/deadline.js';
import { metrics as defaultMetrics, type Metrics } from '../metrics/metrics.js';
import { logger as rootLogger, generateRunId, type Logger } from '../observability/logger.js';
import type { DistributedSemaphore, OutcomeStore } from '../persistence/types.js';
import type { ReleaseOutcome } from '../types.js';
import type { ReleaseOrchestrator } from './orchestrator.js';

export interface ReleaseServiceDependencies {
  orchestrator: ReleaseOrchestrator;
  semaphore: DistributedSemaphore;
  history: OutcomeStore;
  metrics?: Metrics;
  logger?: Logger;
}

export type StartResult =
  | { status: 'started'; runId: string }
  | { status: 'saturated' };

export interface ActiveRun {
  runId: string;
  ref: string;
  targets: string[];
  startedAt: string;
}

interface RunHandle extends ActiveRun {
  controller: AbortController;
  done: Promise<ReleaseOutcome | null>;
}

/**
 * Background runner behind the HTTP surface: bounds concurrent runs with the
 * semaphore, keeps a cancel handle per run and records every outcome.
 */
export class ReleaseService {
  private readonly runs = new Map<string, RunHandle>();
  private readonly metrics: Metrics;
  private readonly logger: Logger;

  constructor(private readonly deps: ReleaseServiceDependencies) {
    this.metrics = deps.metrics ?? defaultMetrics;
    this.logger = deps.logger ?? rootLogger;
  }

  /** Throws UnknownTargetError for target names the config does not declare. */
  async start(ref: string, targets: string[] = []): Promise<StartResult> {
    this.deps.orchestrator.selectTargets(targets);

    const acquired = await this.deps.semaphore.tryAcquire();
    if (!acquired) {
      this.logger.warn('load_shedding', 'Release concurrency limit reached, refusing run', {
        ref,
        inFlight: await this.deps.semaphore.getInFlight(),
      });
      this.metrics.recordLoadShed();
      return { status: 'saturated' };
    }

    const runId = generateRunId();
    const controller = new AbortController();
    const handle: RunHandle = {
      runId,
      ref,
      targets,
      startedAt: new Date().toISOString(),
      controller,
      done: this.execute(runId, ref, targets, controller.signal),
    };
    this.runs.set(runId, handle);

    return { status: 'started', runId };
  }

  cancel(runId: string): boolean {
    const handle = this.runs.get(runId);
    if (!handle) {
      return false;
    }
    this.logger.info('release_cancel', 'Cancellation requested', { runId });
    handle.controller.abort(new RunCancelledError());
    return true;
  }

  activeRuns(): ActiveRun[] {
    return [...this.runs.values()].map(({ runId, ref, targets, startedAt }) => ({ runId, ref, targets, startedAt }));
  }

  /** Resolves once the run finishes; null for unknown runs or runs that crashed. */
  async waitFor(runId: string): Promise<ReleaseOutcome | null> {
    const handle = this.runs.get(runId);
    if (handle) {
      return handle.done;
    }
    return this.findOutcome(runId);
  }

  async findOutcome(runId: string): Promise<ReleaseOutcome | null> {
    const recent = await this.deps.history.getRecent(500);
    return recent.find(outcome => outcome.runId === runId) ?? null;
  }

  private async execute(
    runId: string,
    ref: string,
    targets: string[],
    signal: AbortSignal
  ): Promise<ReleaseOutcome | null> {
    try {
      const outcome = await this.deps.orchestrator.run(ref, { targets, signal, runId });
      this.metrics.recordOutcome(outcome);
      await this.deps.history.append(outcome);
      return outcome;
    } catch (error) {
      this.logger.error('pipeline_fatal', 'Unhandled release pipeline error', {
        runId,
        error: error instanceof Error ? error.message : 'Unknown error',
        stack: error instanceof Error ? error.stack : undefined,
      });
      return null;
    } finally {
      this.runs.delete(runId);
      await this.deps.semaphore.release();
    }
  }
}
