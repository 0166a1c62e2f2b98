import { runWithDeadline } from '../concurrency/deadline.js';
import { UnknownTargetError } from '../errors/errors.js';
import { buildFailure, describeError, publishFailure, verificationFailure } from '../errors/error-info.js';
import { failedArtifact, type ArtifactBuilder } from '../builders/types.js';
import type { VerificationGate } from '../verification/gate.js';
import type { ChannelPublisher } from '../publishers/types.js';
import { enforceInvariants, safeCheckInvariants } from '../invariants/checker.js';
import { logger as rootLogger, generateRunId, type Logger } from '../observability/logger.js';
import { parseRef } from '../version/descriptor.js';
import { ReleaseStateMachine } from './state/machine.js';
import type {
  BuildArtifact,
  BuildTarget,
  ErrorInfo,
  PublishAck,
  ReleaseOutcome,
  ReleaseStatus,
  SourceTree,
  TargetKind,
  TargetPhase,
  TargetReport,
  VersionTag,
} from '../types.js';

export interface ReleaseTimeouts {
  buildMs: number;
  verifyMs: number;
}

/** Everything one release needs, wired once per process (see factory.ts). */
export interface ReleasePipeline {
  source: SourceTree;
  targets: BuildTarget[];
  builders: Record<TargetKind, ArtifactBuilder>;
  gates: Record<TargetKind, VerificationGate>;
  publishers: Record<TargetKind, ChannelPublisher>;
  timeouts: ReleaseTimeouts;
}

export interface RunOptions {
  /** Restrict the run to these configured target names; empty or absent means all. */
  targets?: string[];
  signal?: AbortSignal;
  runId?: string;
}

interface TargetTrack {
  target: BuildTarget;
  artifact: BuildArtifact;
  startedAt: number;
  finishedAt: number;
  failedAt?: TargetPhase;
  error?: ErrorInfo;
  ack?: PublishAck;
}

function cancelledError(phase: TargetPhase): ErrorInfo {
  switch (phase) {
    case 'build':
      return buildFailure('cancelled', 'Build was cancelled with the run');
    case 'verify':
      return verificationFailure('cancelled', 'Run was cancelled before verification finished');
    case 'publish':
      return publishFailure('cancelled', 'Run was cancelled before publishing');
  }
}

function outcomeStatus(rejected: boolean, aborted: boolean, published: number, failed: number): ReleaseStatus {
  if (rejected) return 'rejected';
  if (aborted) return 'aborted';
  if (failed === 0) return 'success';
  return published === 0 ? 'failed' : 'partial';
}

/**
 * Drives one trigger through matching, concurrent builds, verification and
 * publishing. A target's failure never touches its siblings, and only
 * artifacts the gate marked verified reach a publisher.
 */
export class ReleaseOrchestrator {
  constructor(
    private readonly pipeline: ReleasePipeline,
    private readonly logger: Logger = rootLogger
  ) {}

  get configuredTargets(): BuildTarget[] {
    return [...this.pipeline.targets];
  }

  /** Throws UnknownTargetError before anything runs. */
  selectTargets(names?: string[]): BuildTarget[] {
    if (!names || names.length === 0) {
      return this.configuredTargets;
    }

    const known = this.pipeline.targets.map(target => target.name);
    const unknown = names.filter(name => !known.includes(name));
    if (unknown.length > 0) {
      throw new UnknownTargetError(unknown, known);
    }

    return this.pipeline.targets.filter(target => names.includes(target.name));
  }

  async run(ref: string, options: RunOptions = {}): Promise<ReleaseOutcome> {
    const selected = this.selectTargets(options.targets);
    const runId = options.runId ?? generateRunId();
    const startedAt = new Date().toISOString();
    const log = this.logger.forRun({ runId, ref });
    const machine = new ReleaseStateMachine(runId, log);

    machine.transition('MATCHING');
    const trigger = parseRef(ref);

    if (!trigger.matched || !trigger.version) {
      machine.transition('REJECTED', 'ref is not a release tag');
      log.info('release_trigger', 'Ref does not match v<major>.<minor>.<patch>, nothing to do');
      return this.finish(log, machine, {
        runId,
        ref,
        startedAt,
        selected: [],
        tracks: new Map(),
        handedToPublisher: [],
        rejected: true,
      });
    }

    const version = trigger.version;
    log.setContext({ runId, ref, version: version.raw });
    log.info('release_start', 'Release triggered', {
      targets: selected.map(target => target.name),
      rerun: options.targets !== undefined && options.targets.length > 0,
    });

    const tracks = new Map<string, TargetTrack>();
    const handedToPublisher: Array<{ target: string; verified: boolean }> = [];

    machine.transition('BUILDING');
    const built = await Promise.all(selected.map(target => this.buildTarget(target, version, log, options.signal)));
    for (const track of built) {
      tracks.set(track.target.name, track);
    }

    if (options.signal?.aborted) {
      return this.abort(log, machine, 'verify', { runId, ref, startedAt, selected, tracks, handedToPublisher, version });
    }

    machine.transition('VERIFYING');
    await Promise.all(
      built
        .filter(track => track.failedAt === undefined)
        .map(track => this.verifyTarget(track, version, log, options.signal))
    );

    if (options.signal?.aborted) {
      return this.abort(log, machine, 'publish', { runId, ref, startedAt, selected, tracks, handedToPublisher, version });
    }

    machine.transition('PUBLISHING');
    const publishable = built.filter(track => track.failedAt === undefined && track.artifact.verified);
    for (const track of publishable) {
      handedToPublisher.push({ target: track.target.name, verified: track.artifact.verified });
    }
    enforceInvariants({ handedToPublisher }, ['PUBLISH_REQUIRES_VERIFIED'], log);
    await Promise.all(publishable.map(track => this.publishTarget(track, version, log)));

    machine.transition('DONE');
    return this.finish(log, machine, {
      runId,
      ref,
      startedAt,
      selected,
      tracks,
      handedToPublisher,
      version,
      rejected: false,
    });
  }

  private async buildTarget(
    target: BuildTarget,
    version: VersionTag,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<TargetTrack> {
    const startedAt = Date.now();
    const { buildMs } = this.pipeline.timeouts;
    const builder = this.pipeline.builders[target.kind];

    const artifact = await runWithDeadline(
      buildMs,
      signal,
      async (taskSignal) => {
        try {
          return await builder.build(target, this.pipeline.source, { version, signal: taskSignal, logger: log });
        } catch (error) {
          return failedArtifact(target, buildFailure('unexpected_error', describeError(error)));
        }
      },
      (cause) =>
        failedArtifact(
          target,
          cause === 'timeout'
            ? buildFailure('timeout', `Build of ${target.name} did not finish within ${buildMs}ms`, { timeoutMs: buildMs })
            : cancelledError('build')
        )
    );

    const track: TargetTrack = { target, artifact, startedAt, finishedAt: Date.now() };
    if (!artifact.produced) {
      track.failedAt = 'build';
      track.error = artifact.error ?? buildFailure('unexpected_error', 'Builder reported no artifact and no error');
      log.warn('target_build', 'Target build failed', {
        target: target.name,
        kind: track.error.kind,
        code: track.error.code,
        message: track.error.message,
      });
    } else {
      log.info('target_build', 'Target built', {
        target: target.name,
        files: artifact.handle.files.length,
        durationMs: track.finishedAt - startedAt,
      });
    }
    return track;
  }

  private async verifyTarget(
    track: TargetTrack,
    version: VersionTag,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { verifyMs } = this.pipeline.timeouts;
    const gate = this.pipeline.gates[track.target.kind];
    const produced = track.artifact;

    const checked = await runWithDeadline<BuildArtifact>(
      verifyMs,
      signal,
      async (taskSignal) => {
        try {
          return await gate.verify(produced, { version, signal: taskSignal, logger: log });
        } catch (error) {
          return { ...produced, verified: false, error: verificationFailure('unexpected_error', describeError(error)) };
        }
      },
      (cause) => ({
        ...produced,
        verified: false,
        error:
          cause === 'timeout'
            ? verificationFailure('timeout', `Verification of ${track.target.name} did not finish within ${verifyMs}ms`, {
                timeoutMs: verifyMs,
              })
            : cancelledError('verify'),
      })
    );

    track.artifact = checked;
    track.finishedAt = Date.now();

    if (!checked.verified) {
      track.failedAt = 'verify';
      track.error = checked.error ?? verificationFailure('unexpected_error', 'Gate rejected the artifact without a reason');
      log.warn('target_verify', 'Target failed verification', {
        target: track.target.name,
        code: track.error.code,
        message: track.error.message,
      });
    } else {
      log.info('target_verify', 'Target verified', { target: track.target.name });
    }
  }

  /** Publishing ignores the run signal: an upload the channel acknowledged is never undone. */
  private async publishTarget(track: TargetTrack, version: VersionTag, log: Logger): Promise<void> {
    const publisher = this.pipeline.publishers[track.target.kind];

    let error: ErrorInfo | undefined;
    try {
      const result = await publisher.publish(track.artifact, { version, logger: log });
      if (result.ok) {
        track.ack = result.ack;
      } else {
        error = result.error;
      }
    } catch (thrown) {
      error = publishFailure('unexpected_error', describeError(thrown));
    }

    track.finishedAt = Date.now();

    if (error) {
      track.failedAt = 'publish';
      track.error = error;
      log.warn('target_publish', 'Target publish failed', {
        target: track.target.name,
        kind: error.kind,
        code: error.code,
        message: error.message,
      });
    } else {
      log.info('target_publish', 'Target published', {
        target: track.target.name,
        location: track.ack?.location,
      });
    }
  }

  private abort(
    log: Logger,
    machine: ReleaseStateMachine,
    pendingPhase: TargetPhase,
    run: Omit<FinishInput, 'rejected'>
  ): ReleaseOutcome {
    for (const track of run.tracks.values()) {
      if (track.failedAt === undefined) {
        track.failedAt = pendingPhase;
        track.error = cancelledError(pendingPhase);
      }
    }

    machine.transition('ABORTED', 'run cancelled');
    log.warn('release_abort', 'Release cancelled before publishing', { pendingPhase });
    return this.finish(log, machine, { ...run, rejected: false });
  }

  private finish(log: Logger, machine: ReleaseStateMachine, run: FinishInput): ReleaseOutcome {
    const published: string[] = [];
    const failed: Record<string, ErrorInfo> = {};
    const targets: TargetReport[] = [];

    for (const target of run.selected) {
      const track = run.tracks.get(target.name);
      if (!track) continue;

      if (track.error) {
        failed[target.name] = track.error;
      } else {
        published.push(target.name);
      }

      targets.push({
        target: target.name,
        kind: target.kind,
        platform: target.platform,
        produced: track.artifact.produced,
        verified: track.artifact.verified,
        published: !track.error,
        failedAt: track.failedAt,
        files: track.artifact.handle.files,
        ack: track.ack,
        durationMs: track.finishedAt - track.startedAt,
      });
    }

    const finalState = machine.getCurrentState();
    const violations = safeCheckInvariants(
      {
        selectedTargets: run.selected.map(target => target.name),
        published,
        failed: Object.keys(failed),
        rejected: run.rejected,
        handedToPublisher: run.handedToPublisher,
        currentState: finalState,
        isTerminalState: machine.isTerminal(),
      },
      ['PUBLISH_REQUIRES_VERIFIED', 'OUTCOME_TARGETS_PARTITIONED', 'REJECTED_RUN_HAS_NO_TARGETS', 'RUN_ENDS_TERMINAL'],
      log
    );

    const outcome: ReleaseOutcome = {
      runId: run.runId,
      ref: run.ref,
      status: outcomeStatus(run.rejected, finalState === 'ABORTED', published.length, Object.keys(failed).length),
      version: run.version,
      published,
      failed,
      targets,
      stateHistory: machine.getTransitionHistory().map(t => ({ from: t.from, to: t.to, timestamp: t.timestamp })),
      invariantViolations: violations.length > 0 ? violations.map(v => v.invariantId) : undefined,
      startedAt: run.startedAt,
      finishedAt: new Date().toISOString(),
    };

    log.info('release_outcome', 'Release finished', {
      status: outcome.status,
      published: outcome.published,
      failed: Object.fromEntries(Object.entries(failed).map(([name, error]) => [name, `${error.kind}:${error.code}`])),
      finalState,
    });

    return outcome;
  }
}

interface FinishInput {
  runId: string;
  ref: string;
  startedAt: string;
  selected: BuildTarget[];
  tracks: Map<string, TargetTrack>;
  handedToPublisher: Array<{ target: string; verified: boolean }>;
  version?: VersionTag;
  rejected: boolean;
}
