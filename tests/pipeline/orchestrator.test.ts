import { RunCancelledError } from '../../src/concurrency/deadline.js';
import { buildFailure, duplicateRelease, verificationFailure } from '../../src/errors/error-info.js';
import { UnknownTargetError } from '../../src/errors/errors.js';
import { ReleaseOrchestrator } from '../../src/pipeline/orchestrator.js';
import { recordingLogger, silentLogger } from '../helpers/fakes.js';
import { buildFailed, buildHanging, delay, scriptedPipeline, untilAborted } from '../helpers/pipeline.js';

function transitions(outcome: { stateHistory: Array<{ from: string; to: string }> }): string[] {
  return outcome.stateHistory.map(step => `${step.from}→${step.to}`);
}

describe('ReleaseOrchestrator', () => {
  test('publishes every target for a release tag', async () => {
    const scripted = scriptedPipeline();
    const orchestrator = new ReleaseOrchestrator(scripted.pipeline, silentLogger());

    const outcome = await orchestrator.run('v2.3.0', { runId: 'run-happy' });

    expect(outcome.runId).toBe('run-happy');
    expect(outcome.status).toBe('success');
    expect(outcome.version).toEqual({ major: 2, minor: 3, patch: 0, raw: 'v2.3.0' });
    expect(outcome.published).toEqual(['package', 'exe-linux', 'exe-macos']);
    expect(outcome.failed).toEqual({});
    expect(outcome.invariantViolations).toBeUndefined();
    expect(transitions(outcome)).toEqual([
      'IDLE→MATCHING',
      'MATCHING→BUILDING',
      'BUILDING→VERIFYING',
      'VERIFYING→PUBLISHING',
      'PUBLISHING→DONE',
    ]);
    expect(outcome.targets.map(report => [report.target, report.produced, report.verified, report.published])).toEqual([
      ['package', true, true, true],
      ['exe-linux', true, true, true],
      ['exe-macos', true, true, true],
    ]);
    expect(outcome.targets[1].ack).toEqual({
      channel: 'release-assets',
      location: 'https://example.test/v2.3.0/exe-linux',
      items: ['/out/v2.3.0/exe-linux'],
    });
    expect(scripted.publishers.package.received.map(artifact => artifact.target.name)).toEqual(['package']);
    expect(scripted.publishers.executable.received.map(artifact => artifact.target.name).sort()).toEqual([
      'exe-linux',
      'exe-macos',
    ]);
  });

  test('accepts the full tag ref a push delivers', async () => {
    const scripted = scriptedPipeline();
    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('refs/tags/v2.3.0');

    expect(outcome.ref).toBe('refs/tags/v2.3.0');
    expect(outcome.version?.raw).toBe('v2.3.0');
    expect(outcome.status).toBe('success');
  });

  test.each(['v2.3', 'v2.3.0-rc1', 'refs/heads/main', 'release-2.3.0', 'v02.3.0'])(
    'does nothing for %s',
    async ref => {
      const scripted = scriptedPipeline();
      const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run(ref);

      expect(outcome.status).toBe('rejected');
      expect(outcome.version).toBeUndefined();
      expect(outcome.published).toEqual([]);
      expect(outcome.failed).toEqual({});
      expect(outcome.targets).toEqual([]);
      expect(transitions(outcome)).toEqual(['IDLE→MATCHING', 'MATCHING→REJECTED']);
      expect(scripted.builders.package.calls).toEqual([]);
      expect(scripted.builders.executable.calls).toEqual([]);
    }
  );

  test('a verification timeout on one platform leaves the others published', async () => {
    const scripted = scriptedPipeline({ buildMs: 5_000, verifyMs: 30 });
    scripted.gates.executable.behaviours['exe-macos'] = (artifact, context) =>
      untilAborted(context.signal, { ...artifact, verified: false });

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    expect(outcome.status).toBe('partial');
    expect(outcome.published).toEqual(['package', 'exe-linux']);
    expect(outcome.failed).toEqual({
      'exe-macos': {
        kind: 'VerificationFailure',
        code: 'timeout',
        message: 'Verification of exe-macos did not finish within 30ms',
        detail: { timeoutMs: 30 },
      },
    });
    const macos = outcome.targets.find(report => report.target === 'exe-macos');
    expect(macos).toMatchObject({ produced: true, verified: false, published: false, failedAt: 'verify' });
    expect(scripted.publishers.executable.received.map(artifact => artifact.target.name)).toEqual(['exe-linux']);
  });

  test('a missing data path fails only the executable target it belongs to', async () => {
    const scripted = scriptedPipeline();
    scripted.builders.executable.behaviours['exe-linux'] = buildFailed(
      buildFailure('missing_data_path', 'Declared data path src/usage_monitor/templates does not exist', {
        path: 'src/usage_monitor/templates',
      })
    );

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    expect(outcome.status).toBe('partial');
    expect(outcome.published).toEqual(['package', 'exe-macos']);
    expect(outcome.failed['exe-linux'].code).toBe('missing_data_path');
    expect(outcome.targets.find(report => report.target === 'exe-linux')?.failedAt).toBe('build');
    expect(scripted.gates.executable.calls).toEqual(['exe-macos']);
  });

  test('a version already on the index does not stop the executables', async () => {
    const scripted = scriptedPipeline();
    scripted.publishers.package.behaviours.package = async () => ({
      ok: false,
      error: duplicateRelease('Version v2.3.0 is already on the index'),
    });

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    expect(outcome.status).toBe('partial');
    expect(outcome.published).toEqual(['exe-linux', 'exe-macos']);
    expect(outcome.failed.package).toEqual({
      kind: 'DuplicateRelease',
      code: 'already_exists',
      message: 'Version v2.3.0 is already on the index',
    });
    expect(outcome.targets[0]).toMatchObject({ verified: true, published: false, failedAt: 'publish' });
  });

  test('reports failed when nothing was published', async () => {
    const scripted = scriptedPipeline();
    const failing = buildFailed(buildFailure('tool_error', 'build tool missing'));
    scripted.builders.package.behaviours.package = failing;
    scripted.builders.executable.behaviours['exe-linux'] = failing;
    scripted.builders.executable.behaviours['exe-macos'] = failing;

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    expect(outcome.status).toBe('failed');
    expect(Object.keys(outcome.failed)).toEqual(['package', 'exe-linux', 'exe-macos']);
    expect(transitions(outcome).slice(-1)).toEqual(['PUBLISHING→DONE']);
  });

  test('never hands an unverified artifact to a publisher', async () => {
    const scripted = scriptedPipeline();
    scripted.gates.package.behaviours.package = async artifact => {
      await delay(10);
      return { ...artifact, verified: true };
    };
    scripted.gates.executable.behaviours['exe-linux'] = async artifact => {
      await delay(5);
      return { ...artifact, verified: false, error: verificationFailure('nonzero_exit', 'probe failed') };
    };
    scripted.gates.executable.behaviours['exe-macos'] = async artifact => ({ ...artifact, verified: false });

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    const received = [...scripted.publishers.package.received, ...scripted.publishers.executable.received];
    expect(received.map(artifact => artifact.target.name)).toEqual(['package']);
    expect(received.every(artifact => artifact.verified)).toBe(true);
    expect(outcome.published).toEqual(['package']);
    expect(outcome.failed['exe-macos']).toEqual({
      kind: 'VerificationFailure',
      code: 'unexpected_error',
      message: 'Gate rejected the artifact without a reason',
    });
    expect(outcome.invariantViolations).toBeUndefined();
  });

  test('turns a builder that throws into an unexpected_error build failure', async () => {
    const scripted = scriptedPipeline();
    scripted.builders.executable.behaviours['exe-linux'] = async () => {
      throw new Error('disk full');
    };

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    expect(outcome.failed['exe-linux']).toEqual({ kind: 'BuildFailure', code: 'unexpected_error', message: 'disk full' });
    expect(outcome.published).toEqual(['package', 'exe-macos']);
  });

  test('turns a publisher that throws into an unexpected_error publish failure', async () => {
    const scripted = scriptedPipeline();
    scripted.publishers.executable.behaviours['exe-macos'] = async () => {
      throw new Error('connection reset');
    };

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    expect(outcome.failed['exe-macos']).toEqual({
      kind: 'PublishFailure',
      code: 'unexpected_error',
      message: 'connection reset',
    });
  });

  test('stops a build that exceeds its deadline', async () => {
    const scripted = scriptedPipeline({ buildMs: 20, verifyMs: 5_000 });
    scripted.builders.package.behaviours.package = buildHanging();

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0');

    expect(outcome.failed.package).toEqual({
      kind: 'BuildFailure',
      code: 'timeout',
      message: 'Build of package did not finish within 20ms',
      detail: { timeoutMs: 20 },
    });
    expect(outcome.published).toEqual(['exe-linux', 'exe-macos']);
  });

  test('re-runs only the named targets', async () => {
    const scripted = scriptedPipeline();
    const orchestrator = new ReleaseOrchestrator(scripted.pipeline, silentLogger());

    const outcome = await orchestrator.run('v2.3.0', { targets: ['exe-macos'] });

    expect(outcome.status).toBe('success');
    expect(outcome.published).toEqual(['exe-macos']);
    expect(outcome.targets).toHaveLength(1);
    expect(scripted.builders.package.calls).toEqual([]);
    expect(scripted.builders.executable.calls).toEqual(['exe-macos']);
  });

  test('rejects unknown target names before anything runs', async () => {
    const scripted = scriptedPipeline();
    const orchestrator = new ReleaseOrchestrator(scripted.pipeline, silentLogger());

    await expect(orchestrator.run('v2.3.0', { targets: ['exe-windows'] })).rejects.toThrow(
      new UnknownTargetError(['exe-windows'], ['package', 'exe-linux', 'exe-macos'])
    );
    expect(scripted.builders.executable.calls).toEqual([]);
  });

  test('selectTargets keeps configuration order', () => {
    const orchestrator = new ReleaseOrchestrator(scriptedPipeline().pipeline, silentLogger());
    expect(orchestrator.selectTargets(['exe-macos', 'package']).map(target => target.name)).toEqual([
      'package',
      'exe-macos',
    ]);
    expect(orchestrator.selectTargets([]).map(target => target.name)).toEqual(['package', 'exe-linux', 'exe-macos']);
  });

  test('cancelling during builds aborts the run without publishing', async () => {
    const scripted = scriptedPipeline();
    const hangUntilCancelled = buildHanging();
    scripted.builders.package.behaviours.package = hangUntilCancelled;
    scripted.builders.executable.behaviours['exe-linux'] = hangUntilCancelled;
    scripted.builders.executable.behaviours['exe-macos'] = hangUntilCancelled;
    const controller = new AbortController();

    const pending = new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0', {
      signal: controller.signal,
    });
    await delay(10);
    controller.abort(new RunCancelledError());
    const outcome = await pending;

    expect(outcome.status).toBe('aborted');
    expect(outcome.published).toEqual([]);
    expect(outcome.failed.package).toEqual({
      kind: 'BuildFailure',
      code: 'cancelled',
      message: 'Build was cancelled with the run',
    });
    expect(transitions(outcome).slice(-1)).toEqual(['BUILDING→ABORTED']);
    expect(scripted.gates.package.calls).toEqual([]);
  });

  test('cancelling during verification keeps verified artifacts unpublished', async () => {
    const scripted = scriptedPipeline();
    const controller = new AbortController();
    scripted.gates.executable.behaviours['exe-linux'] = (artifact, context) => {
      // The package gate settles first; the cancel lands while the executables are still being probed.
      setTimeout(() => controller.abort(new RunCancelledError()), 10);
      return untilAborted(context.signal, { ...artifact, verified: false });
    };
    scripted.gates.executable.behaviours['exe-macos'] = (artifact, context) =>
      untilAborted(context.signal, { ...artifact, verified: false });

    const outcome = await new ReleaseOrchestrator(scripted.pipeline, silentLogger()).run('v2.3.0', {
      signal: controller.signal,
    });

    expect(outcome.status).toBe('aborted');
    expect(outcome.published).toEqual([]);
    expect(outcome.failed).toEqual({
      package: { kind: 'PublishFailure', code: 'cancelled', message: 'Run was cancelled before publishing' },
      'exe-linux': {
        kind: 'VerificationFailure',
        code: 'cancelled',
        message: 'Run was cancelled before verification finished',
      },
      'exe-macos': {
        kind: 'VerificationFailure',
        code: 'cancelled',
        message: 'Run was cancelled before verification finished',
      },
    });
    expect(transitions(outcome).slice(-1)).toEqual(['VERIFYING→ABORTED']);
    expect(scripted.publishers.package.received).toEqual([]);
  });

  test('logs the outcome with the run context', async () => {
    const { logger, lines } = recordingLogger();
    await new ReleaseOrchestrator(scriptedPipeline().pipeline, logger).run('v2.3.0', { runId: 'run-logged' });

    const entries = lines.map(line => JSON.parse(line));
    const final = entries[entries.length - 1];
    expect(final).toMatchObject({
      level: 'info',
      runId: 'run-logged',
      ref: 'v2.3.0',
      version: 'v2.3.0',
      phase: 'release_outcome',
      data: { status: 'success', published: ['package', 'exe-linux', 'exe-macos'], failed: {}, finalState: 'DONE' },
    });
  });
});
