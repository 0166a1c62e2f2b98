import { clearRegisteredSecrets, Credential, registerSecret } from '../../src/errors/secrets.js';
import { generateRunId, Logger } from '../../src/observability/logger.js';

afterEach(() => {
  clearRegisteredSecrets();
});

function capture(logger: Logger): Array<{ line: string; level: string }> {
  const written: Array<{ line: string; level: string }> = [];
  logger.setSink((line, level) => {
    written.push({ line, level });
  });
  return written;
}

describe('Logger', () => {
  test('writes one JSON object per line', () => {
    const logger = new Logger();
    const written = capture(logger);

    logger.warn('target_build', 'Target build failed', { target: 'exe-linux', code: 'tool_error' });

    expect(written).toHaveLength(1);
    expect(written[0].level).toBe('warn');
    expect(JSON.parse(written[0].line)).toEqual({
      timestamp: expect.any(String),
      level: 'warn',
      runId: 'unknown',
      phase: 'target_build',
      message: 'Target build failed',
      data: { target: 'exe-linux', code: 'tool_error' },
    });
  });

  test('masks registered secrets in messages and nested data', () => {
    registerSecret('test-secret');
    const logger = new Logger();
    const written = capture(logger);

    logger.error('index_publish', 'Upload with test-secret failed', {
      response: { body: ['denied for test-secret'] },
      attempts: 2,
    });

    const entry = JSON.parse(written[0].line);
    expect(entry.message).toBe('Upload with *******cret failed');
    expect(entry.data).toEqual({ response: { body: ['denied for *******cret'] }, attempts: 2 });
  });

  test('never serialises a credential value', () => {
    const logger = new Logger();
    const written = capture(logger);

    logger.info('startup', 'Configured', { token: new Credential('test-secret-value', 'index-token') });

    expect(JSON.parse(written[0].line).data).toEqual({ token: '[credential index-token]' });
  });

  test('run loggers carry the run context and share the parent sink', () => {
    const parent = new Logger();
    const written = capture(parent);
    const child = parent.forRun({ runId: 'run-7', ref: 'refs/tags/v2.3.0' });

    child.info('release_start', 'Release triggered');
    child.setContext({ runId: 'run-7', ref: 'refs/tags/v2.3.0', version: 'v2.3.0' });
    child.info('release_outcome', 'Release finished');

    const [first, second] = written.map(entry => JSON.parse(entry.line));
    expect(first).toMatchObject({ runId: 'run-7', ref: 'refs/tags/v2.3.0' });
    expect(first.version).toBeUndefined();
    expect(second).toMatchObject({ runId: 'run-7', version: 'v2.3.0' });
  });

  test('clearContext falls back to an unknown run id', () => {
    const logger = new Logger({ runId: 'run-8' });
    const written = capture(logger);
    logger.clearContext();
    logger.info('shutdown', 'bye');
    expect(JSON.parse(written[0].line).runId).toBe('unknown');
  });
});

describe('generateRunId', () => {
  test('returns 16 hex characters', () => {
    expect(generateRunId()).toMatch(/^[0-9a-f]{16}$/);
  });
});
