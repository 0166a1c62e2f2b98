import { spawn, type ChildProcess } from 'child_process';
import { abortCause, type AbortCause } from '../concurrency/deadline.js';
import type { ErrorInfo } from '../types.js';

const TAIL_BYTES = 4096;

export interface ToolInvocation {
  command: string;
  args: string[];
  cwd: string;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export interface ToolResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdoutTail: string;
  stderrTail: string;
  durationMs: number;
  aborted?: AbortCause;
  spawnError?: string;
}

export type ToolRunner = (invocation: ToolInvocation) => Promise<ToolResult>;

class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > TAIL_BYTES && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped ? dropped.length : 0;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    return joined.subarray(Math.max(0, joined.length - TAIL_BYTES)).toString('utf8');
  }
}

export interface ToolRunnerOptions {
  /** How long a tool gets to exit after SIGTERM before its process group is killed. */
  killGraceMs?: number;
}

export const DEFAULT_KILL_GRACE_MS = 5_000;

const POSIX = process.platform !== 'win32';

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

/** Signals the child's whole process group on POSIX, so wrappers and freezer subprocesses go with it. */
function signalTree(child: ChildProcess, killSignal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  if (!POSIX) {
    child.kill(killSignal);
    return;
  }
  try {
    process.kill(-child.pid, killSignal);
  } catch (error) {
    if (isMissingProcess(error)) return;
    child.kill(killSignal);
  }
}

/**
 * Spawns tools directly (no shell). Never rejects. On abort the process group
 * gets SIGTERM, then SIGKILL once the grace period runs out; the result
 * settles when the tool exits or when SIGKILL is sent, whichever is first.
 */
export function createToolRunner(options: ToolRunnerOptions = {}): ToolRunner {
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return (invocation) =>
    new Promise<ToolResult>((resolve) => {
      const startedAt = Date.now();
      const stdout = new TailBuffer();
      const stderr = new TailBuffer();
      const { signal } = invocation;

      if (signal?.aborted) {
        resolve({
          exitCode: null,
          signal: null,
          stdoutTail: '',
          stderrTail: '',
          durationMs: 0,
          aborted: abortCause(signal),
        });
        return;
      }

      const child = spawn(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env: invocation.env ?? process.env,
        detached: POSIX,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const onAbort = () => {
        signalTree(child, 'SIGTERM');
        killTimer = setTimeout(() => {
          signalTree(child, 'SIGKILL');
          child.stdout.destroy();
          child.stderr.destroy();
          settle({ exitCode: null, signal: 'SIGKILL', aborted: signal ? abortCause(signal) : 'cancelled' });
        }, killGraceMs);
        killTimer.unref();
      };

      const settle = (result: Omit<ToolResult, 'stdoutTail' | 'stderrTail' | 'durationMs'>) => {
        if (settled) return;
        settled = true;
        clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        resolve({
          ...result,
          stdoutTail: stdout.toString(),
          stderrTail: stderr.toString(),
          durationMs: Date.now() - startedAt,
        });
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        if (signal?.aborted) {
          // The kill is in flight; 'close' or the kill timer reports the final state.
          return;
        }
        settle({ exitCode: null, signal: null, spawnError: error.message });
      });

      child.on('close', (code, killSignal) => {
        settle({
          exitCode: code,
          signal: killSignal,
          aborted: signal?.aborted ? abortCause(signal) : undefined,
        });
      });
    });
}

export const spawnTool: ToolRunner = createToolRunner();

export function formatInvocation(invocation: Pick<ToolInvocation, 'command' | 'args'>): string {
  return [invocation.command, ...invocation.args].join(' ');
}

/** Last non-empty output line, for error messages. */
export function lastOutputLine(result: ToolResult): string {
  const lines = `${result.stdoutTail}\n${result.stderrTail}`
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
  return lines.length > 0 ? lines[lines.length - 1] : '';
}

/**
 * Classify a finished invocation; null when it succeeded.
 * A timeout or cancellation wins over whatever exit status the kill produced.
 */
export function toolFailure(
  result: ToolResult,
  invocation: Pick<ToolInvocation, 'command' | 'args'>,
  successExitCode: number = 0
): { code: 'timeout' | 'cancelled' | 'tool_error' | 'nonzero_exit'; message: string; detail: ErrorInfo['detail'] } | null {
  const command = formatInvocation(invocation);

  if (result.aborted === 'timeout') {
    return {
      code: 'timeout',
      message: `${invocation.command} did not finish within the time limit`,
      detail: { command, durationMs: result.durationMs },
    };
  }
  if (result.aborted === 'cancelled') {
    return {
      code: 'cancelled',
      message: `${invocation.command} was stopped because the run was cancelled`,
      detail: { command },
    };
  }
  if (result.spawnError) {
    return {
      code: 'tool_error',
      message: `Could not start ${invocation.command}: ${result.spawnError}`,
      detail: { command },
    };
  }
  if (result.exitCode !== successExitCode) {
    const observed = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit code ${result.exitCode}`;
    const tail = lastOutputLine(result);
    return {
      code: 'nonzero_exit',
      message: tail ? `${invocation.command} ended with ${observed}: ${tail}` : `${invocation.command} ended with ${observed}`,
      detail: { command, exitCode: result.exitCode, signal: result.signal, expectedExitCode: successExitCode },
    };
  }
  return null;
}
