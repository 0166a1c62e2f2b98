export class TaskTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Task exceeded its ${timeoutMs}ms time limit`);
    this.name = 'TaskTimeoutError';
  }
}

export class RunCancelledError extends Error {
  constructor(public readonly reason: string = 'Run cancelled by operator') {
    super(reason);
    this.name = 'RunCancelledError';
  }
}

export type AbortCause = 'timeout' | 'cancelled';

export function abortCause(signal: AbortSignal): AbortCause {
  return signal.reason instanceof TaskTimeoutError ? 'timeout' : 'cancelled';
}

export interface Deadline {
  signal: AbortSignal;
  /** Stops the timer and detaches from the parent signal. */
  dispose(): void;
}

/**
 * A child signal that aborts when the parent aborts or after `timeoutMs`,
 * whichever comes first. A timeout aborts with a TaskTimeoutError reason.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();

  const onParentAbort = () => {
    controller.abort(parent?.reason ?? new RunCancelledError());
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(new TaskTimeoutError(timeoutMs));
  }, timeoutMs);
  timer.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Run `task` under a deadline. If the deadline fires first, the result of
 * `onAbort` is returned and the task's own eventual result is dropped.
 */
export async function runWithDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
  onAbort: (cause: AbortCause) => T
): Promise<T> {
  const deadline = createDeadline(timeoutMs, parent);
  const { signal } = deadline;

  if (signal.aborted) {
    deadline.dispose();
    return onAbort(abortCause(signal));
  }

  const aborted = new Promise<T>((resolve) => {
    signal.addEventListener('abort', () => resolve(onAbort(abortCause(signal))), { once: true });
  });

  try {
    return await Promise.race([task(signal), aborted]);
  } finally {
    deadline.dispose();
  }
}
