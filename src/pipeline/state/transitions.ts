import { ReleaseState, canTransition, isTerminalState } from './states.js';

export interface StateTransition {
  from: ReleaseState;
  to: ReleaseState;
  timestamp: string;
  reason?: string;
}

export interface TransitionResult {
  allowed: boolean;
  reason?: string;
}

export function validateTransition(
  from: ReleaseState,
  to: ReleaseState
): TransitionResult {
  if (isTerminalState(from)) {
    return {
      allowed: false,
      reason: `Cannot transition from terminal state ${from}`,
    };
  }

  if (!canTransition(from, to)) {
    return {
      allowed: false,
      reason: `Invalid transition from ${from} to ${to}`,
    };
  }

  return { allowed: true };
}

export function createTransition(
  from: ReleaseState,
  to: ReleaseState,
  reason?: string
): StateTransition {
  return {
    from,
    to,
    timestamp: new Date().toISOString(),
    reason,
  };
}
