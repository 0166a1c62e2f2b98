import type { ReleaseState } from '../pipeline/state/states.js';

export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'SEMAPHORE_PERMITS_NON_NEGATIVE'
  | 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED'
  | 'PUBLISH_REQUIRES_VERIFIED'
  | 'OUTCOME_TARGETS_PARTITIONED'
  | 'REJECTED_RUN_HAS_NO_TARGETS'
  | 'RUN_ENDS_TERMINAL';

export interface InvariantContext {
  // Semaphore context
  semaphorePermits?: number;
  semaphoreInFlight?: number;
  semaphoreMaxPermits?: number;

  // Publish context
  handedToPublisher?: Array<{ target: string; verified: boolean }>;

  // Outcome context
  selectedTargets?: string[];
  published?: string[];
  failed?: string[];
  rejected?: boolean;

  // State machine context
  currentState?: ReleaseState;
  isTerminalState?: boolean;
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (context: InvariantContext) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
