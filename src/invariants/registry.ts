import { InvariantDefinition, InvariantContext, InvariantID } from './types.js';

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  SEMAPHORE_PERMITS_NON_NEGATIVE: {
    id: 'SEMAPHORE_PERMITS_NON_NEGATIVE',
    description: 'Semaphore available permits must never be negative',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphorePermits === undefined) return true;
      return ctx.semaphorePermits >= 0;
    },
  },

  SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED: {
    id: 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED',
    description: 'In-flight count must equal (max - available) permits',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphoreInFlight === undefined ||
          ctx.semaphorePermits === undefined ||
          ctx.semaphoreMaxPermits === undefined) {
        return true;
      }
      return ctx.semaphoreInFlight === ctx.semaphoreMaxPermits - ctx.semaphorePermits;
    },
  },

  PUBLISH_REQUIRES_VERIFIED: {
    id: 'PUBLISH_REQUIRES_VERIFIED',
    description: 'Only verified artifacts may reach a channel publisher',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.handedToPublisher) return true;
      return ctx.handedToPublisher.every(entry => entry.verified);
    },
  },

  OUTCOME_TARGETS_PARTITIONED: {
    id: 'OUTCOME_TARGETS_PARTITIONED',
    description: 'Every selected target ends in exactly one of published or failed',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.selectedTargets || !ctx.published || !ctx.failed || ctx.rejected) return true;
      const seen = [...ctx.published, ...ctx.failed];
      if (seen.length !== ctx.selectedTargets.length) return false;
      const remaining = new Set(ctx.selectedTargets);
      return seen.every(name => remaining.delete(name));
    },
  },

  REJECTED_RUN_HAS_NO_TARGETS: {
    id: 'REJECTED_RUN_HAS_NO_TARGETS',
    description: 'A rejected trigger must not build, publish or fail any target',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.rejected) return true;
      return (ctx.published?.length ?? 0) === 0
        && (ctx.failed?.length ?? 0) === 0
        && (ctx.handedToPublisher?.length ?? 0) === 0;
    },
  },

  RUN_ENDS_TERMINAL: {
    id: 'RUN_ENDS_TERMINAL',
    description: 'An aggregated outcome must come from a terminal state',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.isTerminalState === undefined) return true;
      return ctx.isTerminalState;
    },
  },
};

export function getAllInvariants(): InvariantDefinition[] {
  return Object.values(INVARIANTS);
}

export function getInvariantsByIds(ids: InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
