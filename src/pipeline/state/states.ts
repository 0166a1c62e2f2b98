export type ReleaseState =
  | 'IDLE'
  | 'MATCHING'
  | 'REJECTED'
  | 'BUILDING'
  | 'VERIFYING'
  | 'PUBLISHING'
  | 'DONE'
  | 'ABORTED';

interface StateDefinition {
  isTerminal: boolean;
  canTransitionTo: ReleaseState[];
  description: string;
}

const STATE_DEFINITIONS: Record<ReleaseState, StateDefinition> = {
  IDLE: {
    isTerminal: false,
    canTransitionTo: ['MATCHING'],
    description: 'Trigger received, nothing evaluated yet',
  },

  MATCHING: {
    isTerminal: false,
    canTransitionTo: ['REJECTED', 'BUILDING'],
    description: 'Matching the ref against the release tag format',
  },

  REJECTED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Ref is not a release tag; nothing ran',
  },

  BUILDING: {
    isTerminal: false,
    canTransitionTo: ['VERIFYING', 'ABORTED'],
    description: 'Building every selected target concurrently',
  },

  VERIFYING: {
    isTerminal: false,
    canTransitionTo: ['PUBLISHING', 'ABORTED'],
    description: 'Running verification gates on produced artifacts',
  },

  PUBLISHING: {
    isTerminal: false,
    canTransitionTo: ['DONE'],
    description: 'Publishing verified artifacts to their channels',
  },

  DONE: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Outcome aggregated; published targets stay published',
  },

  ABORTED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Cancelled before publishing',
  },
};

export function isTerminalState(state: ReleaseState): boolean {
  return STATE_DEFINITIONS[state].isTerminal;
}

export function canTransition(from: ReleaseState, to: ReleaseState): boolean {
  return STATE_DEFINITIONS[from].canTransitionTo.includes(to);
}
