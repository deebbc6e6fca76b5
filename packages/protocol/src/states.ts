/**
 * Protocol State Variants
 *
 * The closed set of present-proof states and the static table of legal
 * successors. States are immutable values; the driver replaces the current
 * state wholesale on every step.
 */

// ============================================
// Types
// ============================================

export type StateName =
  // common
  | 'start'
  | 'abandoning'
  | 'done'
  | 'noop'
  // Verifier
  | 'request-sent'
  | 'presentation-received'
  | 'proposal-received'
  // Prover
  | 'request-received'
  | 'presentation-sent'
  | 'proposal-sent';

type PlainStateName = Exclude<StateName, 'abandoning'>;

export type ProtocolState =
  | { [N in PlainStateName]: { readonly name: N } }[PlainStateName]
  | { readonly name: 'abandoning'; readonly code?: string };

// ============================================
// Constructors
// ============================================

export const State = {
  start: (): ProtocolState => ({ name: 'start' }),
  requestSent: (): ProtocolState => ({ name: 'request-sent' }),
  requestReceived: (): ProtocolState => ({ name: 'request-received' }),
  proposalSent: (): ProtocolState => ({ name: 'proposal-sent' }),
  proposalReceived: (): ProtocolState => ({ name: 'proposal-received' }),
  presentationSent: (): ProtocolState => ({ name: 'presentation-sent' }),
  presentationReceived: (): ProtocolState => ({ name: 'presentation-received' }),
  /** `code` empty or absent: abandon without notifying the peer */
  abandoning: (code?: string): ProtocolState =>
    code === undefined ? { name: 'abandoning' } : { name: 'abandoning', code },
  done: (): ProtocolState => ({ name: 'done' }),
  noOp: (): ProtocolState => ({ name: 'noop' }),
} as const;

// ============================================
// Transition table
// ============================================

const TRANSITIONS: Readonly<Record<StateName, readonly StateName[]>> = {
  start: [
    // Verifier
    'request-sent',
    'proposal-received',
    // Prover
    'proposal-sent',
    'request-received',
  ],
  'request-sent': ['presentation-received', 'proposal-received', 'abandoning'],
  'proposal-received': ['request-sent', 'abandoning'],
  'presentation-received': ['abandoning', 'done'],
  'request-received': ['presentation-sent', 'proposal-sent', 'abandoning'],
  'proposal-sent': ['request-received', 'abandoning'],
  'presentation-sent': ['abandoning', 'done'],
  abandoning: ['done'],
  done: [],
  noop: [],
};

export const STATE_NAMES: readonly StateName[] = Object.keys(TRANSITIONS).filter(
  (name): name is StateName => name in TRANSITIONS
);

export function stateName(state: ProtocolState): StateName {
  return state.name;
}

/**
 * Whether `next` may directly follow `from`.
 */
export function canTransitionTo(from: ProtocolState, next: ProtocolState): boolean {
  return TRANSITIONS[from.name].includes(next.name);
}

export function allowedSuccessors(name: StateName): readonly StateName[] {
  return TRANSITIONS[name];
}

/** States with no legal successor */
export function isTerminal(state: ProtocolState): boolean {
  return TRANSITIONS[state.name].length === 0;
}
