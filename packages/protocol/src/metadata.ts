import type { ProtocolMessage } from './envelope.js';
import type { KeyResolver } from './keyResolver.js';
import type { Presentation, ProposePresentation, RequestPresentation } from './messages.js';

/**
 * Per-exchange context handed to every state executor.
 *
 * A metadata value belongs to exactly one conversation. It is never mutated:
 * the driver derives a new value when it needs to record an error.
 */
export interface ConversationMetadata {
  /** Message that triggered the current step (inbound, or our own first message) */
  readonly msg: ProtocolMessage;
  readonly myDID: string;
  readonly theirDID: string;
  /** Request the Verifier sends (or re-sends after a proposal) */
  readonly request?: RequestPresentation;
  /** Counter-proposal the Prover sends */
  readonly proposePresentation?: ProposePresentation;
  /** Presentation the Prover sends */
  readonly presentation?: Presentation;
  readonly keyResolver: KeyResolver;
  /** Error the conversation is being abandoned for */
  readonly err?: unknown;
}
