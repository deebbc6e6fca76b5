/**
 * Proofwire Protocol Package
 *
 * Exports all public APIs for the present-proof exchange: message schemas,
 * the state machine and its driver, presentation signing and verification,
 * and the conversation service.
 */

// Message schemas and types
export {
  PRESENT_PROOF_PROTOCOL,
  MessageType,
  ThreadSchema,
  AttachmentSchema,
  ProposePresentationSchema,
  RequestPresentationSchema,
  PresentationSchema,
  AckSchema,
  ProblemReportSchema,
  isMessageType,
  type Thread,
  type Attachment,
  type ProposePresentation,
  type RequestPresentation,
  type Presentation,
  type Ack,
  type ProblemReport,
} from './messages.js';

// Envelope
export { ProtocolMessage, createMessage, type RawMessage } from './envelope.js';

// Errors
export {
  PresentProofError,
  DecodeError,
  VerificationError,
  MissingDataError,
  ThreadResolutionError,
  UserCancellationError,
  InvalidTransitionError,
  UnimplementedError,
  NoOpExecutionError,
  AbandonCode,
  abandonCodeFor,
  isPresentProofError,
  isUserCancellation,
  describeError,
  type PresentProofErrorKind,
} from './errors.js';

// Canonical serialization
export { canonicalize, canonicalStringify } from './canonical.js';

// Hex validation
export {
  isHexPrefixed,
  assertHex32,
  Hex32Schema,
  PublicKeyHexSchema,
  SignatureHexSchema,
} from './hex.js';

// State machine
export {
  State,
  STATE_NAMES,
  stateName,
  canTransitionTo,
  allowedSuccessors,
  isTerminal,
  type ProtocolState,
  type StateName,
} from './states.js';
export { executeState, zeroAction, type StateAction, type StateOutcome } from './executor.js';
export type { ConversationMetadata } from './metadata.js';
export { createConversation, type Conversation, type ConversationOptions } from './conversation.js';

// Presentations
export {
  CREDENTIALS_CONTEXT,
  PRESENTATION_TYPE,
  PROOF_TYPE,
  PRESENTATION_MIME_TYPE,
  VerifiablePresentationSchema,
  PresentationProofSchema,
  createPresentation,
  signPresentation,
  toBase64Attachment,
  proofSigningInput,
  type VerifiablePresentation,
  type UnsignedPresentation,
  type PresentationProof,
  type PresentationSigner,
  type ProofOptions,
} from './presentation.js';
export { verifyPresentation, parseVerifiablePresentation, decodeBase64 } from './verifier.js';

// Key resolution
export {
  createMemoryKeyResolver,
  splitVerificationMethod,
  isDid,
  type KeyResolver,
  type MemoryKeyResolver,
  type ResolvedKey,
} from './keyResolver.js';

// Transport contract
export {
  createMockMessenger,
  type Messenger,
  type MessengerCall,
  type MockMessenger,
} from './messenger.js';
export { ThreadRegistry, type ThreadEntry, type Addressed } from './threading.js';

// Service
export {
  createPresentProofService,
  triggerFor,
  type PresentProofService,
  type PresentProofServiceOptions,
  type ActionEvent,
  type ActionDecision,
  type ActionHandler,
} from './service.js';

// Logging
export {
  createConsoleLogger,
  noopLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type ConsoleLoggerOptions,
} from './logger.js';
