/**
 * State Executors
 *
 * Per-state decision logic. Executing a state decides the follow-up state
 * and builds the network effect of the step as a deferred action; nothing is
 * sent until the driver has validated the transition and runs the action.
 */

import {
  AbandonCode,
  MissingDataError,
  NoOpExecutionError,
  ThreadResolutionError,
  UnimplementedError,
  describeError,
  isUserCancellation,
} from './errors.js';
import { MessageType, PresentationSchema } from './messages.js';
import type { ConversationMetadata } from './metadata.js';
import type { Messenger } from './messenger.js';
import { State, type ProtocolState } from './states.js';
import { verifyPresentation } from './verifier.js';

export type StateAction = (messenger: Messenger) => Promise<void>;

export interface StateOutcome {
  readonly next: ProtocolState;
  readonly action: StateAction;
}

/** Action with no network effect */
export const zeroAction: StateAction = () => Promise.resolve();

/**
 * Execute `state`, returning the state to run next and the action to commit.
 * The `noop` state marks that there is nothing left to run.
 */
export async function executeState(state: ProtocolState, md: ConversationMetadata): Promise<StateOutcome> {
  switch (state.name) {
    case 'start':
      throw new UnimplementedError(`${state.name}: is not implemented yet`);
    case 'request-sent':
      return executeRequestSent(md);
    case 'proposal-sent':
      return executeProposalSent(md);
    case 'request-received':
      return {
        next: md.presentation ? State.presentationSent() : State.proposalSent(),
        action: zeroAction,
      };
    case 'proposal-received':
      return { next: State.requestSent(), action: zeroAction };
    case 'presentation-sent':
      return executePresentationSent(md);
    case 'presentation-received':
      return executePresentationReceived(md);
    case 'abandoning':
      return executeAbandoning(state.code, md);
    case 'done':
      return { next: State.noOp(), action: zeroAction };
    case 'noop':
      throw new NoOpExecutionError('cannot execute no-op');
    default:
      return assertNever(state);
  }
}

function assertNever(state: never): never {
  throw new Error(`unknown state: ${JSON.stringify(state)}`);
}

// ============================================
// Verifier / Prover first moves
// ============================================

/** Unconditional send of the conversation's first message */
function forwardInitial(md: ConversationMetadata): StateAction {
  return (messenger) => messenger.send({ ...md.msg.raw }, md.myDID, md.theirDID);
}

function executeRequestSent(md: ConversationMetadata): StateOutcome {
  if (!md.msg.hasThread()) {
    return { next: State.noOp(), action: forwardInitial(md) };
  }

  const { request } = md;
  if (!request) {
    throw new MissingDataError('request was not provided');
  }

  return {
    next: State.noOp(),
    action: (messenger) =>
      messenger.replyTo(md.msg.id(), { ...request, '@type': MessageType.RequestPresentation }),
  };
}

function executeProposalSent(md: ConversationMetadata): StateOutcome {
  if (!md.msg.hasThread()) {
    return { next: State.noOp(), action: forwardInitial(md) };
  }

  const { proposePresentation } = md;
  if (!proposePresentation) {
    throw new MissingDataError('propose-presentation was not provided');
  }

  return {
    next: State.noOp(),
    action: (messenger) =>
      messenger.replyTo(md.msg.id(), { ...proposePresentation, '@type': MessageType.ProposePresentation }),
  };
}

// ============================================
// Presentation
// ============================================

function executePresentationSent(md: ConversationMetadata): StateOutcome {
  const { presentation } = md;
  if (!presentation) {
    throw new MissingDataError('presentation was not provided');
  }

  return {
    next: State.noOp(),
    action: (messenger) => messenger.replyTo(md.msg.id(), { ...presentation, '@type': MessageType.Presentation }),
  };
}

async function executePresentationReceived(md: ConversationMetadata): Promise<StateOutcome> {
  const presentation = md.msg.decode(PresentationSchema);

  // Rejections keep their DecodeError / VerificationError kind.
  await verifyPresentation(md.keyResolver, presentation['presentations~attach']);

  const msgId = md.msg.id();
  return {
    next: State.done(),
    action: (messenger) => messenger.replyTo(msgId, { '@type': MessageType.Ack }),
  };
}

// ============================================
// Abandoning
// ============================================

function executeAbandoning(code: string | undefined, md: ConversationMetadata): StateOutcome {
  // No code: stop without notifying the other agent
  if (!code) {
    return { next: State.done(), action: zeroAction };
  }

  const reported = isUserCancellation(md.err) ? AbandonCode.Rejected : code;

  let thid: string;
  try {
    thid = md.msg.threadId();
  } catch (err) {
    throw new ThreadResolutionError(`threadID: ${describeError(err)}`, { cause: err });
  }

  return {
    next: State.done(),
    action: (messenger) =>
      messenger.replyToNested(
        thid,
        { '@type': MessageType.ProblemReport, description: { code: reported } },
        md.myDID,
        md.theirDID
      ),
  };
}
