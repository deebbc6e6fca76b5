/**
 * Present-Proof Service
 *
 * Multiplexes conversations by thread id:
 * - Maps each inbound message type to the state it triggers
 * - Asks the host application how to continue (or whether to stop) when a
 *   request, proposal or presentation arrives
 * - Starts conversations for the Verifier (request) and Prover (proposal)
 */

import type { z } from 'zod';
import { createConversation, type Conversation } from './conversation.js';
import { createMessage, ProtocolMessage } from './envelope.js';
import { DecodeError, InvalidTransitionError, UserCancellationError, describeError } from './errors.js';
import type { KeyResolver } from './keyResolver.js';
import { noopLogger, type Logger } from './logger.js';
import {
  MessageType,
  PresentationSchema,
  ProblemReportSchema,
  ProposePresentationSchema,
  RequestPresentationSchema,
  type Presentation,
  type ProposePresentation,
  type RequestPresentation,
} from './messages.js';
import type { ConversationMetadata } from './metadata.js';
import type { Messenger } from './messenger.js';
import { State, canTransitionTo, stateName, type ProtocolState, type StateName } from './states.js';

// ============================================
// Types
// ============================================

interface ActionContext {
  threadId: string;
  myDID: string;
  theirDID: string;
}

export type ActionEvent =
  | (ActionContext & { kind: 'request-received'; request: RequestPresentation })
  | (ActionContext & { kind: 'proposal-received'; proposal: ProposePresentation })
  | (ActionContext & { kind: 'presentation-received'; presentation: Presentation });

export type ActionDecision =
  | {
      kind: 'continue';
      /** Prover: presentation answering the request */
      presentation?: Presentation;
      /** Prover: counter-proposal when not presenting */
      proposePresentation?: ProposePresentation;
      /** Verifier: request re-issued after a proposal */
      request?: RequestPresentation;
    }
  | { kind: 'stop'; reason: string };

export type ActionHandler = (event: ActionEvent) => ActionDecision | Promise<ActionDecision>;

export interface PresentProofServiceOptions {
  messenger: Messenger;
  keyResolver: KeyResolver;
  logger?: Logger;
  /** Defaults to continuing without supplying any payload */
  onAction?: ActionHandler;
}

export interface PresentProofService {
  /** Verifier: open a conversation with a request. Returns the thread id. */
  sendRequestPresentation(request: RequestPresentation, myDID: string, theirDID: string): Promise<string>;

  /** Prover: open a conversation with a proposal. Returns the thread id. */
  sendProposePresentation(proposal: ProposePresentation, myDID: string, theirDID: string): Promise<string>;

  /**
   * Route a received message to its conversation.
   * Throws DecodeError for malformed or foreign messages and
   * InvalidTransitionError for messages the conversation cannot accept now.
   */
  handleInbound(raw: unknown, myDID: string, theirDID: string): Promise<ProtocolState>;

  getState(threadId: string): ProtocolState | undefined;
  getHistory(threadId: string): readonly StateName[] | undefined;
  threadIds(): string[];

  /**
   * Forget a conversation that reached `done`. Returns false, keeping it,
   * while the conversation is still running or if the thread is unknown.
   */
  release(threadId: string): boolean;
}

// ============================================
// Implementation
// ============================================

const continueWithNothing: ActionHandler = () => ({ kind: 'continue' });

/**
 * State an inbound message moves its conversation to.
 */
export function triggerFor(msg: ProtocolMessage): ProtocolState {
  switch (msg.type()) {
    case MessageType.RequestPresentation:
      return State.requestReceived();
    case MessageType.ProposePresentation:
      return State.proposalReceived();
    case MessageType.Presentation:
      return State.presentationReceived();
    case MessageType.Ack:
      return State.done();
    case MessageType.ProblemReport:
      // The peer already gave up: finish without answering
      return State.abandoning();
    default:
      throw new DecodeError(`unsupported message type: ${msg.type()}`);
  }
}

function peek<T extends z.ZodTypeAny>(msg: ProtocolMessage, schema: T): z.output<T> | null {
  const result = schema.safeParse(msg.raw);
  return result.success ? result.data : null;
}

export function createPresentProofService(opts: PresentProofServiceOptions): PresentProofService {
  const { messenger, keyResolver } = opts;
  const logger = opts.logger ?? noopLogger;
  const onAction = opts.onAction ?? continueWithNothing;

  const conversations = new Map<string, Conversation>();

  function conversationFor(threadId: string): Conversation {
    let conversation = conversations.get(threadId);
    if (!conversation) {
      conversation = createConversation({ messenger, logger, label: threadId });
      conversations.set(threadId, conversation);
    }
    return conversation;
  }

  async function start(
    msg: ProtocolMessage,
    trigger: ProtocolState,
    md: Omit<ConversationMetadata, 'msg' | 'keyResolver'>
  ): Promise<string> {
    const threadId = msg.threadId();
    logger.info('Starting conversation', { threadId, type: msg.type(), theirDID: md.theirDID });

    await conversationFor(threadId).advance(trigger, { ...md, msg, keyResolver });
    return threadId;
  }

  /**
   * Ask the host how to go on. A payload that does not decode is not offered
   * to the handler; the executor rejects it and the conversation is abandoned.
   */
  async function decide(msg: ProtocolMessage, context: ActionContext): Promise<ActionDecision | null> {
    switch (msg.type()) {
      case MessageType.RequestPresentation: {
        const request = peek(msg, RequestPresentationSchema);
        return request ? onAction({ ...context, kind: 'request-received', request }) : null;
      }
      case MessageType.ProposePresentation: {
        const proposal = peek(msg, ProposePresentationSchema);
        return proposal ? onAction({ ...context, kind: 'proposal-received', proposal }) : null;
      }
      case MessageType.Presentation: {
        const presentation = peek(msg, PresentationSchema);
        return presentation ? onAction({ ...context, kind: 'presentation-received', presentation }) : null;
      }
      default:
        return null;
    }
  }

  return {
    sendRequestPresentation(request, myDID, theirDID) {
      const msg = createMessage({ ...request, '@type': MessageType.RequestPresentation });
      return start(msg, State.requestSent(), { myDID, theirDID, request });
    },

    sendProposePresentation(proposal, myDID, theirDID) {
      const msg = createMessage({ ...proposal, '@type': MessageType.ProposePresentation });
      return start(msg, State.proposalSent(), { myDID, theirDID, proposePresentation: proposal });
    },

    async handleInbound(raw, myDID, theirDID) {
      const parsed = ProtocolMessage.parse(raw);
      const trigger = triggerFor(parsed);
      const threadId = parsed.parentThreadId() ?? parsed.threadId();

      // The peer opened this thread: answers must be replies, not fresh sends.
      const msg = parsed.hasThread() ? parsed : parsed.withThread(threadId);

      logger.debug('Inbound message', { threadId, type: msg.type(), trigger: trigger.name });

      const report = peek(msg, ProblemReportSchema);
      if (report) {
        logger.warn('Peer abandoned the conversation', { threadId, code: report.description.code });
      }

      // Checked before the host handler runs
      const current = conversations.get(threadId)?.getState() ?? State.start();
      if (!canTransitionTo(current, trigger)) {
        throw new InvalidTransitionError(stateName(current), stateName(trigger));
      }

      const conversation = conversationFor(threadId);
      let md: ConversationMetadata = { msg, myDID, theirDID, keyResolver };

      let decision: ActionDecision | null = null;
      try {
        decision = await decide(msg, { threadId, myDID, theirDID });
      } catch (err) {
        logger.error('Action handler failed', { threadId, reason: describeError(err) });
        md = { ...md, err };
      }

      if (decision?.kind === 'stop') {
        logger.info('Conversation stopped by handler', { threadId, reason: decision.reason });
        md = { ...md, err: new UserCancellationError(decision.reason) };
      } else if (decision) {
        md = {
          ...md,
          presentation: decision.presentation,
          proposePresentation: decision.proposePresentation,
          request: decision.request,
        };
      }

      const state = await conversation.advance(trigger, md);
      logger.debug('Conversation settled', { threadId, state: state.name });
      return state;
    },

    getState: (threadId) => conversations.get(threadId)?.getState(),
    getHistory: (threadId) => conversations.get(threadId)?.getHistory(),
    threadIds: () => [...conversations.keys()],

    release(threadId) {
      if (conversations.get(threadId)?.getState().name !== 'done') {
        return false;
      }
      conversations.delete(threadId);
      logger.debug('Conversation released', { threadId });
      return true;
    },
  };
}
