/**
 * Messenger
 *
 * The narrow transport contract the state machine runs its actions against.
 * Delivery, retries and thread decoration belong to the implementation.
 */

import type { RawMessage } from './envelope.js';

export interface Messenger {
  /** Deliver the first message of a new conversation */
  send(msg: RawMessage, myDID: string, theirDID: string): Promise<void>;

  /** Reply within the thread of a previously received message */
  replyTo(msgId: string, msg: RawMessage): Promise<void>;

  /** Reply addressed by thread id rather than message id (problem reports) */
  replyToNested(threadId: string, msg: RawMessage, myDID: string, theirDID: string): Promise<void>;
}

export type MessengerCall =
  | { kind: 'send'; msg: RawMessage; myDID: string; theirDID: string }
  | { kind: 'replyTo'; msgId: string; msg: RawMessage }
  | { kind: 'replyToNested'; threadId: string; msg: RawMessage; myDID: string; theirDID: string };

export interface MockMessenger extends Messenger {
  /** Every call, in order */
  readonly calls: readonly MessengerCall[];
  /** Make the next call reject with `err` (after recording it) */
  failNext(err: Error): void;
  /** Invoked after each recorded call, e.g. to forward it to a peer */
  onCall?: (call: MessengerCall) => Promise<void> | void;
}

/**
 * In-memory messenger that records calls instead of delivering them.
 */
export function createMockMessenger(): MockMessenger {
  const calls: MessengerCall[] = [];
  let pendingFailure: Error | null = null;

  const messenger: MockMessenger = {
    calls,
    failNext(err: Error) {
      pendingFailure = err;
    },
    send: (msg, myDID, theirDID) => record({ kind: 'send', msg, myDID, theirDID }),
    replyTo: (msgId, msg) => record({ kind: 'replyTo', msgId, msg }),
    replyToNested: (threadId, msg, myDID, theirDID) =>
      record({ kind: 'replyToNested', threadId, msg, myDID, theirDID }),
  };

  async function record(call: MessengerCall): Promise<void> {
    calls.push(call);

    if (pendingFailure) {
      const err = pendingFailure;
      pendingFailure = null;
      throw err;
    }

    await messenger.onCall?.(call);
  }

  return messenger;
}
