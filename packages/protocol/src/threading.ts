/**
 * Thread bookkeeping for Messenger implementations.
 *
 * A messenger has to turn `replyTo(msgId, msg)` into a message addressed to
 * the right party on the right thread. The registry remembers, for every
 * message seen, its thread and both parties, and decorates outbound
 * messages accordingly.
 */

import { randomUUID } from 'crypto';
import type { ProtocolMessage, RawMessage } from './envelope.js';
import { ThreadResolutionError } from './errors.js';

export interface ThreadEntry {
  threadId: string;
  myDID: string;
  theirDID: string;
}

export interface Addressed {
  msg: RawMessage;
  myDID: string;
  theirDID: string;
}

export class ThreadRegistry {
  private readonly entries = new Map<string, ThreadEntry>();

  /**
   * Remember a message that was received (or sent) between two parties.
   */
  remember(msg: ProtocolMessage, myDID: string, theirDID: string): void {
    const id = msg.id();
    if (!id) {
      return;
    }
    this.entries.set(id, { threadId: msg.parentThreadId() ?? msg.threadId(), myDID, theirDID });
  }

  lookup(msgId: string): ThreadEntry | undefined {
    return this.entries.get(msgId);
  }

  /** Drop every message remembered on `threadId`. Returns how many were dropped. */
  forget(threadId: string): number {
    let dropped = 0;
    for (const [msgId, entry] of this.entries) {
      if (entry.threadId === threadId) {
        this.entries.delete(msgId);
        dropped++;
      }
    }
    return dropped;
  }

  /** First message of a thread: only gets an id */
  initial(msg: RawMessage, myDID: string, theirDID: string): Addressed {
    return { msg: { ...msg, '@id': messageId(msg) }, myDID, theirDID };
  }

  /** Reply on the thread of `msgId` */
  reply(msgId: string, msg: RawMessage): Addressed {
    const entry = this.entries.get(msgId);
    if (!entry) {
      throw new ThreadResolutionError(`no thread known for message ${msgId}`);
    }

    return {
      msg: { ...msg, '@id': messageId(msg), '~thread': { thid: entry.threadId } },
      myDID: entry.myDID,
      theirDID: entry.theirDID,
    };
  }

  /** Message opening a thread nested under `threadId` */
  nested(threadId: string, msg: RawMessage, myDID: string, theirDID: string): Addressed {
    return {
      msg: { ...msg, '@id': messageId(msg), '~thread': { pthid: threadId } },
      myDID,
      theirDID,
    };
  }
}

function messageId(msg: RawMessage): string {
  const id = msg['@id'];
  return typeof id === 'string' && id.length > 0 ? id : randomUUID();
}
