/**
 * Protocol Message Envelope
 *
 * Wraps a DIDComm JSON message (received or about to be sent) and exposes
 * the handful of accessors the state machine relies on: id, type, thread
 * presence, thread id and typed decoding of the payload.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { ThreadSchema } from './messages.js';
import { DecodeError, ThreadResolutionError } from './errors.js';

export type RawMessage = Record<string, unknown>;

const HeaderSchema = z.object({
  '@id': z.string().min(1).optional(),
  '@type': z.string().min(1),
  '~thread': ThreadSchema.optional(),
});

const EnvelopeSchema = HeaderSchema.passthrough();

type Header = z.infer<typeof HeaderSchema>;

export class ProtocolMessage {
  private constructor(
    readonly raw: Readonly<RawMessage>,
    private readonly header: Header
  ) {}

  /**
   * Validate the envelope header of a JSON value.
   * Throws DecodeError if it is not an object with a `@type`.
   */
  static parse(value: unknown): ProtocolMessage {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new DecodeError('message must be a JSON object');
    }

    const result = EnvelopeSchema.safeParse(value);
    if (!result.success) {
      throw new DecodeError(`invalid message envelope: ${result.error.issues[0]?.message}`, {
        cause: result.error,
      });
    }

    return new ProtocolMessage({ ...result.data }, result.data);
  }

  /** Message id, or an empty string when the sender did not set one */
  id(): string {
    return this.header['@id'] ?? '';
  }

  type(): string {
    return this.header['@type'];
  }

  /**
   * Whether the message carries a thread decorator. A message without one
   * opens a new conversation and must be sent rather than replied to.
   */
  hasThread(): boolean {
    return '~thread' in this.raw;
  }

  /**
   * Thread id of the message: `~thread.thid`, or the message's own id for
   * the first message of a thread.
   */
  threadId(): string {
    const thid = this.header['~thread']?.thid;
    if (thid) {
      return thid;
    }

    if (this.header['@id']) {
      return this.header['@id'];
    }

    throw new ThreadResolutionError('threadID not found');
  }

  parentThreadId(): string | undefined {
    return this.header['~thread']?.pthid;
  }

  /**
   * Decode the message into a typed payload.
   * Throws DecodeError if the payload does not match the schema.
   */
  decode<T extends z.ZodTypeAny>(schema: T): z.output<T> {
    const result = schema.safeParse(this.raw);
    if (!result.success) {
      throw new DecodeError(`decode ${this.type()}: ${result.error.issues[0]?.message}`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * Copy of this message joined to `threadId`, used for inbound messages
   * that open a thread so that the answer is a reply rather than a fresh send.
   */
  withThread(threadId: string): ProtocolMessage {
    const thread = { ...this.header['~thread'], thid: threadId };
    return new ProtocolMessage({ ...this.raw, '~thread': thread }, { ...this.header, '~thread': thread });
  }
}

/**
 * Build an outbound message with a fresh `@id`.
 */
export function createMessage(payload: RawMessage & { '@type': string }): ProtocolMessage {
  return ProtocolMessage.parse({ ...payload, '@id': randomUUID() });
}
