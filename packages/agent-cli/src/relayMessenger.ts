/**
 * Relay Messenger
 *
 * Messenger implementation for agents sharing a relay room. Every protocol
 * message travels as `{ from, to, message }`; the messenger decorates
 * outbound messages with ids and thread references it learned from the
 * messages it received.
 */

import { z } from 'zod';
import {
  DecodeError,
  ProtocolMessage,
  ThreadRegistry,
  noopLogger,
  type Addressed,
  type Logger,
  type Messenger,
  type RawMessage,
} from '@proofwire/protocol';

export const RelayEnvelopeSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  message: z.record(z.unknown()),
});

export type RelayEnvelope = z.infer<typeof RelayEnvelopeSchema>;

/** Anything that can put a payload on the wire, typically a Transport */
export interface PayloadSink {
  sendPayload(payload: unknown): void;
}

export interface InboundMessage {
  from: string;
  threadId: string;
  message: RawMessage;
}

export class RelayMessenger implements Messenger {
  private readonly threads = new ThreadRegistry();

  constructor(
    private readonly sink: PayloadSink,
    private readonly logger: Logger = noopLogger
  ) {}

  async send(msg: RawMessage, myDID: string, theirDID: string): Promise<void> {
    this.deliver(this.threads.initial(msg, myDID, theirDID));
  }

  async replyTo(msgId: string, msg: RawMessage): Promise<void> {
    this.deliver(this.threads.reply(msgId, msg));
  }

  async replyToNested(threadId: string, msg: RawMessage, myDID: string, theirDID: string): Promise<void> {
    this.deliver(this.threads.nested(threadId, msg, myDID, theirDID));
  }

  /**
   * Unwrap a relay payload. Returns null for payloads addressed to another
   * DID; throws DecodeError for payloads that are not protocol envelopes.
   */
  receive(payload: unknown, myDID: string): InboundMessage | null {
    const result = RelayEnvelopeSchema.safeParse(payload);
    if (!result.success) {
      throw new DecodeError(`invalid relay envelope: ${result.error.issues[0]?.message}`, { cause: result.error });
    }

    const { from, to, message } = result.data;
    if (to !== myDID) {
      this.logger.debug('Ignoring payload for another agent', { to });
      return null;
    }

    const msg = ProtocolMessage.parse(message);
    this.threads.remember(msg, to, from);

    return { from, threadId: msg.parentThreadId() ?? msg.threadId(), message };
  }

  /** Stop tracking a finished thread */
  forget(threadId: string): void {
    const dropped = this.threads.forget(threadId);
    this.logger.debug('Forgot thread', { threadId, messages: dropped });
  }

  private deliver({ msg, myDID, theirDID }: Addressed) {
    const envelope: RelayEnvelope = { from: myDID, to: theirDID, message: msg };
    this.logger.debug('Sending', { type: msg['@type'], to: theirDID });
    this.sink.sendPayload(envelope);
  }
}
