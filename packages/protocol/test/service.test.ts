/**
 * End-to-end tests: a Verifier and a Prover service talking through
 * in-memory messengers.
 */

import { describe, it, expect } from 'vitest';
import {
  MessageType,
  ProtocolMessage,
  ThreadRegistry,
  createMockMessenger,
  createPresentProofService,
  type ActionEvent,
  type ActionHandler,
  type Addressed,
  type MessengerCall,
  type MockMessenger,
  type PresentProofService,
  type RawMessage,
} from '../src/index.js';
import { PROVER_DID, VERIFIER_DID, createResolver, sampleRequest, signedPresentation } from './fixtures.js';

interface Party {
  did: string;
  service: PresentProofService;
  messenger: MockMessenger;
  registry: ThreadRegistry;
  events: ActionEvent[];
}

interface Delivery {
  to: Party;
  from: Party;
  msg: RawMessage;
}

function address(registry: ThreadRegistry, call: MessengerCall): Addressed {
  switch (call.kind) {
    case 'send':
      return registry.initial(call.msg, call.myDID, call.theirDID);
    case 'replyTo':
      return registry.reply(call.msgId, call.msg);
    case 'replyToNested':
      return registry.nested(call.threadId, call.msg, call.myDID, call.theirDID);
  }
}

/**
 * Wire two parties together. Outbound messages are queued and only delivered
 * by `pump`, so a conversation never waits on its own answer.
 */
function createNetwork(verifierActions: ActionHandler, proverActions: ActionHandler) {
  const queue: Delivery[] = [];
  const delivered: RawMessage[] = [];

  function party(did: string, onAction: ActionHandler): Party {
    const messenger = createMockMessenger();
    const events: ActionEvent[] = [];
    const service = createPresentProofService({
      messenger,
      keyResolver: createResolver(),
      onAction: (event) => {
        events.push(event);
        return onAction(event);
      },
    });
    return { did, service, messenger, registry: new ThreadRegistry(), events };
  }

  const verifier = party(VERIFIER_DID, verifierActions);
  const prover = party(PROVER_DID, proverActions);

  const links: Array<[Party, Party]> = [
    [verifier, prover],
    [prover, verifier],
  ];
  for (const [self, peer] of links) {
    self.messenger.onCall = (call) => {
      queue.push({ to: peer, from: self, msg: address(self.registry, call).msg });
    };
  }

  async function pump() {
    for (let next = queue.shift(); next; next = queue.shift()) {
      delivered.push(next.msg);
      next.to.registry.remember(ProtocolMessage.parse(next.msg), next.to.did, next.from.did);
      await next.to.service.handleInbound(next.msg, next.to.did, next.from.did);
    }
  }

  return { verifier, prover, delivered, pump };
}

const continueAlways: ActionHandler = () => ({ kind: 'continue' });

describe('PresentProofService', () => {
  it('should complete request, presentation and ack', async () => {
    const presentation = await signedPresentation();
    const net = createNetwork(continueAlways, () => ({ kind: 'continue', presentation }));

    const threadId = await net.verifier.service.sendRequestPresentation(sampleRequest, VERIFIER_DID, PROVER_DID);
    expect(net.verifier.service.getState(threadId)).toEqual({ name: 'request-sent' });

    await net.pump();

    expect(net.verifier.service.getHistory(threadId)).toEqual([
      'start',
      'request-sent',
      'presentation-received',
      'done',
    ]);
    expect(net.prover.service.getHistory(threadId)).toEqual([
      'start',
      'request-received',
      'presentation-sent',
      'done',
    ]);

    expect(net.delivered.map((msg) => msg['@type'])).toEqual([
      MessageType.RequestPresentation,
      MessageType.Presentation,
      MessageType.Ack,
    ]);
    expect(net.delivered[1]?.['~thread']).toEqual({ thid: threadId });
  });

  it('should hand the decoded payload to the action handler', async () => {
    const presentation = await signedPresentation();
    const net = createNetwork(continueAlways, () => ({ kind: 'continue', presentation }));

    const threadId = await net.verifier.service.sendRequestPresentation(sampleRequest, VERIFIER_DID, PROVER_DID);
    await net.pump();

    expect(net.prover.events).toEqual([
      {
        kind: 'request-received',
        threadId,
        myDID: PROVER_DID,
        theirDID: VERIFIER_DID,
        request: { ...sampleRequest, '@type': MessageType.RequestPresentation },
      },
    ]);
    expect(net.verifier.events.map((event) => event.kind)).toEqual(['presentation-received']);
  });

  it('should negotiate through a counter-proposal', async () => {
    const presentation = await signedPresentation();
    let requests = 0;

    const net = createNetwork(
      () => ({ kind: 'continue', request: sampleRequest }),
      () =>
        ++requests === 1
          ? { kind: 'continue', proposePresentation: { comment: 'a different credential' } }
          : { kind: 'continue', presentation }
    );

    const threadId = await net.verifier.service.sendRequestPresentation(sampleRequest, VERIFIER_DID, PROVER_DID);
    await net.pump();

    expect(net.verifier.service.getHistory(threadId)).toEqual([
      'start',
      'request-sent',
      'proposal-received',
      'request-sent',
      'presentation-received',
      'done',
    ]);
    expect(net.prover.service.getHistory(threadId)).toEqual([
      'start',
      'request-received',
      'proposal-sent',
      'request-received',
      'presentation-sent',
      'done',
    ]);
  });

  it('should let the prover open with a proposal', async () => {
    const presentation = await signedPresentation();
    const net = createNetwork(
      () => ({ kind: 'continue', request: sampleRequest }),
      () => ({ kind: 'continue', presentation })
    );

    const threadId = await net.prover.service.sendProposePresentation(
      { comment: 'I can prove membership' },
      PROVER_DID,
      VERIFIER_DID
    );
    await net.pump();

    expect(net.prover.service.getHistory(threadId)).toEqual([
      'start',
      'proposal-sent',
      'request-received',
      'presentation-sent',
      'done',
    ]);
    expect(net.verifier.service.getHistory(threadId)).toEqual([
      'start',
      'proposal-received',
      'request-sent',
      'presentation-received',
      'done',
    ]);
  });

  it('should report rejected when the handler stops', async () => {
    const net = createNetwork(continueAlways, () => ({ kind: 'stop', reason: 'not sharing that' }));

    const threadId = await net.verifier.service.sendRequestPresentation(sampleRequest, VERIFIER_DID, PROVER_DID);
    await net.pump();

    expect(net.prover.service.getHistory(threadId)).toEqual(['start', 'request-received', 'abandoning', 'done']);
    expect(net.verifier.service.getHistory(threadId)).toEqual(['start', 'request-sent', 'abandoning', 'done']);

    const report = net.delivered[1];
    expect(report).toMatchObject({
      '@type': MessageType.ProblemReport,
      description: { code: 'rejected' },
      '~thread': { pthid: threadId },
    });

    // The verifier does not answer a problem report
    expect(net.delivered).toHaveLength(2);
  });

  it('should not offer a malformed request to the handler', async () => {
    const net = createNetwork(continueAlways, continueAlways);

    await net.prover.service.handleInbound(
      { '@id': 'bad-request', '@type': MessageType.RequestPresentation, comment: 'no attachments' },
      PROVER_DID,
      VERIFIER_DID
    );

    expect(net.prover.events).toEqual([]);
    expect(net.prover.service.getState('bad-request')).toEqual({ name: 'done' });
    expect(net.prover.messenger.calls).toEqual([
      {
        kind: 'replyToNested',
        threadId: 'bad-request',
        msg: { '@type': MessageType.ProblemReport, description: { code: 'internal' } },
        myDID: PROVER_DID,
        theirDID: VERIFIER_DID,
      },
    ]);
  });

  it('should abandon with internal when the action handler fails', async () => {
    const net = createNetwork(continueAlways, async () => {
      throw new Error('signing key unavailable');
    });

    const state = await net.prover.service.handleInbound(
      { ...sampleRequest, '@id': 'req-1', '@type': MessageType.RequestPresentation },
      PROVER_DID,
      VERIFIER_DID
    );

    expect(state).toEqual({ name: 'done' });
    expect(net.prover.service.getHistory('req-1')).toEqual(['start', 'request-received', 'abandoning', 'done']);
    expect(net.prover.messenger.calls).toEqual([
      {
        kind: 'replyToNested',
        threadId: 'req-1',
        msg: { '@type': MessageType.ProblemReport, description: { code: 'internal' } },
        myDID: PROVER_DID,
        theirDID: VERIFIER_DID,
      },
    ]);
  });

  it('should refuse a repeated request without asking the handler again', async () => {
    const presentation = await signedPresentation();
    const net = createNetwork(continueAlways, () => ({ kind: 'continue', presentation }));
    const request = { ...sampleRequest, '@id': 'req-1', '@type': MessageType.RequestPresentation };
    net.prover.registry.remember(ProtocolMessage.parse(request), PROVER_DID, VERIFIER_DID);

    await net.prover.service.handleInbound(request, PROVER_DID, VERIFIER_DID);
    expect(net.prover.service.getState('req-1')).toEqual({ name: 'presentation-sent' });

    await expect(net.prover.service.handleInbound(request, PROVER_DID, VERIFIER_DID)).rejects.toMatchObject({
      kind: 'invalid-transition',
      from: 'presentation-sent',
      to: 'request-received',
    });
    expect(net.prover.events).toHaveLength(1);
    expect(net.prover.service.getState('req-1')).toEqual({ name: 'presentation-sent' });
  });

  it('should release only finished conversations', async () => {
    const presentation = await signedPresentation();
    const net = createNetwork(continueAlways, () => ({ kind: 'continue', presentation }));

    const threadId = await net.verifier.service.sendRequestPresentation(sampleRequest, VERIFIER_DID, PROVER_DID);
    expect(net.verifier.service.release(threadId)).toBe(false);

    await net.pump();

    expect(net.verifier.service.release(threadId)).toBe(true);
    expect(net.verifier.service.getState(threadId)).toBeUndefined();
    expect(net.verifier.service.threadIds()).toEqual([]);
    expect(net.verifier.service.release('unknown-thread')).toBe(false);
  });

  it('should reject messages of other protocols', async () => {
    const net = createNetwork(continueAlways, continueAlways);

    await expect(
      net.verifier.service.handleInbound(
        { '@id': 'x', '@type': 'https://didcomm.org/basicmessage/2.0/message' },
        VERIFIER_DID,
        PROVER_DID
      )
    ).rejects.toMatchObject({
      kind: 'decode',
      message: 'unsupported message type: https://didcomm.org/basicmessage/2.0/message',
    });
  });

  it('should not open a conversation for a message that cannot start one', async () => {
    const net = createNetwork(continueAlways, continueAlways);

    await expect(
      net.verifier.service.handleInbound({ '@id': 'stray-ack', '@type': MessageType.Ack }, VERIFIER_DID, PROVER_DID)
    ).rejects.toMatchObject({ kind: 'invalid-transition', from: 'start', to: 'done' });

    expect(net.verifier.service.threadIds()).toEqual([]);
  });

  it('should reject a message that is not an object', async () => {
    const net = createNetwork(continueAlways, continueAlways);
    await expect(net.verifier.service.handleInbound('hello', VERIFIER_DID, PROVER_DID)).rejects.toMatchObject({
      kind: 'decode',
      message: 'message must be a JSON object',
    });
  });

  it('should keep conversations on different threads apart', async () => {
    const presentation = await signedPresentation();
    const net = createNetwork(continueAlways, () => ({ kind: 'continue', presentation }));

    const first = await net.verifier.service.sendRequestPresentation(sampleRequest, VERIFIER_DID, PROVER_DID);
    const second = await net.verifier.service.sendRequestPresentation(sampleRequest, VERIFIER_DID, PROVER_DID);
    expect(first).not.toBe(second);

    await net.pump();

    expect(net.verifier.service.threadIds().sort()).toEqual([first, second].sort());
    expect(net.verifier.service.getState(first)).toEqual({ name: 'done' });
    expect(net.verifier.service.getState(second)).toEqual({ name: 'done' });
  });
});
