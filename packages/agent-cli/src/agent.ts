/**
 * Present-Proof Agent
 *
 * Wires a relay Transport, a RelayMessenger and a PresentProofService
 * together for one side of the exchange:
 * - The verifier requests a presentation once the peer is in the room,
 *   re-issues its request after a proposal and accepts valid presentations
 * - The prover answers every request with a presentation signed by its key
 *
 * The agent settles when its conversation reaches `done`.
 */

import { randomUUID } from 'crypto';
import { privateKeyToAccount } from 'viem/accounts';
import {
  PRESENTATION_MIME_TYPE,
  createMemoryKeyResolver,
  createPresentProofService,
  createPresentation,
  describeError,
  signPresentation,
  toBase64Attachment,
  type ActionHandler,
  type Logger,
  type RequestPresentation,
  type StateName,
} from '@proofwire/protocol';
import type { AgentConfig } from './cli.js';
import { RelayMessenger } from './relayMessenger.js';
import { Transport } from './transport.js';

/** Fragment under which each agent's key is registered */
export const KEY_FRAGMENT = 'key-1';

export interface AgentOutcome {
  threadId: string;
  history: readonly StateName[];
  /** Whether the exchange finished without being abandoned */
  succeeded: boolean;
}

export interface Agent {
  /** Resolves once the conversation is done; rejects on transport failure */
  finished: Promise<AgentOutcome>;
  close(): void;
}

function requestFor(peerDid: string): RequestPresentation {
  return {
    comment: `Prove control of ${peerDid}`,
    'request_presentations~attach': [
      {
        '@id': 'challenge',
        'mime-type': 'application/json',
        data: { json: { holder: peerDid, challenge: randomUUID() } },
      },
    ],
  };
}

export function startAgent(config: AgentConfig, logger: Logger): Agent {
  const account = privateKeyToAccount(config.key);

  const keyResolver = createMemoryKeyResolver();
  keyResolver.register(config.did, { [KEY_FRAGMENT]: account.publicKey });
  keyResolver.register(config.peerDid, { [KEY_FRAGMENT]: config.peerKey });

  const onAction: ActionHandler = async (event) => {
    switch (event.kind) {
      case 'request-received': {
        logger.info('Presentation requested', { threadId: event.threadId, comment: event.request.comment });
        const vp = await signPresentation(createPresentation(config.did), {
          account,
          verificationMethod: `${config.did}#${KEY_FRAGMENT}`,
        });
        return {
          kind: 'continue',
          presentation: {
            comment: `Presentation from ${config.did}`,
            'presentations~attach': [toBase64Attachment(vp)],
          },
        };
      }
      case 'proposal-received':
        logger.info('Proposal received, re-issuing request', { threadId: event.threadId });
        return { kind: 'continue', request: requestFor(config.peerDid) };
      case 'presentation-received':
        logger.info('Presentation received', {
          threadId: event.threadId,
          attachments: event.presentation['presentations~attach'].length,
          mimeType: PRESENTATION_MIME_TYPE,
        });
        return { kind: 'continue' };
    }
  };

  let transport: Transport;
  const messenger = new RelayMessenger({ sendPayload: (payload) => transport.sendPayload(payload) }, logger);
  const service = createPresentProofService({ messenger, keyResolver, logger, onAction });

  let started = false;
  let settled = false;
  let resolveFinished: (outcome: AgentOutcome) => void = () => {};
  let rejectFinished: (err: Error) => void = () => {};
  const finished = new Promise<AgentOutcome>((resolve, reject) => {
    resolveFinished = resolve;
    rejectFinished = reject;
  });

  function fail(err: unknown) {
    if (settled) return;
    settled = true;
    logger.error('Agent failed', { reason: describeError(err) });
    rejectFinished(err instanceof Error ? err : new Error(String(err)));
  }

  function settleIfDone(threadId: string) {
    const state = service.getState(threadId);
    if (settled || state?.name !== 'done') return;

    settled = true;
    const history = service.getHistory(threadId) ?? [];
    const succeeded = !history.includes('abandoning');
    logger.info(succeeded ? 'Exchange complete' : 'Exchange abandoned', { threadId, history: history.join(' -> ') });
    service.release(threadId);
    messenger.forget(threadId);
    resolveFinished({ threadId, history, succeeded });
  }

  // Helper: start the exchange if not already started
  function tryStart(memberCount: number) {
    if (config.role !== 'verifier' || started) {
      return;
    }

    if (memberCount < 2) {
      logger.info(`Waiting for peer... (memberCount=${memberCount})`);
      return;
    }

    started = true;
    service
      .sendRequestPresentation(requestFor(config.peerDid), config.did, config.peerDid)
      .then((threadId) => {
        logger.info('Request sent', { threadId, to: config.peerDid });
        settleIfDone(threadId);
      })
      .catch(fail);
  }

  async function handlePayload(payload: unknown) {
    const inbound = messenger.receive(payload, config.did);
    if (!inbound) return;

    await service.handleInbound(inbound.message, config.did, inbound.from);
    settleIfDone(inbound.threadId);
  }

  transport = new Transport(config.relay, config.room, {
    onJoined: (clientId, memberCount) => {
      logger.info(`Joined room: ${config.room} (members=${memberCount})`, { clientId, role: config.role });
      tryStart(memberCount);
    },
    onPeerJoined: (peerId, memberCount) => {
      logger.info(`Peer joined: ${peerId} (members=${memberCount})`);
      tryStart(memberCount);
    },
    onPeerPayload: (payload) => {
      handlePayload(payload).catch(fail);
    },
    onError: fail,
    onClose: () => {
      logger.info('Connection closed');
      fail(new Error('relay connection closed'));
    },
  });

  return {
    finished,
    close: () => transport.close(),
  };
}
