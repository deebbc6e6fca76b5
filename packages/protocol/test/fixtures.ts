/**
 * Shared test fixtures: parties, keys and message builders.
 */

import { privateKeyToAccount } from 'viem/accounts';
import {
  createMemoryKeyResolver,
  createMessage,
  createPresentation,
  MessageType,
  ProtocolMessage,
  signPresentation,
  toBase64Attachment,
  type ConversationMetadata,
  type MemoryKeyResolver,
  type Presentation,
  type RequestPresentation,
} from '../src/index.js';

export const VERIFIER_DID = 'did:example:verifier';
export const PROVER_DID = 'did:example:prover';

// Placeholder keys, never used outside tests
export const proverAccount = privateKeyToAccount(`0x${'11'.repeat(32)}`);
export const otherAccount = privateKeyToAccount(`0x${'22'.repeat(32)}`);

export const PROVER_KEY_ID = `${PROVER_DID}#key-1`;

export function createResolver(): MemoryKeyResolver {
  const resolver = createMemoryKeyResolver();
  resolver.register(PROVER_DID, { 'key-1': proverAccount.publicKey });
  return resolver;
}

export const sampleRequest: RequestPresentation = {
  comment: 'proof of membership',
  'request_presentations~attach': [
    {
      '@id': 'definition-1',
      'mime-type': 'application/json',
      data: { json: { input_descriptors: [{ id: 'membership' }] } },
    },
  ],
};

export async function signedPresentation(
  signer = proverAccount,
  verificationMethod = PROVER_KEY_ID
): Promise<Presentation> {
  const vp = await signPresentation(createPresentation(PROVER_DID, [{ id: 'urn:credential:1' }]), {
    account: signer,
    verificationMethod,
  });

  return {
    comment: 'here you go',
    'presentations~attach': [toBase64Attachment(vp, 'vp-1')],
  };
}

/** An inbound message as the other party would have sent it */
export function inbound(raw: Record<string, unknown>): ProtocolMessage {
  return ProtocolMessage.parse(raw);
}

export function initialRequestMessage(): ProtocolMessage {
  return createMessage({ ...sampleRequest, '@type': MessageType.RequestPresentation });
}

export function metadata(msg: ProtocolMessage, extra: Partial<ConversationMetadata> = {}): ConversationMetadata {
  return {
    msg,
    myDID: VERIFIER_DID,
    theirDID: PROVER_DID,
    keyResolver: createResolver(),
    ...extra,
  };
}
