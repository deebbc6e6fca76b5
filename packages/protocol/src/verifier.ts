/**
 * Presentation Verifier
 *
 * Decodes each attachment of a received presentation and checks every proof
 * it carries against keys obtained from the resolver. The first failure
 * aborts the whole call: a presentation is accepted entirely or not at all.
 *
 * Only base64 attachment data is supported. Attachments that reference
 * their content through `links` or embed it as inline `json` are rejected
 * with a DecodeError.
 */

import { hashMessage, recoverPublicKey, type Hex } from 'viem';
import { DecodeError, VerificationError, describeError } from './errors.js';
import type { KeyResolver, ResolvedKey } from './keyResolver.js';
import type { Attachment } from './messages.js';
import {
  VerifiablePresentationSchema,
  listProofs,
  proofSigningInput,
  unsignedPart,
  type PresentationProof,
  type UnsignedPresentation,
  type VerifiablePresentation,
} from './presentation.js';

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode standard, padded base64. Buffer.from silently skips characters
 * outside the alphabet, so the input is checked first.
 */
export function decodeBase64(value: string): Buffer {
  if (!BASE64_REGEX.test(value)) {
    throw new DecodeError('decode string: illegal base64 data');
  }
  return Buffer.from(value, 'base64');
}

/**
 * Verify every attachment in order.
 * @returns the parsed presentations, in attachment order
 */
export async function verifyPresentation(
  resolver: KeyResolver,
  attachments: readonly Attachment[]
): Promise<VerifiablePresentation[]> {
  const presentations: VerifiablePresentation[] = [];

  for (const [index, attachment] of attachments.entries()) {
    const { data } = attachment;
    const label = attachment['@id'] ?? `#${index}`;

    if (data.base64 === undefined) {
      const encoding = data.links !== undefined ? 'links' : data.json !== undefined ? 'json' : 'none';
      throw new DecodeError(`attachment ${label}: unsupported data encoding (${encoding}), expected base64`);
    }

    const raw = decodeBase64(data.base64);
    presentations.push(await parseVerifiablePresentation(raw, resolver));
  }

  return presentations;
}

/**
 * Parse a serialized verifiable presentation and check its proofs.
 */
export async function parseVerifiablePresentation(
  raw: Uint8Array | string,
  resolver: KeyResolver
): Promise<VerifiablePresentation> {
  const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`new presentation: ${describeError(err)}`, { cause: err });
  }

  const result = VerifiablePresentationSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DecodeError(`new presentation: ${issue?.path.join('.') || 'document'}: ${issue?.message}`, {
      cause: result.error,
    });
  }

  const presentation = result.data;
  const unsigned = unsignedPart(presentation);

  for (const proof of listProofs(presentation)) {
    await verifyProof(unsigned, proof, resolver);
  }

  return presentation;
}

async function verifyProof(
  presentation: UnsignedPresentation,
  proof: PresentationProof,
  resolver: KeyResolver
): Promise<void> {
  const { proofValue, ...options } = proof;

  let key: ResolvedKey;
  try {
    key = await resolver.resolveKey(options.verificationMethod);
  } catch (err) {
    throw new VerificationError(`resolve key ${options.verificationMethod}: ${describeError(err)}`, {
      cause: err,
    });
  }

  let signer: Hex;
  try {
    signer = await recoverPublicKey({
      hash: hashMessage(proofSigningInput(presentation, options)),
      signature: proofValue,
    });
  } catch (err) {
    throw new VerificationError(`recover signer of ${options.verificationMethod}: ${describeError(err)}`, {
      cause: err,
    });
  }

  if (signer.toLowerCase() !== key.publicKeyHex.toLowerCase()) {
    throw new VerificationError(`signature does not match key ${options.verificationMethod}`);
  }
}
