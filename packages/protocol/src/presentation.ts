/**
 * Verifiable Presentations
 *
 * Schema of the presentation documents carried in `presentations~attach`,
 * and the prover-side helpers that sign them and pack them as attachments.
 *
 * Proof format: `EcdsaSecp256k1RecoverySignature2020`. The signer signs
 * (EIP-191 personal message) the canonical JSON of
 * `{ presentation: <document without proof>, proof: <proof without proofValue> }`.
 * A presentation may carry several proofs; each one is checked on its own.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { LocalAccount } from 'viem';
import { canonicalStringify } from './canonical.js';
import { SignatureHexSchema } from './hex.js';
import type { Attachment } from './messages.js';

export const CREDENTIALS_CONTEXT = 'https://www.w3.org/2018/credentials/v1';
export const PRESENTATION_TYPE = 'VerifiablePresentation';
export const PROOF_TYPE = 'EcdsaSecp256k1RecoverySignature2020';
export const PRESENTATION_MIME_TYPE = 'application/ld+json';

// ============================================
// Schemas
// ============================================

export const ProofOptionsSchema = z.object({
  type: z.literal(PROOF_TYPE),
  created: z.string().optional(),
  proofPurpose: z.string(),
  /** `did#fragment` of the signing key */
  verificationMethod: z.string().min(1),
  challenge: z.string().optional(),
  domain: z.string().optional(),
});

export type ProofOptions = z.infer<typeof ProofOptionsSchema>;

export const PresentationProofSchema = ProofOptionsSchema.extend({
  proofValue: SignatureHexSchema,
});

export type PresentationProof = z.infer<typeof PresentationProofSchema>;

// Unknown members are kept: they are covered by the signature.
const PresentationBodySchema = z
  .object({
    '@context': z.array(z.string()).nonempty(),
    id: z.string().optional(),
    type: z
      .array(z.string())
      .refine((types) => types.includes(PRESENTATION_TYPE), `type must include ${PRESENTATION_TYPE}`),
    holder: z.string().optional(),
    verifiableCredential: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type UnsignedPresentation = z.infer<typeof PresentationBodySchema>;

export const VerifiablePresentationSchema = PresentationBodySchema.extend({
  proof: z.union([PresentationProofSchema, z.array(PresentationProofSchema).nonempty()]),
});

export type VerifiablePresentation = z.infer<typeof VerifiablePresentationSchema>;

// ============================================
// Signing
// ============================================

/**
 * Bytes covered by a proof, as a UTF-8 string.
 */
export function proofSigningInput(presentation: UnsignedPresentation, options: ProofOptions): string {
  return canonicalStringify({ presentation, proof: options });
}

export function listProofs(presentation: VerifiablePresentation): PresentationProof[] {
  return Array.isArray(presentation.proof) ? [...presentation.proof] : [presentation.proof];
}

export function unsignedPart(presentation: VerifiablePresentation): UnsignedPresentation {
  const { proof: _proof, ...unsigned } = presentation;
  return unsigned;
}

export interface PresentationSigner {
  account: LocalAccount;
  /** `did#fragment` the verifier will resolve to `account.publicKey` */
  verificationMethod: string;
  proofPurpose?: string;
  challenge?: string;
  domain?: string;
}

/**
 * Sign a presentation with one or more keys.
 * A single signer yields a single `proof` object, several yield an array.
 */
export async function signPresentation(
  presentation: UnsignedPresentation,
  signers: PresentationSigner | PresentationSigner[],
  now: Date = new Date()
): Promise<VerifiablePresentation> {
  const list = Array.isArray(signers) ? signers : [signers];
  if (list.length === 0) {
    throw new Error('at least one signer is required');
  }

  const proofs: PresentationProof[] = [];
  for (const signer of list) {
    const options: ProofOptions = {
      type: PROOF_TYPE,
      created: now.toISOString(),
      proofPurpose: signer.proofPurpose ?? 'authentication',
      verificationMethod: signer.verificationMethod,
      challenge: signer.challenge,
      domain: signer.domain,
    };

    const proofValue = await signer.account.signMessage({
      message: proofSigningInput(presentation, options),
    });

    proofs.push({ ...options, proofValue });
  }

  const [first, ...rest] = proofs;
  return {
    ...presentation,
    proof: rest.length === 0 ? first : [first, ...rest],
  };
}

/**
 * Build a presentation document for `holder` around the given credentials.
 */
export function createPresentation(holder: string, credentials: readonly unknown[] = []): UnsignedPresentation {
  return {
    '@context': [CREDENTIALS_CONTEXT],
    id: `urn:uuid:${randomUUID()}`,
    type: [PRESENTATION_TYPE],
    holder,
    verifiableCredential: [...credentials],
  };
}

/**
 * Pack a signed presentation as a base64 attachment.
 */
export function toBase64Attachment(presentation: VerifiablePresentation, id: string = randomUUID()): Attachment {
  return {
    '@id': id,
    'mime-type': PRESENTATION_MIME_TYPE,
    data: {
      base64: Buffer.from(JSON.stringify(presentation), 'utf8').toString('base64'),
    },
  };
}
