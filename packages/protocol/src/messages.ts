/**
 * Present-Proof Message Schemas
 *
 * Defines every message of the present-proof exchange using Zod for runtime
 * validation. Field names follow the DIDComm wire format (`@type`, `~thread`,
 * `...~attach`), so the schemas double as the decoders for inbound payloads.
 */

import { z } from 'zod';

// ============================================
// Message Types
// ============================================

export const PRESENT_PROOF_PROTOCOL = 'https://didcomm.org/present-proof/2.0';

export const MessageType = {
  ProposePresentation: `${PRESENT_PROOF_PROTOCOL}/propose-presentation`,
  RequestPresentation: `${PRESENT_PROOF_PROTOCOL}/request-presentation`,
  Presentation: `${PRESENT_PROOF_PROTOCOL}/presentation`,
  Ack: `${PRESENT_PROOF_PROTOCOL}/ack`,
  ProblemReport: `${PRESENT_PROOF_PROTOCOL}/problem-report`,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

// ============================================
// Decorators
// ============================================

export const ThreadSchema = z.object({
  /** Thread the message belongs to */
  thid: z.string().min(1).optional(),
  /** Parent thread, set on nested replies such as problem reports */
  pthid: z.string().min(1).optional(),
});

export type Thread = z.infer<typeof ThreadSchema>;

/**
 * Attachment payload. Exactly one representation is expected; only `base64`
 * is understood by the presentation verifier.
 */
export const AttachmentDataSchema = z.object({
  base64: z.string().optional(),
  links: z.array(z.string()).optional(),
  json: z.unknown().optional(),
  sha256: z.string().optional(),
});

export const AttachmentSchema = z.object({
  '@id': z.string().optional(),
  'mime-type': z.string().optional(),
  filename: z.string().optional(),
  description: z.string().optional(),
  data: AttachmentDataSchema,
});

export type Attachment = z.infer<typeof AttachmentSchema>;

// ============================================
// Propose Presentation (Prover -> Verifier)
// ============================================

export const ProposePresentationSchema = z.object({
  '@type': z.string().optional(),
  comment: z.string().optional(),
  'proposals~attach': z.array(AttachmentSchema).optional(),
});

export type ProposePresentation = z.infer<typeof ProposePresentationSchema>;

// ============================================
// Request Presentation (Verifier -> Prover)
// ============================================

export const RequestPresentationSchema = z.object({
  '@type': z.string().optional(),
  comment: z.string().optional(),
  will_confirm: z.boolean().optional(),
  'request_presentations~attach': z.array(AttachmentSchema),
});

export type RequestPresentation = z.infer<typeof RequestPresentationSchema>;

// ============================================
// Presentation (Prover -> Verifier)
// ============================================

export const PresentationSchema = z.object({
  '@type': z.string().optional(),
  comment: z.string().optional(),
  'presentations~attach': z.array(AttachmentSchema),
});

export type Presentation = z.infer<typeof PresentationSchema>;

// ============================================
// Ack / Problem Report
// ============================================

export const AckSchema = z.object({
  '@type': z.literal(MessageType.Ack),
  status: z.string().optional(),
});

export type Ack = z.infer<typeof AckSchema>;

export const ProblemReportSchema = z.object({
  '@type': z.literal(MessageType.ProblemReport),
  description: z.object({
    code: z.string(),
    en: z.string().optional(),
  }),
});

export type ProblemReport = z.infer<typeof ProblemReportSchema>;

export function isMessageType(value: string): value is MessageType {
  return Object.values<string>(MessageType).includes(value);
}
