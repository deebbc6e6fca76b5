/**
 * Present-proof error taxonomy.
 *
 * Every failure raised by the engine carries a `kind` discriminant so that
 * the abandon path can pick a problem-report code without string matching.
 */

export type PresentProofErrorKind =
  | 'decode'
  | 'verification'
  | 'missing-data'
  | 'thread'
  | 'user-cancelled'
  | 'invalid-transition'
  | 'unimplemented'
  | 'noop';

export abstract class PresentProofError extends Error {
  abstract readonly kind: PresentProofErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed envelope, payload or attachment. */
export class DecodeError extends PresentProofError {
  readonly kind = 'decode';
}

/** Key resolution or signature check failed for a presentation. */
export class VerificationError extends PresentProofError {
  readonly kind = 'verification';
}

/** A payload the current step needs was not supplied by the caller. */
export class MissingDataError extends PresentProofError {
  readonly kind = 'missing-data';
}

export class ThreadResolutionError extends PresentProofError {
  readonly kind = 'thread';
}

/**
 * Raised (or supplied) by the caller to stop a conversation on purpose.
 * The abandon path reports it to the peer as `rejected`.
 */
export class UserCancellationError extends PresentProofError {
  readonly kind = 'user-cancelled';
}

export class InvalidTransitionError extends PresentProofError {
  readonly kind = 'invalid-transition';

  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super(`invalid state transition: ${from} -> ${to}`);
  }
}

export class UnimplementedError extends PresentProofError {
  readonly kind = 'unimplemented';
}

export class NoOpExecutionError extends PresentProofError {
  readonly kind = 'noop';
}

// ============================================
// Abandon codes
// ============================================

export const AbandonCode = {
  Internal: 'internal',
  Rejected: 'rejected',
} as const;

export type AbandonCode = (typeof AbandonCode)[keyof typeof AbandonCode];

export function isPresentProofError(err: unknown): err is PresentProofError {
  return err instanceof PresentProofError;
}

export function isUserCancellation(err: unknown): err is UserCancellationError {
  return isPresentProofError(err) && err.kind === 'user-cancelled';
}

/**
 * Problem-report code for a conversation abandoned because of `err`.
 */
export function abandonCodeFor(err: unknown): AbandonCode {
  return isUserCancellation(err) ? AbandonCode.Rejected : AbandonCode.Internal;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
