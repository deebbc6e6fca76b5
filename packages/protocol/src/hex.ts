/**
 * Hex Validation Utilities
 *
 * Strict schemas for the hex encodings the engine accepts:
 * - 32-byte secp256k1 private keys (agent configuration)
 * - 65-byte uncompressed secp256k1 public keys (key resolution)
 * - 65-byte recoverable signatures (presentation proofs)
 */

import { z } from 'zod';
import type { Hex } from 'viem';

const HEX32_REGEX = /^0x[0-9a-f]{64}$/;
const PUBLIC_KEY_REGEX = /^0x04[0-9a-fA-F]{128}$/;
const SIGNATURE_REGEX = /^0x[0-9a-fA-F]{130}$/;

/**
 * Check if a string starts with 0x prefix
 */
export function isHexPrefixed(s: string): boolean {
  return s.startsWith('0x') || s.startsWith('0X');
}

/**
 * Assert that a string is a valid 32-byte lowercase hex value.
 *
 * @param name - Name of the field (for error messages)
 */
export function assertHex32(name: string, value: string): asserts value is Hex {
  if (!isHexPrefixed(value)) {
    throw new Error(`${name} must start with 0x prefix`);
  }

  if (value.length !== 66) {
    const actualBytes = (value.length - 2) / 2;
    throw new Error(
      `${name} must be exactly 32 bytes (0x + 64 hex chars), got ${actualBytes} bytes`
    );
  }

  if (!HEX32_REGEX.test(value)) {
    throw new Error(`${name} must be lowercase hex (0-9a-f) only, got: ${value.slice(0, 20)}...`);
  }
}

export const Hex32Schema = z.custom<Hex>(
  (v) => typeof v === 'string' && HEX32_REGEX.test(v),
  'Must be 0x + 64 lowercase hex chars (32 bytes)'
);

/** Uncompressed secp256k1 public key: 0x04 || X || Y */
export const PublicKeyHexSchema = z.custom<Hex>(
  (v) => typeof v === 'string' && PUBLIC_KEY_REGEX.test(v),
  'Must be an uncompressed secp256k1 public key (0x04 + 128 hex chars)'
);

/** Recoverable secp256k1 signature: r || s || v */
export const SignatureHexSchema = z.custom<Hex>(
  (v) => typeof v === 'string' && SIGNATURE_REGEX.test(v),
  'Must be a 65-byte hex signature (0x + 130 hex chars)'
);
