/**
 * Key Resolution
 *
 * Maps a verification method (`did#fragment`) to the signer's public key.
 * Resolvers are shared by every conversation of a service and are only read
 * while presentations are verified.
 */

import type { Hex } from 'viem';
import { PublicKeyHexSchema } from './hex.js';

export interface ResolvedKey {
  /** Full verification method id, `did#fragment` */
  id: string;
  /** DID that controls the key */
  controller: string;
  /** Uncompressed secp256k1 public key */
  publicKeyHex: Hex;
}

export interface KeyResolver {
  resolveKey(verificationMethod: string): Promise<ResolvedKey>;
}

export interface MemoryKeyResolver extends KeyResolver {
  /**
   * Register (or replace) the keys of a DID.
   * @param keys - fragment (without `#`) to uncompressed public key
   */
  register(did: string, keys: Record<string, string>): void;
}

const DID_REGEX = /^did:[a-z0-9]+:[A-Za-z0-9._:%-]+$/;

export function isDid(value: string): boolean {
  return DID_REGEX.test(value);
}

/**
 * Split `did:method:id#fragment` into its DID and fragment.
 */
export function splitVerificationMethod(verificationMethod: string): { did: string; fragment: string } {
  const hash = verificationMethod.indexOf('#');
  if (hash <= 0 || hash === verificationMethod.length - 1) {
    throw new Error(`verification method ${verificationMethod} must be of the form did#fragment`);
  }

  const did = verificationMethod.slice(0, hash);
  if (!isDid(did)) {
    throw new Error(`verification method ${verificationMethod} does not start with a DID`);
  }

  return { did, fragment: verificationMethod.slice(hash + 1) };
}

/**
 * Key registry held in memory. Suitable for agents that are configured with
 * their peers' keys up front, and for tests.
 */
export function createMemoryKeyResolver(): MemoryKeyResolver {
  const documents = new Map<string, ReadonlyMap<string, Hex>>();

  return {
    register(did, keys) {
      if (!isDid(did)) {
        throw new Error(`invalid DID: ${did}`);
      }

      const entries = new Map<string, Hex>();
      for (const [fragment, publicKey] of Object.entries(keys)) {
        entries.set(fragment, PublicKeyHexSchema.parse(publicKey));
      }
      documents.set(did, entries);
    },

    async resolveKey(verificationMethod) {
      const { did, fragment } = splitVerificationMethod(verificationMethod);

      const document = documents.get(did);
      if (!document) {
        throw new Error(`DID ${did} not found`);
      }

      const publicKeyHex = document.get(fragment);
      if (!publicKeyHex) {
        throw new Error(`key ${verificationMethod} not found`);
      }

      return { id: verificationMethod, controller: did, publicKeyHex };
    },
  };
}
