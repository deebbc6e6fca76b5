/**
 * Canonical JSON Serialization
 *
 * A presentation proof signs the canonical form of the presentation, so the
 * prover and the verifier must serialize the same document to the same
 * bytes regardless of key order in the received JSON.
 *
 * Rules:
 * - Object keys are sorted lexicographically (Unicode code point order)
 * - Arrays preserve their element order
 * - Properties whose value is undefined are omitted, as JSON.stringify does
 * - A top-level undefined, and non-finite numbers, are rejected
 */

/**
 * Recursively canonicalize a value.
 */
export function canonicalize(value: unknown): unknown {
  if (value === undefined) {
    throw new Error('Canonical serialization does not allow undefined values');
  }

  if (value === null) {
    return null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`Number ${value} is not finite`);
    }
    return value;
  }

  if (typeof value === 'bigint' || typeof value === 'function' || typeof value === 'symbol') {
    throw new Error(`Canonical serialization does not allow ${typeof value} values`);
  }

  if (typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item === undefined ? null : item));
  }

  const result: Record<string, unknown> = {};

  for (const [key, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (v === undefined) {
      continue;
    }
    result[key] = canonicalize(v);
  }

  return result;
}

/**
 * Canonicalize and stringify a value.
 * Returns a deterministic JSON string regardless of original key order.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}
