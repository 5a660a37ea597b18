/**
 * Canonical serialization: deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. No floats and no bigints (amounts travel as decimal strings)
 *   3. Same object → identical bytes, always
 *   4. CBOR (RFC 8949) with canonical map key ordering
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true, // decode maps as plain JS objects
  useRecords: false,
  pack: false,
});

/** Sort object keys lexicographically (recursive, depth-first). */
function sortKeys(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (obj instanceof Uint8Array) return obj;
  if (Array.isArray(obj)) return obj.map(sortKeys);
  if (typeof obj === "object") {
    const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, value] of entries) {
      sorted[key] = sortKeys(value);
    }
    return sorted;
  }
  return obj;
}

/**
 * Canonical encode: sort keys, then CBOR encode.
 * The only serialization used for signing and action ids.
 */
export function canonicalEncode(obj: unknown): Uint8Array {
  return encoder.encode(sortKeys(obj));
}

/** Decode canonical CBOR bytes back to a value. */
export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
