/**
 * SHA256 digests and hex helpers.
 *
 * action_id = SHA256(canonical(ActionV1 minus sig)), hex-encoded.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";

/** SHA256 of a canonically-encoded object → 64-char hex. */
export function digestObject(obj: unknown): string {
  return bytesToHex(sha256(canonicalEncode(obj)));
}

export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}
