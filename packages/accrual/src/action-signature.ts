/**
 * Payload signatures.
 *
 *   sig = base64(Ed25519_sign(private_key, canonical(payload)))
 *
 * The signature covers the canonical CBOR encoding, not the JSON wire
 * form, so it survives re-serialization.
 */

import { canonicalEncode } from "./canonical.js";
import { fromHex } from "./digest.js";
import { ed25519Sign, ed25519Verify } from "./ed25519.js";

const HEX32 = /^[0-9a-f]{64}$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export async function signPayload(
  privateKey: Uint8Array,
  payload: unknown,
): Promise<string> {
  const sig = await ed25519Sign(privateKey, canonicalEncode(payload));
  return Buffer.from(sig).toString("base64");
}

/**
 * @param pubkeyHex - 64-char hex Ed25519 public key
 * @param sigBase64 - base64 signature
 */
export async function verifyPayloadSignature(
  pubkeyHex: string,
  sigBase64: string,
  payload: unknown,
): Promise<boolean> {
  if (!HEX32.test(pubkeyHex)) return false;
  if (!sigBase64 || !BASE64.test(sigBase64)) return false;

  const sigBytes = new Uint8Array(Buffer.from(sigBase64, "base64"));
  if (sigBytes.length !== 64) return false;

  return ed25519Verify(fromHex(pubkeyHex), sigBytes, canonicalEncode(payload));
}
