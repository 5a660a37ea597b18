/**
 * Ed25519 keys, signing and verification (@noble/ed25519, async API).
 *
 * The async variants hash with Web Crypto SHA-512, present in Node 20.
 */

import { getPublicKeyAsync, signAsync, verifyAsync, utils } from "@noble/ed25519";

/** Generate a keypair. Both halves are raw 32-byte arrays. */
export async function generateKeypair(): Promise<{
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}> {
  const privateKey = utils.randomPrivateKey();
  const publicKey = await getPublicKeyAsync(privateKey);
  return { publicKey, privateKey };
}

/** 64-byte signature over `message`. */
export async function ed25519Sign(
  privateKey: Uint8Array,
  message: Uint8Array,
): Promise<Uint8Array> {
  return signAsync(message, privateKey);
}

/** Malformed keys or signatures verify as false. */
export async function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): Promise<boolean> {
  try {
    return await verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}
