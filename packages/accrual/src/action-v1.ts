/**
 * ActionV1 operations: construct, sign, verify, compute action_id.
 *
 *   - actionSigningPayload(): the signed fields (everything minus sig)
 *   - computeActionId(): SHA256(canonical(signing_payload)) → hex
 *   - signAction() / verifyAction()
 *   - encodeActionBody() / decodeActionBody(): kind payload ↔ hex CBOR
 */

import type { ActionV1 } from "./schemas/action.js";
import { canonicalEncode, canonicalDecode } from "./canonical.js";
import { digestObject, fromHex, toHex } from "./digest.js";
import { signPayload, verifyPayloadSignature } from "./action-signature.js";
import { ACTION_MAX_BODY } from "./constants.js";

export type UnsignedActionV1 = Omit<ActionV1, "sig">;

export function actionSigningPayload(
  action: ActionV1 | UnsignedActionV1,
): UnsignedActionV1 {
  return {
    v: action.v,
    kind: action.kind,
    from: action.from,
    nonce: action.nonce,
    body: action.body,
    ts: action.ts,
  };
}

export function computeActionId(action: ActionV1 | UnsignedActionV1): string {
  return digestObject(actionSigningPayload(action));
}

/**
 * @param privateKey - 32-byte Ed25519 private key whose public half is `action.from`
 */
export async function signAction(
  privateKey: Uint8Array,
  action: UnsignedActionV1,
): Promise<ActionV1> {
  const sig = await signPayload(privateKey, actionSigningPayload(action));
  return { ...action, sig };
}

/** Ed25519(action.from, action.sig, canonical(ActionV1 minus sig)). */
export async function verifyAction(action: ActionV1): Promise<boolean> {
  return verifyPayloadSignature(action.from, action.sig, actionSigningPayload(action));
}

/** @throws If the encoded body exceeds ACTION_MAX_BODY bytes */
export function encodeActionBody(payload: unknown): string {
  const bytes = canonicalEncode(payload);
  if (bytes.length > ACTION_MAX_BODY) {
    throw new Error(`Action body too large: ${bytes.length} bytes (max ${ACTION_MAX_BODY})`);
  }
  return toHex(bytes);
}

/** Empty body decodes to `{}`. Callers validate against the kind schema. */
export function decodeActionBody(bodyHex: string): unknown {
  if (bodyHex.length === 0) return {};
  return canonicalDecode(fromHex(bodyHex));
}
