/**
 * ActionV1: signed participant action envelope.
 *
 * Every state-changing request is an ActionV1. The kind byte selects the
 * body payload schema below.
 *
 * action_id = SHA256(canonical(ActionV1 minus sig))
 * sig = Ed25519(private_key, canonical(ActionV1 minus sig))
 */

import { Type, type Static } from "@sinclair/typebox";
import { ACTION_MAX_BODY, MAX_VOTE_POOLS } from "../constants.js";
import { Amount, AssetId, Hex32, PoolId } from "./common.js";

// ── ActionV1 Envelope ──────────────────────────────────────────────

export const ActionV1 = Type.Object(
  {
    /** Version byte. Always 1. */
    v: Type.Literal(1),
    /** Kind byte. Determines body interpretation. */
    kind: Type.Integer({ minimum: 0, maximum: 255 }),
    /** Signer's Ed25519 public key: the acting participant. */
    from: Hex32,
    /** Strictly increasing per signer. */
    nonce: Type.Integer({ minimum: 1 }),
    /** Hex-encoded canonical CBOR of the kind payload. */
    body: Type.String({ maxLength: ACTION_MAX_BODY * 2, pattern: "^([0-9a-f]{2})*$" }),
    /** Milliseconds since Unix epoch. */
    ts: Type.Integer({ minimum: 0 }),
    /** Ed25519 signature (base64) over canonical(ActionV1 minus sig). */
    sig: Type.String(),
  },
  { additionalProperties: false },
);

export type ActionV1 = Static<typeof ActionV1>;

// ── Kind Payload Schemas ───────────────────────────────────────────

/** kind=DEPOSIT (0x01) and kind=WITHDRAW (0x02). */
export const StakePayload = Type.Object(
  {
    pool_id: PoolId,
    amount: Amount,
  },
  { additionalProperties: false },
);

export type StakePayload = Static<typeof StakePayload>;

/** kind=CLAIM (0x03). */
export const ClaimPayload = Type.Object(
  { pool_id: PoolId },
  { additionalProperties: false },
);

export type ClaimPayload = Static<typeof ClaimPayload>;

/** kind=CLAIM_MANY (0x04). */
export const ClaimManyPayload = Type.Object(
  { pool_ids: Type.Array(PoolId, { minItems: 1, maxItems: MAX_VOTE_POOLS }) },
  { additionalProperties: false },
);

export type ClaimManyPayload = Static<typeof ClaimManyPayload>;

/** kind=VOTE (0x05). Weights are relative; length must match pool_ids. */
export const VotePayload = Type.Object(
  {
    pool_ids: Type.Array(PoolId, { maxItems: MAX_VOTE_POOLS }),
    weights: Type.Array(Amount, { maxItems: MAX_VOTE_POOLS }),
  },
  { additionalProperties: false },
);

export type VotePayload = Static<typeof VotePayload>;

/** kind=RESET_VOTES (0x06). Empty body. */
export const ResetVotesPayload = Type.Object({}, { additionalProperties: false });

export type ResetVotesPayload = Static<typeof ResetVotesPayload>;

/** kind=REGISTER_POOL (0x10). */
export const RegisterPoolPayload = Type.Object(
  {
    staked_asset: AssetId,
    reserved_weight: Amount,
    refresh_first: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type RegisterPoolPayload = Static<typeof RegisterPoolPayload>;

/** kind=RELEASE_WEIGHT (0x11). */
export const ReleaseWeightPayload = Type.Object(
  {
    pool_id: PoolId,
    refresh_first: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type ReleaseWeightPayload = Static<typeof ReleaseWeightPayload>;

/** kind=START_EMISSIONS (0x12). */
export const StartEmissionsPayload = Type.Object(
  { total_supply: Amount },
  { additionalProperties: false },
);

export type StartEmissionsPayload = Static<typeof StartEmissionsPayload>;
