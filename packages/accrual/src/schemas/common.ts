/**
 * Shared wire primitives.
 */

import { Type } from "@sinclair/typebox";

/** 32 bytes, lowercase hex. Participant ids are Ed25519 public keys. */
export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

/** Unsigned decimal integer string (bigint on the wire). */
export const Amount = Type.String({ pattern: "^(0|[1-9][0-9]*)$" });

/** Arena index of a pool. */
export const PoolId = Type.Integer({ minimum: 0 });

/** Ledger identity of an asset, e.g. "lp-eth-usdc". */
export const AssetId = Type.String({ pattern: "^[a-z0-9][a-z0-9._-]{0,63}$" });
