/**
 * PositionV1: one participant's stake in one pool.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, Hex32, PoolId } from "./common.js";

export const PositionV1 = Type.Object(
  {
    pool_id: PoolId,
    participant: Hex32,
    staked_amount: Amount,
    /** Boost-adjusted stake used for reward math. ≤ staked_amount. */
    derived_stake: Amount,
    reward_debt: Amount,
    /** derived_stake × acc / ACC_SCALE − reward_debt at read time. */
    pending: Amount,
  },
  { additionalProperties: false },
);

export type PositionV1 = Static<typeof PositionV1>;
