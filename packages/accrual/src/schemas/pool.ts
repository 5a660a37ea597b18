/**
 * PoolV1: pool view as served to readers.
 * Always produced from a refreshed pool.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, AssetId, PoolId } from "./common.js";

export const PoolV1 = Type.Object(
  {
    id: PoolId,
    staked_asset: AssetId,
    /** Reward units per second. */
    emission_rate: Amount,
    /** Scaled by ACC_SCALE. */
    acc_reward_per_share: Amount,
    /** Unix seconds. */
    last_distribution_time: Type.Integer({ minimum: 0 }),
    /** Σ emission over every accrued interval. */
    emitted: Amount,
    /** Emission dropped while nothing was staked. */
    undistributed: Amount,
    rewards_paid: Amount,
    total_staked: Amount,
    reserved_weight: Amount,
    voted_weight: Amount,
  },
  { additionalProperties: false },
);

export type PoolV1 = Static<typeof PoolV1>;
