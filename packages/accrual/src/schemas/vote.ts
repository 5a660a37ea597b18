/**
 * Governance views: per-participant ballots, pool weights, emission schedule.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, Hex32, PoolId } from "./common.js";

export const VoteAllocation = Type.Object(
  {
    pool_id: PoolId,
    weight: Amount,
  },
  { additionalProperties: false },
);

export type VoteAllocation = Static<typeof VoteAllocation>;

export const VoteV1 = Type.Object(
  {
    participant: Hex32,
    /** Governance power at the last vote; Σ allocations. */
    used_weight: Amount,
    allocations: Type.Array(VoteAllocation),
  },
  { additionalProperties: false },
);

export type VoteV1 = Static<typeof VoteV1>;

export const PoolWeight = Type.Object(
  {
    pool_id: PoolId,
    reserved: Amount,
    voted: Amount,
  },
  { additionalProperties: false },
);

export type PoolWeight = Static<typeof PoolWeight>;

export const WeightsV1 = Type.Object(
  {
    total_weight: Amount,
    pools: Type.Array(PoolWeight),
  },
  { additionalProperties: false },
);

export type WeightsV1 = Static<typeof WeightsV1>;

export const ScheduleV1 = Type.Object(
  {
    started: Type.Boolean(),
    total_rate: Amount,
    /** Unix seconds; null before emissions start. */
    started_at: Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]),
    ends_at: Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]),
    /** Rate left over by the last rebalance's flooring. */
    unallocated_rate: Amount,
  },
  { additionalProperties: false },
);

export type ScheduleV1 = Static<typeof ScheduleV1>;
