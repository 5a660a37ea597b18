/**
 * Notification log schemas.
 *
 * Observational only: nothing in the controller reads these back.
 * Amounts are decimal strings.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, AssetId, PoolId } from "@streamgauge/accrual";

/** Base envelope for all notifications. */
export const EventEnvelope = Type.Object({
  /** Notification type discriminator. */
  type: Type.String(),
  /** Monotonic sequence number within the log. */
  seq: Type.Integer({ minimum: 0 }),
  /** Engine time (Unix seconds). */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Type-specific payload. */
  payload: Type.Unknown(),
});

export type EventEnvelope = Static<typeof EventEnvelope>;

export const StakeNotice = Type.Object({
  pool_id: PoolId,
  participant: Type.String(),
  amount: Amount,
});

export type StakeNotice = Static<typeof StakeNotice>;

export const RewardNotice = Type.Object({
  pool_id: PoolId,
  participant: Type.String(),
  amount: Amount,
});

export type RewardNotice = Static<typeof RewardNotice>;

export const VoteNotice = Type.Object({
  participant: Type.String(),
  pool_ids: Type.Array(PoolId),
  allocations: Type.Array(Amount),
  used_weight: Amount,
});

export type VoteNotice = Static<typeof VoteNotice>;

export const PoolRegisteredNotice = Type.Object({
  pool_id: PoolId,
  staked_asset: AssetId,
  reserved_weight: Amount,
});

export type PoolRegisteredNotice = Static<typeof PoolRegisteredNotice>;

export const RatesNotice = Type.Object({
  total_rate: Amount,
  total_weight: Amount,
  rates: Type.Array(Type.Object({ pool_id: PoolId, emission_rate: Amount })),
  unallocated_rate: Amount,
});

export type RatesNotice = Static<typeof RatesNotice>;

// ── Notification types ─────────────────────────────────────────────

export const DEPOSIT_EVENT = "deposit.v1" as const;
export const WITHDRAWAL_EVENT = "withdrawal.v1" as const;
export const REWARD_PAID_EVENT = "reward.paid.v1" as const;
export const VOTE_CAST_EVENT = "vote.cast.v1" as const;
export const VOTE_RESET_EVENT = "vote.reset.v1" as const;
export const POOL_REGISTERED_EVENT = "pool.registered.v1" as const;
export const WEIGHT_RELEASED_EVENT = "weight.released.v1" as const;
export const EMISSIONS_STARTED_EVENT = "emissions.started.v1" as const;
export const RATES_REBALANCED_EVENT = "rates.rebalanced.v1" as const;
