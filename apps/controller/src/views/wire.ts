/**
 * Engine views → V1 wire shapes. Amounts become decimal strings.
 */

import {
  formatAmount,
  type PoolV1,
  type PositionV1,
  type ScheduleV1,
  type VoteV1,
  type WeightsV1,
} from "@streamgauge/accrual";
import type {
  BallotView,
  PoolView,
  PositionView,
  ScheduleView,
  WeightsView,
} from "../engine/controller.js";

export function poolToWire(pool: PoolView): PoolV1 {
  return {
    id: pool.id,
    staked_asset: pool.stakedAsset,
    emission_rate: formatAmount(pool.emissionRate),
    acc_reward_per_share: formatAmount(pool.accRewardPerShare),
    last_distribution_time: pool.lastDistributionTime,
    emitted: formatAmount(pool.emitted),
    undistributed: formatAmount(pool.undistributed),
    rewards_paid: formatAmount(pool.rewardsPaid),
    total_staked: formatAmount(pool.totalStaked),
    reserved_weight: formatAmount(pool.reservedWeight),
    voted_weight: formatAmount(pool.votedWeight),
  };
}

export function positionToWire(position: PositionView): PositionV1 {
  return {
    pool_id: position.poolId,
    participant: position.participant,
    staked_amount: formatAmount(position.stakedAmount),
    derived_stake: formatAmount(position.derivedStake),
    reward_debt: formatAmount(position.rewardDebt),
    pending: formatAmount(position.pending),
  };
}

export function ballotToWire(ballot: BallotView): VoteV1 {
  return {
    participant: ballot.participant,
    used_weight: formatAmount(ballot.usedWeight),
    allocations: ballot.allocations.map((a) => ({
      pool_id: a.poolId,
      weight: formatAmount(a.weight),
    })),
  };
}

export function weightsToWire(weights: WeightsView): WeightsV1 {
  return {
    total_weight: formatAmount(weights.totalWeight),
    pools: weights.pools.map((p) => ({
      pool_id: p.poolId,
      reserved: formatAmount(p.reserved),
      voted: formatAmount(p.voted),
    })),
  };
}

export function scheduleToWire(view: ScheduleView): ScheduleV1 {
  const s = view.schedule;
  return {
    started: s !== null,
    total_rate: formatAmount(s?.totalRate ?? 0n),
    started_at: s?.startedAt ?? null,
    ends_at: s?.endsAt ?? null,
    unallocated_rate: formatAmount(view.unallocatedRate),
  };
}
