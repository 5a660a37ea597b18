/**
 * Reward-per-share accumulator.
 *
 * Each pool carries acc = Σ (reward_delta × ACC_SCALE / staked_balance).
 * A position's pending reward is then O(1):
 *
 *   pending = derived × acc / ACC_SCALE − debt
 *
 * Integer-only arithmetic. The accumulator and pending amounts floor and
 * the debt rounds up, so the sum of all payouts can only fall short of the
 * emitted amount, never exceed it.
 */

import { ACC_SCALE } from "./constants.js";

export interface AccrualState {
  accRewardPerShare: bigint;
  /** Unix seconds. */
  lastDistributionTime: number;
  /** Reward units per second assigned to this pool. */
  emissionRate: bigint;
}

export interface AccrualResult extends AccrualState {
  /** Reward units emitted over the elapsed interval. */
  emitted: bigint;
  /** Portion of `emitted` nobody could receive (zero staked balance). */
  undistributed: bigint;
}

/**
 * Advance an accumulator to `now`.
 *
 * `horizon` caps accrual (end of the emission window). When the staked
 * balance is zero the accumulator holds still but the clock still moves:
 * the interval's emission is dropped rather than back-paid later.
 * No elapsed time → state returned unchanged.
 */
export function accrue(
  state: AccrualState,
  totalStaked: bigint,
  now: number,
  horizon?: number,
): AccrualResult {
  const effectiveNow = horizon === undefined ? now : Math.min(now, horizon);
  if (effectiveNow <= state.lastDistributionTime) {
    return { ...state, emitted: 0n, undistributed: 0n };
  }

  const elapsed = BigInt(effectiveNow - state.lastDistributionTime);
  const emitted = elapsed * state.emissionRate;

  if (totalStaked <= 0n) {
    return {
      ...state,
      lastDistributionTime: effectiveNow,
      emitted,
      undistributed: emitted,
    };
  }

  return {
    ...state,
    accRewardPerShare: state.accRewardPerShare + (emitted * ACC_SCALE) / totalStaked,
    lastDistributionTime: effectiveNow,
    emitted,
    undistributed: 0n,
  };
}

/** Reward already attributed to `derivedStake` at accumulator `acc`. Rounds up. */
export function rewardDebt(derivedStake: bigint, acc: bigint): bigint {
  return (derivedStake * acc + ACC_SCALE - 1n) / ACC_SCALE;
}

/**
 * Reward owed to a position. Clamped at zero: right after settlement the
 * rounded-up debt can sit one unit above the floored accrual.
 */
export function pendingReward(
  derivedStake: bigint,
  acc: bigint,
  debt: bigint,
): bigint {
  const owed = (derivedStake * acc) / ACC_SCALE - debt;
  return owed > 0n ? owed : 0n;
}
