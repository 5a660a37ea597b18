/**
 * Position ledger: raw stake, derived stake and reward debt per
 * (pool, participant).
 *
 * Every method takes a RefreshedPool: a position is only ever read or
 * settled against an accumulator that was caught up in the same operation.
 */

import { pendingReward, rewardDebt } from "@streamgauge/accrual";
import type { RefreshedPool } from "./accumulator.js";

export interface PositionRecord {
  poolId: number;
  participant: string;
  stakedAmount: bigint;
  /** Boost-adjusted stake used for reward math. ≤ stakedAmount. */
  derivedStake: bigint;
  /** derivedStake × acc / ACC_SCALE already accounted for. */
  rewardDebt: bigint;
}

function key(poolId: number, participant: string): string {
  return `${poolId}:${participant}`;
}

export class PositionLedger {
  private readonly positions = new Map<string, PositionRecord>();

  /** Working copy. A participant with no position gets a zeroed one. */
  snapshot(pool: RefreshedPool, participant: string): PositionRecord {
    const existing = this.positions.get(key(pool.id, participant));
    if (existing) return { ...existing };
    return {
      poolId: pool.id,
      participant,
      stakedAmount: 0n,
      derivedStake: 0n,
      rewardDebt: 0n,
    };
  }

  list(pool: RefreshedPool): PositionRecord[] {
    const out: PositionRecord[] = [];
    for (const p of this.positions.values()) {
      if (p.poolId === pool.id) out.push({ ...p });
    }
    return out;
  }

  pending(pool: RefreshedPool, position: PositionRecord): bigint {
    return pendingReward(position.derivedStake, pool.accRewardPerShare, position.rewardDebt);
  }

  /**
   * Settle accrued reward: returns the amount owed and moves the debt
   * baseline to the derived stake it was paid against.
   */
  settle(pool: RefreshedPool, position: PositionRecord): bigint {
    const owed = this.pending(pool, position);
    position.rewardDebt = rewardDebt(position.derivedStake, pool.accRewardPerShare);
    return owed;
  }

  /**
   * Install a recomputed derived stake and re-baseline the debt to it, so
   * later pending amounts count only accrual from here on.
   */
  rebase(pool: RefreshedPool, position: PositionRecord, derived: bigint): void {
    if (derived > position.stakedAmount) {
      throw new Error(
        `PositionLedger: derived stake ${derived} exceeds staked ${position.stakedAmount}`,
      );
    }
    position.derivedStake = derived;
    position.rewardDebt = rewardDebt(derived, pool.accRewardPerShare);
  }

  /** Write back wholesale. A position with nothing staked is removed. */
  commit(position: PositionRecord): void {
    const k = key(position.poolId, position.participant);
    if (position.stakedAmount === 0n && position.derivedStake === 0n) {
      this.positions.delete(k);
      return;
    }
    this.positions.set(k, { ...position });
  }
}
