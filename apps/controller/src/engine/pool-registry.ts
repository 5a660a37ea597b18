/**
 * Pool registry: append-only catalogue of pools.
 *
 * Pool ids are arena indices and never change. One pool per staked asset.
 * Readers get copies; writes go back wholesale through commit().
 */

import { ControllerError } from "./errors.js";

export interface PoolRecord {
  id: number;
  stakedAsset: string;
  /** Unix seconds of the last accumulator refresh. */
  lastDistributionTime: number;
  /** Reward units per second. Set only by rate rebalancing. */
  emissionRate: bigint;
  /** Scaled by ACC_SCALE. Non-decreasing. */
  accRewardPerShare: bigint;
  /** Cumulative rate × elapsed time since registration. */
  emitted: bigint;
  /** Part of `emitted` that accrued while nothing was staked. */
  undistributed: bigint;
  /** Cumulative reward paid to positions. */
  rewardsPaid: bigint;
}

export class PoolRegistry {
  private readonly pools: PoolRecord[] = [];
  private readonly byAsset = new Map<string, number>();

  get size(): number {
    return this.pools.length;
  }

  has(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.pools.length;
  }

  idOf(stakedAsset: string): number | undefined {
    return this.byAsset.get(stakedAsset);
  }

  ids(): number[] {
    return this.pools.map((p) => p.id);
  }

  /** @throws ControllerError pool_exists */
  register(stakedAsset: string, now: number): PoolRecord {
    if (this.byAsset.has(stakedAsset)) {
      throw new ControllerError("pool_exists", `pool for ${stakedAsset} already registered`);
    }
    const record: PoolRecord = {
      id: this.pools.length,
      stakedAsset,
      lastDistributionTime: now,
      emissionRate: 0n,
      accRewardPerShare: 0n,
      emitted: 0n,
      undistributed: 0n,
      rewardsPaid: 0n,
    };
    this.pools.push(record);
    this.byAsset.set(stakedAsset, record.id);
    return { ...record };
  }

  /** @throws ControllerError unknown_pool */
  snapshot(id: number): PoolRecord {
    const record = this.pools[id];
    if (!this.has(id) || !record) {
      throw new ControllerError("unknown_pool", `no pool ${id}`);
    }
    return { ...record };
  }

  commit(draft: PoolRecord): void {
    const current = this.pools[draft.id];
    if (!current || current.stakedAsset !== draft.stakedAsset) {
      throw new Error(`PoolRegistry: commit of unregistered pool ${draft.id}`);
    }
    if (draft.accRewardPerShare < current.accRewardPerShare) {
      throw new Error(`PoolRegistry: accumulator of pool ${draft.id} would decrease`);
    }
    this.pools[draft.id] = { ...draft };
  }
}
