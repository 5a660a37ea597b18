/**
 * Accumulator engine: keeps every pool's reward-per-share current.
 *
 * refresh() is the only way to obtain a RefreshedPool, and settlement,
 * rate changes and reads all take one. A pool can therefore not be read
 * into a working copy without first being caught up to `now`.
 *
 * Refreshes are staged: the caller commits them with the rest of its
 * operation, or drops them if the operation fails. Dropping a refresh
 * loses nothing; the next refresh recomputes from lastDistributionTime.
 */

import { accrue, EMISSION_WINDOW_SECS } from "@streamgauge/accrual";
import { ControllerError } from "./errors.js";
import type { PoolRecord, PoolRegistry } from "./pool-registry.js";

/** Staked balance a pool holds (balance of its asset in the controller account). */
export type StakedBalanceQuery = (stakedAsset: string) => Promise<bigint>;

export interface EmissionSchedule {
  /** Reward units per second across all pools. */
  totalRate: bigint;
  /** Unix seconds. */
  startedAt: number;
  endsAt: number;
}

/** A pool draft caught up to `at`. Constructed only by AccumulatorEngine. */
class RefreshedPool {
  constructor(
    readonly pool: PoolRecord,
    readonly at: number,
  ) {}

  get id(): number {
    return this.pool.id;
  }

  get accRewardPerShare(): bigint {
    return this.pool.accRewardPerShare;
  }
}

export type { RefreshedPool };

export class AccumulatorEngine {
  private schedule: EmissionSchedule | null = null;

  constructor(
    private readonly registry: PoolRegistry,
    private readonly stakedBalanceOf: StakedBalanceQuery,
  ) {}

  get emissionSchedule(): EmissionSchedule | null {
    return this.schedule ? { ...this.schedule } : null;
  }

  /** Catch one pool up to `now`. Staged, not committed. */
  async refresh(poolId: number, now: number): Promise<RefreshedPool> {
    const pool = this.registry.snapshot(poolId);
    const totalStaked = await this.stakedBalanceOf(pool.stakedAsset);
    const result = accrue(pool, totalStaked, now, this.schedule?.endsAt);

    return new RefreshedPool(
      {
        ...pool,
        accRewardPerShare: result.accRewardPerShare,
        lastDistributionTime: result.lastDistributionTime,
        emitted: pool.emitted + result.emitted,
        undistributed: pool.undistributed + result.undistributed,
      },
      now,
    );
  }

  /** Catch every pool up to `now`, in id order. Staged, not committed. */
  async refreshAll(now: number): Promise<RefreshedPool[]> {
    const refreshed: RefreshedPool[] = [];
    for (const id of this.registry.ids()) {
      refreshed.push(await this.refresh(id, now));
    }
    return refreshed;
  }

  commit(pools: RefreshedPool | readonly RefreshedPool[]): void {
    const list = pools instanceof RefreshedPool ? [pools] : pools;
    for (const p of list) this.registry.commit(p.pool);
  }

  /** Record reward paid out of a staged pool. */
  recordPayout(pool: RefreshedPool, amount: bigint): void {
    pool.pool.rewardsPaid += amount;
  }

  /**
   * Append a pool. A new pool starts current at `now` with zero rate, so it
   * comes back already refreshed.
   */
  register(stakedAsset: string, now: number): RefreshedPool {
    return new RefreshedPool(this.registry.register(stakedAsset, now), now);
  }

  /**
   * Set new emission rates and commit. Every pool whose rate changes must be
   * in `pools`, refreshed in this same operation, so no interval is
   * re-priced at the new rate.
   */
  retune(pools: readonly RefreshedPool[], rates: ReadonlyMap<number, bigint>): void {
    const staged = new Map(pools.map((p) => [p.id, p]));
    for (const id of rates.keys()) {
      if (!staged.has(id)) {
        throw new Error(`AccumulatorEngine: rate for pool ${id} set without refresh`);
      }
    }
    for (const p of pools) {
      const rate = rates.get(p.id);
      if (rate !== undefined) p.pool.emissionRate = rate;
    }
    this.commit(pools);
  }

  /**
   * Validate an emission start and return the schedule it would create.
   *
   * @throws ControllerError emissions_already_started | emission_rate_zero | invalid_amount
   */
  planEmissions(totalSupply: bigint, now: number): EmissionSchedule {
    if (this.schedule) {
      throw new ControllerError("emissions_already_started", "emissions already started");
    }
    if (totalSupply <= 0n) {
      throw new ControllerError("invalid_amount", `total supply must be positive, got ${totalSupply}`);
    }
    const totalRate = totalSupply / BigInt(EMISSION_WINDOW_SECS);
    if (totalRate === 0n) {
      throw new ControllerError(
        "emission_rate_zero",
        `total supply ${totalSupply} is below one unit per second over ${EMISSION_WINDOW_SECS}s`,
      );
    }
    return { totalRate, startedAt: now, endsAt: now + EMISSION_WINDOW_SECS };
  }

  activate(schedule: EmissionSchedule): void {
    if (this.schedule) {
      throw new ControllerError("emissions_already_started", "emissions already started");
    }
    this.schedule = { ...schedule };
  }
}
