/**
 * Boost calculator: derived stake from raw stake and governance power.
 *
 * Pool liquidity, the participant's power and total power are queried on
 * every recompute. Nothing is cached between operations.
 */

import { derivedStake } from "@streamgauge/accrual";
import type { RefreshedPool } from "./accumulator.js";
import type { PositionRecord } from "./position-ledger.js";

export interface BoostQueries {
  stakedBalanceOf(stakedAsset: string): Promise<bigint>;
  powerOf(participant: string): Promise<bigint>;
  totalPower(): Promise<bigint>;
}

export class BoostCalculator {
  constructor(private readonly queries: BoostQueries) {}

  async recompute(pool: RefreshedPool, position: PositionRecord): Promise<bigint> {
    if (position.stakedAmount === 0n) return 0n;

    const [poolTotalStaked, power, totalPower] = await Promise.all([
      this.queries.stakedBalanceOf(pool.pool.stakedAsset),
      this.queries.powerOf(position.participant),
      this.queries.totalPower(),
    ]);

    return derivedStake({
      stakedAmount: position.stakedAmount,
      poolTotalStaked,
      power,
      totalPower,
    });
  }
}
