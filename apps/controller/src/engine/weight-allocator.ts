/**
 * Weight allocator: governance-power-weighted voting over pools.
 *
 * pool weight  = reserved (bootstrap, nobody's vote) + voted (Σ live allocations)
 * total weight = Σ pool weight
 *
 * A vote replaces the voter's previous ballot wholesale: reset, then
 * spread the voter's current power over the new pools.
 */

import { normalizeVotes, splitEmission, MAX_VOTE_POOLS, type EmissionSplit } from "@streamgauge/accrual";
import { ControllerError } from "./errors.js";

interface PoolWeightRecord {
  reserved: bigint;
  voted: bigint;
}

export interface Ballot {
  /** Pools in the order they were voted for. */
  pools: number[];
  allocations: Map<number, bigint>;
  /** Power at the time of the vote; Σ allocations. */
  usedWeight: bigint;
}

export interface VotePlan {
  participant: string;
  pools: number[];
  allocations: bigint[];
  power: bigint;
}

export class WeightAllocator {
  private readonly weights = new Map<number, PoolWeightRecord>();
  private readonly ballots = new Map<string, Ballot>();
  private _totalWeight = 0n;

  get totalWeight(): bigint {
    return this._totalWeight;
  }

  addPool(poolId: number, reserved: bigint): void {
    if (this.weights.has(poolId)) {
      throw new ControllerError("pool_exists", `weights for pool ${poolId} already tracked`);
    }
    if (reserved < 0n) {
      throw new ControllerError("invalid_amount", `reserved weight must be non-negative, got ${reserved}`);
    }
    this.weights.set(poolId, { reserved, voted: 0n });
    this._totalWeight += reserved;
  }

  weightOf(poolId: number): { reserved: bigint; voted: bigint } {
    const w = this.weights.get(poolId);
    return w ? { ...w } : { reserved: 0n, voted: 0n };
  }

  ballotOf(participant: string): Ballot | undefined {
    const b = this.ballots.get(participant);
    if (!b) return undefined;
    return { pools: [...b.pools], allocations: new Map(b.allocations), usedWeight: b.usedWeight };
  }

  /**
   * Reject a malformed ballot before anything is queried or changed.
   *
   * @throws ControllerError length_mismatch | empty_vote | duplicate_pool | unknown_pool | zero_weight_sum | invalid_amount
   */
  validateBallot(poolIds: readonly number[], weights: readonly bigint[]): void {
    if (poolIds.length !== weights.length) {
      throw new ControllerError(
        "length_mismatch",
        `${poolIds.length} pools but ${weights.length} weights`,
      );
    }
    if (poolIds.length === 0) {
      throw new ControllerError("empty_vote", "ballot names no pools");
    }
    if (poolIds.length > MAX_VOTE_POOLS) {
      throw new ControllerError("too_many_pools", `ballot names more than ${MAX_VOTE_POOLS} pools`);
    }
    const seen = new Set<number>();
    for (const id of poolIds) {
      if (seen.has(id)) throw new ControllerError("duplicate_pool", `pool ${id} listed twice`);
      seen.add(id);
      if (!this.weights.has(id)) throw new ControllerError("unknown_pool", `no pool ${id}`);
    }
    let sum = 0n;
    for (const w of weights) {
      if (w < 0n) throw new ControllerError("invalid_amount", `negative vote weight ${w}`);
      sum += w;
    }
    if (sum === 0n) {
      throw new ControllerError("zero_weight_sum", "vote weights sum to zero");
    }
  }

  /** Normalise a validated ballot against the voter's current power. */
  planVote(
    participant: string,
    poolIds: readonly number[],
    weights: readonly bigint[],
    power: bigint,
  ): VotePlan {
    this.validateBallot(poolIds, weights);
    return {
      participant,
      pools: [...poolIds],
      allocations: normalizeVotes(weights, power),
      power,
    };
  }

  /** Reset the voter, then record the plan. */
  applyVote(plan: VotePlan): void {
    this.reset(plan.participant);

    const allocations = new Map<number, bigint>();
    plan.pools.forEach((poolId, i) => {
      const amount = plan.allocations[i] ?? 0n;
      const w = this.weights.get(poolId);
      if (!w) throw new ControllerError("unknown_pool", `no pool ${poolId}`);
      if (amount > 0n) {
        w.voted += amount;
        this._totalWeight += amount;
      }
      allocations.set(poolId, amount);
    });

    this.ballots.set(plan.participant, {
      pools: [...plan.pools],
      allocations,
      usedWeight: plan.power,
    });
  }

  /** Undo a voter's ballot. Returns the weight freed. No ballot → 0n. */
  reset(participant: string): bigint {
    const ballot = this.ballots.get(participant);
    if (!ballot) return 0n;

    let freed = 0n;
    for (const poolId of ballot.pools) {
      const amount = ballot.allocations.get(poolId) ?? 0n;
      if (amount === 0n) continue;
      const w = this.weights.get(poolId);
      if (w) w.voted -= amount;
      this._totalWeight -= amount;
      freed += amount;
    }
    this.ballots.delete(participant);
    return freed;
  }

  /**
   * Remove a pool's reserved weight. Returns the amount removed.
   *
   * @throws ControllerError unknown_pool | weight_already_released
   */
  releaseReserved(poolId: number): bigint {
    const w = this.weights.get(poolId);
    if (!w) throw new ControllerError("unknown_pool", `no pool ${poolId}`);
    if (w.reserved === 0n) {
      throw new ControllerError("weight_already_released", `pool ${poolId} has no reserved weight`);
    }
    const released = w.reserved;
    w.reserved = 0n;
    this._totalWeight -= released;
    return released;
  }

  /** Emission split over `poolIds` by current weight. */
  planRates(totalRate: bigint, poolIds: readonly number[]): EmissionSplit {
    return splitEmission(
      totalRate,
      poolIds.map((id) => {
        const w = this.weights.get(id);
        return w ? w.reserved + w.voted : 0n;
      }),
    );
  }
}
