/**
 * Gauge controller: the single owner of pools, positions and weights.
 *
 * Every public method runs through one SerialQueue, captures `now` once,
 * refreshes the pools it touches before reading them, stages its changes,
 * and commits them in one synchronous step after the last await.
 *
 * Participant operations:
 *   deposit / withdraw / claim / claimMany : settle, move stake, re-boost
 *   vote / resetVotes                      : reallocate governance weight
 *   rebalance / refreshAll                 : public maintenance
 * Governor operations:
 *   registerPool / releaseReservedWeight / startEmissions
 */

import { pino, type Logger } from "pino";
import { formatAmount } from "@streamgauge/accrual";
import type { AssetLedger, PowerSource } from "@streamgauge/asset-ledger";
import { AccumulatorEngine, type EmissionSchedule, type RefreshedPool } from "./accumulator.js";
import { BoostCalculator } from "./boost.js";
import { systemClock, type Clock } from "./clock.js";
import { ControllerError } from "./errors.js";
import { PoolRegistry } from "./pool-registry.js";
import { PositionLedger, type PositionRecord } from "./position-ledger.js";
import { SerialQueue } from "./serial-queue.js";
import { Transaction } from "./transaction.js";
import { WeightAllocator } from "./weight-allocator.js";
import { EventLog } from "../event-log/writer.js";
import {
  DEPOSIT_EVENT,
  WITHDRAWAL_EVENT,
  REWARD_PAID_EVENT,
  VOTE_CAST_EVENT,
  VOTE_RESET_EVENT,
  POOL_REGISTERED_EVENT,
  WEIGHT_RELEASED_EVENT,
  EMISSIONS_STARTED_EVENT,
  RATES_REBALANCED_EVENT,
  type StakeNotice,
  type RewardNotice,
  type VoteNotice,
  type PoolRegisteredNotice,
  type RatesNotice,
} from "../event-log/schemas.js";

// ── Types ──────────────────────────────────────────────────────────

export interface GaugeControllerOptions {
  ledger: AssetLedger;
  power: PowerSource;
  /** The controller's own identity on the ledger (holds stake + reward reserve). */
  account: string;
  rewardAsset: string;
  /** Only this caller may run governor operations. */
  governor: string;
  clock?: Clock;
  logger?: Logger;
  events?: EventLog;
}

export interface PoolView {
  id: number;
  stakedAsset: string;
  emissionRate: bigint;
  accRewardPerShare: bigint;
  lastDistributionTime: number;
  emitted: bigint;
  undistributed: bigint;
  rewardsPaid: bigint;
  totalStaked: bigint;
  reservedWeight: bigint;
  votedWeight: bigint;
}

export interface PositionView {
  poolId: number;
  participant: string;
  stakedAmount: bigint;
  derivedStake: bigint;
  rewardDebt: bigint;
  pending: bigint;
}

export interface StakeReceipt {
  poolId: number;
  participant: string;
  amount: bigint;
  rewardPaid: bigint;
  position: PositionView;
}

export interface BallotView {
  participant: string;
  usedWeight: bigint;
  allocations: Array<{ poolId: number; weight: bigint }>;
}

export interface WeightsView {
  totalWeight: bigint;
  pools: Array<{ poolId: number; reserved: bigint; voted: bigint }>;
}

export interface ScheduleView {
  schedule: EmissionSchedule | null;
  unallocatedRate: bigint;
}

type StakeChange =
  | { kind: "deposit"; amount: bigint }
  | { kind: "withdraw"; amount: bigint }
  | { kind: "claim" };

// ── Controller ─────────────────────────────────────────────────────

export class GaugeController {
  readonly events: EventLog;

  private readonly ledger: AssetLedger;
  private readonly power: PowerSource;
  private readonly account: string;
  private readonly rewardAsset: string;
  private readonly governor: string;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly registry = new PoolRegistry();
  private readonly positions = new PositionLedger();
  private readonly allocator = new WeightAllocator();
  private readonly accumulator: AccumulatorEngine;
  private readonly boost: BoostCalculator;
  private readonly queue = new SerialQueue();
  private unallocatedRate = 0n;

  constructor(options: GaugeControllerOptions) {
    this.ledger = options.ledger;
    this.power = options.power;
    this.account = options.account;
    this.rewardAsset = options.rewardAsset;
    this.governor = options.governor;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? pino({ name: "gauge-controller" });
    this.events = options.events ?? new EventLog();

    const stakedBalanceOf = (asset: string) => this.ledger.balanceOf(asset, this.account);
    this.accumulator = new AccumulatorEngine(this.registry, stakedBalanceOf);
    this.boost = new BoostCalculator({
      stakedBalanceOf,
      powerOf: (participant) => this.power.powerOf(participant),
      totalPower: () => this.power.totalPower(),
    });
  }

  // ── Staking ──────────────────────────────────────────────────────

  deposit(participant: string, poolId: number, amount: bigint): Promise<StakeReceipt> {
    return this.queue.run(() => this.settleStake(participant, poolId, { kind: "deposit", amount }));
  }

  withdraw(participant: string, poolId: number, amount: bigint): Promise<StakeReceipt> {
    return this.queue.run(() => this.settleStake(participant, poolId, { kind: "withdraw", amount }));
  }

  claim(participant: string, poolId: number): Promise<StakeReceipt> {
    return this.queue.run(() => this.settleStake(participant, poolId, { kind: "claim" }));
  }

  /** Settle several pools and pay the total in one transfer. All-or-nothing. */
  claimMany(participant: string, poolIds: readonly number[]): Promise<bigint> {
    return this.queue.run(async () => {
      this.requireParticipant(participant);
      const seen = new Set<number>();
      for (const id of poolIds) {
        if (seen.has(id)) throw new ControllerError("duplicate_pool", `pool ${id} listed twice`);
        seen.add(id);
        this.registry.snapshot(id);
      }

      const now = this.clock();
      const tx = new Transaction(this.ledger, this.logger);
      try {
        const settled: Array<{ pool: RefreshedPool; position: PositionRecord; reward: bigint }> = [];
        let total = 0n;
        for (const id of poolIds) {
          const pool = await this.accumulator.refresh(id, now);
          const position = this.positions.snapshot(pool, participant);
          const reward = this.positions.settle(pool, position);
          this.accumulator.recordPayout(pool, reward);
          settled.push({ pool, position, reward });
          total += reward;
        }

        tx.transfer({ asset: this.rewardAsset, from: this.account, to: participant, amount: total });
        await tx.flush();

        for (const s of settled) {
          const derived = await this.boost.recompute(s.pool, s.position);
          this.positions.rebase(s.pool, s.position, derived);
        }

        // ── commit ──
        for (const s of settled) {
          this.accumulator.commit(s.pool);
          this.positions.commit(s.position);
          if (s.reward > 0n) this.notifyReward(now, s.pool.id, participant, s.reward);
        }
        this.logger.info(
          { participant, pools: poolIds, amount: formatAmount(total) },
          "rewards claimed",
        );
        return total;
      } catch (err) {
        await tx.rollback();
        throw err;
      }
    });
  }

  // ── Voting ───────────────────────────────────────────────────────

  vote(participant: string, poolIds: readonly number[], weights: readonly bigint[]): Promise<BallotView> {
    return this.queue.run(async () => {
      this.allocator.validateBallot(poolIds, weights);
      const power = await this.power.powerOf(participant);
      const plan = this.allocator.planVote(participant, poolIds, weights, power);

      // ── commit ──
      this.allocator.applyVote(plan);
      const payload: VoteNotice = {
        participant,
        pool_ids: plan.pools,
        allocations: plan.allocations.map(formatAmount),
        used_weight: formatAmount(power),
      };
      this.events.append({ type: VOTE_CAST_EVENT, timestamp: this.clock(), payload });
      this.logger.info(
        { participant, pools: plan.pools, power: formatAmount(power) },
        "vote cast",
      );
      return this.ballotView(participant);
    });
  }

  resetVotes(participant: string): Promise<bigint> {
    return this.queue.run(async () => {
      const freed = this.allocator.reset(participant);
      if (freed > 0n) {
        this.events.append({
          type: VOTE_RESET_EVENT,
          timestamp: this.clock(),
          payload: { participant, freed: formatAmount(freed) },
        });
        this.logger.info({ participant, freed: formatAmount(freed) }, "votes reset");
      }
      return freed;
    });
  }

  /**
   * Convert current weights into per-pool emission rates.
   * Zero total weight → no-op, nothing refreshed, returns false.
   */
  rebalance(): Promise<boolean> {
    return this.queue.run(async () => {
      if (this.allocator.totalWeight === 0n) return false;
      const now = this.clock();
      const refreshed = await this.accumulator.refreshAll(now);
      this.applyRates(now, refreshed);
      return true;
    });
  }

  refreshAll(): Promise<void> {
    return this.queue.run(async () => {
      const refreshed = await this.accumulator.refreshAll(this.clock());
      this.accumulator.commit(refreshed);
    });
  }

  // ── Governor ─────────────────────────────────────────────────────

  /**
   * Append a pool for `stakedAsset` with a bootstrap weight.
   * `refreshFirst` catches every pool up and re-derives all rates around
   * the weight change; otherwise rates follow at the next rebalance().
   */
  registerPool(
    caller: string,
    stakedAsset: string,
    reservedWeight: bigint,
    refreshFirst: boolean,
  ): Promise<number> {
    return this.queue.run(async () => {
      this.requireGovernor(caller);
      if (stakedAsset === this.rewardAsset) {
        throw new ControllerError(
          "reward_asset_not_stakeable",
          `${stakedAsset} is the reward asset`,
        );
      }
      if (this.registry.idOf(stakedAsset) !== undefined) {
        throw new ControllerError("pool_exists", `pool for ${stakedAsset} already registered`);
      }
      if (reservedWeight < 0n) {
        throw new ControllerError("invalid_amount", `reserved weight must be non-negative`);
      }

      const now = this.clock();
      const refreshed = refreshFirst ? await this.accumulator.refreshAll(now) : [];

      // ── commit ──
      const pool = this.accumulator.register(stakedAsset, now);
      this.allocator.addPool(pool.id, reservedWeight);

      const payload: PoolRegisteredNotice = {
        pool_id: pool.id,
        staked_asset: stakedAsset,
        reserved_weight: formatAmount(reservedWeight),
      };
      this.events.append({ type: POOL_REGISTERED_EVENT, timestamp: now, payload });
      this.logger.info(
        { poolId: pool.id, stakedAsset, reservedWeight: formatAmount(reservedWeight) },
        "pool registered",
      );
      if (refreshFirst) this.applyRates(now, [...refreshed, pool]);
      return pool.id;
    });
  }

  releaseReservedWeight(caller: string, poolId: number, refreshFirst: boolean): Promise<bigint> {
    return this.queue.run(async () => {
      this.requireGovernor(caller);
      this.registry.snapshot(poolId);
      if (this.allocator.weightOf(poolId).reserved === 0n) {
        throw new ControllerError("weight_already_released", `pool ${poolId} has no reserved weight`);
      }

      const now = this.clock();
      const refreshed = refreshFirst ? await this.accumulator.refreshAll(now) : [];

      // ── commit ──
      const released = this.allocator.releaseReserved(poolId);

      this.events.append({
        type: WEIGHT_RELEASED_EVENT,
        timestamp: now,
        payload: { pool_id: poolId, released: formatAmount(released) },
      });
      this.logger.info({ poolId, released: formatAmount(released) }, "reserved weight released");
      if (refreshFirst) this.applyRates(now, refreshed);
      return released;
    });
  }

  /**
   * Pull the whole reward budget from the governor and fix the emission
   * window. Once only. Rates are derived immediately if any weight exists.
   */
  startEmissions(caller: string, totalSupply: bigint): Promise<EmissionSchedule> {
    return this.queue.run(async () => {
      this.requireGovernor(caller);
      const now = this.clock();
      const schedule = this.accumulator.planEmissions(totalSupply, now);

      const tx = new Transaction(this.ledger, this.logger);
      try {
        const refreshed =
          this.allocator.totalWeight > 0n ? await this.accumulator.refreshAll(now) : [];
        tx.transfer({ asset: this.rewardAsset, from: caller, to: this.account, amount: totalSupply });
        await tx.flush();

        // ── commit ──
        this.accumulator.activate(schedule);
        this.events.append({
          type: EMISSIONS_STARTED_EVENT,
          timestamp: now,
          payload: {
            total_supply: formatAmount(totalSupply),
            total_rate: formatAmount(schedule.totalRate),
            started_at: schedule.startedAt,
            ends_at: schedule.endsAt,
          },
        });
        this.logger.info(
          { totalSupply: formatAmount(totalSupply), totalRate: formatAmount(schedule.totalRate), endsAt: schedule.endsAt },
          "emissions started",
        );
        if (refreshed.length > 0) this.applyRates(now, refreshed);
        return schedule;
      } catch (err) {
        await tx.rollback();
        throw err;
      }
    });
  }

  // ── Reads (refresh first) ────────────────────────────────────────

  getPool(poolId: number): Promise<PoolView> {
    return this.queue.run(async () => {
      const pool = await this.accumulator.refresh(poolId, this.clock());
      const view = await this.poolView(pool);
      this.accumulator.commit(pool);
      return view;
    });
  }

  listPools(): Promise<PoolView[]> {
    return this.queue.run(async () => {
      const refreshed = await this.accumulator.refreshAll(this.clock());
      const views: PoolView[] = [];
      for (const pool of refreshed) views.push(await this.poolView(pool));
      this.accumulator.commit(refreshed);
      return views;
    });
  }

  getPosition(poolId: number, participant: string): Promise<PositionView> {
    return this.queue.run(async () => {
      const pool = await this.accumulator.refresh(poolId, this.clock());
      this.accumulator.commit(pool);
      return this.positionView(pool, this.positions.snapshot(pool, participant));
    });
  }

  listPositions(poolId: number): Promise<PositionView[]> {
    return this.queue.run(async () => {
      const pool = await this.accumulator.refresh(poolId, this.clock());
      this.accumulator.commit(pool);
      return this.positions.list(pool).map((p) => this.positionView(pool, p));
    });
  }

  getVotes(participant: string): Promise<BallotView> {
    return this.queue.run(async () => this.ballotView(participant));
  }

  getWeights(): Promise<WeightsView> {
    return this.queue.run(async () => ({
      totalWeight: this.allocator.totalWeight,
      pools: this.registry.ids().map((poolId) => ({ poolId, ...this.allocator.weightOf(poolId) })),
    }));
  }

  getSchedule(): Promise<ScheduleView> {
    return this.queue.run(async () => ({
      schedule: this.accumulator.emissionSchedule,
      unallocatedRate: this.unallocatedRate,
    }));
  }

  // ── Internals ────────────────────────────────────────────────────

  /**
   * Shared shape of deposit / withdraw / claim:
   * refresh → snapshot → settle → move stake → re-boost → commit.
   */
  private async settleStake(
    participant: string,
    poolId: number,
    change: StakeChange,
  ): Promise<StakeReceipt> {
    this.requireParticipant(participant);
    if (change.kind !== "claim" && change.amount <= 0n) {
      throw new ControllerError("invalid_amount", `amount must be positive, got ${change.amount}`);
    }

    const now = this.clock();
    const tx = new Transaction(this.ledger, this.logger);
    try {
      const pool = await this.accumulator.refresh(poolId, now);
      const position = this.positions.snapshot(pool, participant);

      if (change.kind === "withdraw" && change.amount > position.stakedAmount) {
        throw new ControllerError(
          "insufficient_stake",
          `withdraw of ${change.amount} exceeds staked ${position.stakedAmount}`,
        );
      }

      const reward = this.positions.settle(pool, position);
      this.accumulator.recordPayout(pool, reward);
      tx.transfer({ asset: this.rewardAsset, from: this.account, to: participant, amount: reward });

      if (change.kind === "deposit") {
        position.stakedAmount += change.amount;
        tx.transfer({ asset: pool.pool.stakedAsset, from: participant, to: this.account, amount: change.amount });
      } else if (change.kind === "withdraw") {
        position.stakedAmount -= change.amount;
        tx.transfer({ asset: pool.pool.stakedAsset, from: this.account, to: participant, amount: change.amount });
      }

      await tx.flush();
      const derived = await this.boost.recompute(pool, position);
      this.positions.rebase(pool, position, derived);

      // ── commit ──
      this.accumulator.commit(pool);
      this.positions.commit(position);

      const amount = change.kind === "claim" ? 0n : change.amount;
      if (change.kind !== "claim") {
        const payload: StakeNotice = { pool_id: poolId, participant, amount: formatAmount(amount) };
        this.events.append({
          type: change.kind === "deposit" ? DEPOSIT_EVENT : WITHDRAWAL_EVENT,
          timestamp: now,
          payload,
        });
      }
      if (reward > 0n) this.notifyReward(now, poolId, participant, reward);

      this.logger.info(
        {
          op: change.kind,
          poolId,
          participant,
          amount: formatAmount(amount),
          reward: formatAmount(reward),
          derivedStake: formatAmount(derived),
        },
        "position settled",
      );

      return {
        poolId,
        participant,
        amount,
        rewardPaid: reward,
        position: this.positionView(pool, position),
      };
    } catch (err) {
      await tx.rollback();
      throw err;
    }
  }

  /** New rates from current weights onto pools refreshed at `now`. Commits. */
  private applyRates(now: number, refreshed: readonly RefreshedPool[]): void {
    const totalRate = this.accumulator.emissionSchedule?.totalRate ?? 0n;
    const ids = refreshed.map((p) => p.id);
    const split = this.allocator.planRates(totalRate, ids);
    const rates = new Map<number, bigint>();
    ids.forEach((id, i) => rates.set(id, split.rates[i] ?? 0n));

    this.accumulator.retune(refreshed, rates);
    this.unallocatedRate = split.unallocated;

    const payload: RatesNotice = {
      total_rate: formatAmount(totalRate),
      total_weight: formatAmount(this.allocator.totalWeight),
      rates: ids.map((id) => ({ pool_id: id, emission_rate: formatAmount(rates.get(id) ?? 0n) })),
      unallocated_rate: formatAmount(split.unallocated),
    };
    this.events.append({ type: RATES_REBALANCED_EVENT, timestamp: now, payload });
    this.logger.info(
      { pools: ids.length, totalRate: formatAmount(totalRate), unallocated: formatAmount(split.unallocated) },
      "emission rates rebalanced",
    );
  }

  private notifyReward(now: number, poolId: number, participant: string, amount: bigint): void {
    const payload: RewardNotice = { pool_id: poolId, participant, amount: formatAmount(amount) };
    this.events.append({ type: REWARD_PAID_EVENT, timestamp: now, payload });
  }

  /** The controller account holds every pool's stake; it cannot also stake. */
  private requireParticipant(participant: string): void {
    if (participant === this.account) {
      throw new ControllerError("invalid_participant", "the controller account cannot hold positions");
    }
  }

  private requireGovernor(caller: string): void {
    if (caller !== this.governor) {
      throw new ControllerError("forbidden", "governor operation");
    }
  }

  private async poolView(pool: RefreshedPool): Promise<PoolView> {
    const weight = this.allocator.weightOf(pool.id);
    return {
      id: pool.id,
      stakedAsset: pool.pool.stakedAsset,
      emissionRate: pool.pool.emissionRate,
      accRewardPerShare: pool.pool.accRewardPerShare,
      lastDistributionTime: pool.pool.lastDistributionTime,
      emitted: pool.pool.emitted,
      undistributed: pool.pool.undistributed,
      rewardsPaid: pool.pool.rewardsPaid,
      totalStaked: await this.ledger.balanceOf(pool.pool.stakedAsset, this.account),
      reservedWeight: weight.reserved,
      votedWeight: weight.voted,
    };
  }

  private positionView(pool: RefreshedPool, position: PositionRecord): PositionView {
    return {
      poolId: position.poolId,
      participant: position.participant,
      stakedAmount: position.stakedAmount,
      derivedStake: position.derivedStake,
      rewardDebt: position.rewardDebt,
      pending: this.positions.pending(pool, position),
    };
  }

  private ballotView(participant: string): BallotView {
    const ballot = this.allocator.ballotOf(participant);
    if (!ballot) return { participant, usedWeight: 0n, allocations: [] };
    return {
      participant,
      usedWeight: ballot.usedWeight,
      allocations: ballot.pools.map((poolId) => ({
        poolId,
        weight: ballot.allocations.get(poolId) ?? 0n,
      })),
    };
  }
}
