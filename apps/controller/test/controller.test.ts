/**
 * Gauge controller scenarios: settlement, boost, zero-stake intervals,
 * rate changes, emission window.
 *
 * Pools below run at 1000 reward units/s unless stated. ACC_SCALE = 10^12.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ACC_SCALE, EMISSION_WINDOW_SECS } from "@streamgauge/accrual";
import { ACCOUNT, REWARD, START, SUPPLY, bootstrap, createHarness, type Harness } from "./helpers.js";

let h: Harness;

beforeEach(() => {
  h = createHarness();
});

describe("single pool accrual", () => {
  beforeEach(async () => {
    await bootstrap(h, [["lp-a", 100n]]);
    h.ledger.mint("lp-a", "alice", 1000n);
  });

  it("fully boosted sole staker earns the whole emission", async () => {
    h.power.setPower("alice", 100n);

    // poolShare = 1000 × 100 / 100 = 1000, boosted = 600, derived = min(400 + 600, 1000)
    const receipt = await h.controller.deposit("alice", 0, 1000n);
    expect(receipt.rewardPaid).toBe(0n);
    expect(receipt.position.derivedStake).toBe(1000n);

    h.advance(100);
    // acc = 100 × 1000 × 10^12 / 1000 = 10^14 → pending = 1000 × 10^14 / 10^12
    const position = await h.controller.getPosition(0, "alice");
    expect(position.pending).toBe(100_000n);

    const claimed = await h.controller.claim("alice", 0);
    expect(claimed.rewardPaid).toBe(100_000n);
    expect(claimed.position.pending).toBe(0n);
    expect(await h.ledger.balanceOf(REWARD, "alice")).toBe(100_000n);
  });

  it("unboosted staker earns 40% of its share", async () => {
    await h.controller.deposit("alice", 0, 1000n);
    h.advance(100);

    // derived = 1000 × 40 / 100 = 400, acc = 10^14 → pending = 40_000
    const position = await h.controller.getPosition(0, "alice");
    expect(position.derivedStake).toBe(400n);
    expect(position.pending).toBe(40_000n);

    const pool = await h.controller.getPool(0);
    expect(pool.emitted).toBe(100_000n);
    expect(pool.undistributed).toBe(0n);
    expect(pool.accRewardPerShare).toBe(100n * ACC_SCALE);
    expect(pool.totalStaked).toBe(1000n);
  });

  it("a deposit re-baselines debt against the new derived stake", async () => {
    await h.controller.deposit("alice", 0, 1000n);
    h.advance(100);

    // Top-up at acc = 10^14 pays the 40_000 accrued on derived 400
    h.power.setPower("alice", 100n);
    h.ledger.mint("lp-a", "alice", 1000n);
    const receipt = await h.controller.deposit("alice", 0, 1000n);
    expect(receipt.rewardPaid).toBe(40_000n);
    // staked 2000, poolShare 2000 → 800 + 1200 = 2000
    expect(receipt.position.derivedStake).toBe(2000n);
    expect(receipt.position.rewardDebt).toBe(200_000n);

    h.advance(100);
    // acc = 10^14 + 100_000 × 10^12 / 2000 = 1.5 × 10^14
    // pending = 2000 × 1.5 × 10^14 / 10^12 − 200_000 = 100_000
    expect((await h.controller.getPosition(0, "alice")).pending).toBe(100_000n);
  });

  it("withdraw pays out and returns stake", async () => {
    await h.controller.deposit("alice", 0, 1000n);
    h.advance(100);

    const receipt = await h.controller.withdraw("alice", 0, 400n);
    expect(receipt.rewardPaid).toBe(40_000n);
    expect(receipt.position.stakedAmount).toBe(600n);
    // 600 × 40 / 100
    expect(receipt.position.derivedStake).toBe(240n);
    expect(await h.ledger.balanceOf("lp-a", "alice")).toBe(400n);
    expect(await h.ledger.balanceOf("lp-a", ACCOUNT)).toBe(600n);
  });

  it("full withdrawal removes the position", async () => {
    await h.controller.deposit("alice", 0, 1000n);
    await h.controller.withdraw("alice", 0, 1000n);

    expect(await h.controller.listPositions(0)).toEqual([]);
    const position = await h.controller.getPosition(0, "alice");
    expect(position.stakedAmount).toBe(0n);
    expect(position.derivedStake).toBe(0n);
  });
});

describe("two stakers with different boost", () => {
  beforeEach(async () => {
    await bootstrap(h, [["lp-a", 100n]]);
    h.ledger.mint("lp-a", "alice", 1000n);
    h.ledger.mint("lp-a", "bob", 1000n);
    h.power.setPower("alice", 100n);
  });

  it("rewards follow derived stake, not raw stake", async () => {
    // alice: pool 1000, share 1000 → 1000. bob: power 0 → 400.
    await h.controller.deposit("alice", 0, 1000n);
    await h.controller.deposit("bob", 0, 1000n);
    h.advance(100);

    // acc = 100_000 × 10^12 / 2000 = 5 × 10^13
    expect((await h.controller.getPosition(0, "alice")).pending).toBe(50_000n);
    expect((await h.controller.getPosition(0, "bob")).pending).toBe(20_000n);
  });

  it("a leaving staker raises everyone else's share", async () => {
    await h.controller.deposit("alice", 0, 1000n);
    await h.controller.deposit("bob", 0, 1000n);
    h.advance(100);

    const bob = await h.controller.withdraw("bob", 0, 1000n);
    expect(bob.rewardPaid).toBe(20_000n);

    h.advance(100);
    // acc = 5 × 10^13 + 100_000 × 10^12 / 1000 = 1.5 × 10^14 → 150_000
    expect((await h.controller.getPosition(0, "alice")).pending).toBe(150_000n);
  });

  it("listPositions returns both with pending", async () => {
    await h.controller.deposit("alice", 0, 1000n);
    await h.controller.deposit("bob", 0, 1000n);
    h.advance(10);

    const positions = await h.controller.listPositions(0);
    expect(positions.map((p) => [p.participant, p.pending])).toEqual([
      ["alice", 5_000n],
      ["bob", 2_000n],
    ]);
  });
});

describe("zero-stake intervals", () => {
  it("emission while nothing is staked is dropped, not back-paid", async () => {
    await bootstrap(h, [["lp-a", 100n]]);
    h.advance(100);

    h.ledger.mint("lp-a", "alice", 1000n);
    h.power.setPower("alice", 100n);
    await h.controller.deposit("alice", 0, 1000n);
    h.advance(100);

    expect((await h.controller.getPosition(0, "alice")).pending).toBe(100_000n);
    const pool = await h.controller.getPool(0);
    expect(pool.emitted).toBe(200_000n);
    expect(pool.undistributed).toBe(100_000n);
    expect(pool.lastDistributionTime).toBe(START + 200);
  });
});

describe("rate changes", () => {
  beforeEach(async () => {
    await bootstrap(h, [
      ["lp-a", 100n],
      ["lp-b", 0n],
    ]);
    h.ledger.mint("lp-a", "alice", 1000n);
    await h.controller.deposit("alice", 0, 1000n);
  });

  it("startEmissions sets rates from reserved weight", async () => {
    expect((await h.controller.getPool(0)).emissionRate).toBe(1000n);
    expect((await h.controller.getPool(1)).emissionRate).toBe(0n);
  });

  it("a new rate applies only from the rebalance moment", async () => {
    h.advance(100);
    h.power.setPower("carol", 100n);
    await h.controller.vote("carol", [1], [1n]);
    expect(await h.controller.rebalance()).toBe(true);

    h.advance(100);
    // 100s at 1000/s then 100s at 500/s over 1000 staked:
    // acc = 10^14 + 5 × 10^13
    const pool0 = await h.controller.getPool(0);
    expect(pool0.emissionRate).toBe(500n);
    expect(pool0.accRewardPerShare).toBe(150n * ACC_SCALE);

    const pool1 = await h.controller.getPool(1);
    expect(pool1.emissionRate).toBe(500n);
    expect(pool1.emitted).toBe(50_000n);
    expect(pool1.undistributed).toBe(50_000n);
  });

  it("votes alone do not change rates", async () => {
    h.power.setPower("carol", 100n);
    await h.controller.vote("carol", [1], [1n]);
    expect((await h.controller.getPool(0)).emissionRate).toBe(1000n);
    expect((await h.controller.getWeights()).totalWeight).toBe(200n);
  });

  it("releasing reserved weight with refresh retunes immediately", async () => {
    h.power.setPower("carol", 100n);
    await h.controller.vote("carol", [1], [1n]);
    h.advance(100);

    expect(await h.controller.releaseReservedWeight("gov", 0, true)).toBe(100n);
    expect((await h.controller.getPool(0)).emissionRate).toBe(0n);
    expect((await h.controller.getPool(1)).emissionRate).toBe(1000n);
    // the 100s before the release still accrued at 1000/s
    expect((await h.controller.getPool(0)).accRewardPerShare).toBe(100n * ACC_SCALE);

    await expect(h.controller.releaseReservedWeight("gov", 0, true)).rejects.toMatchObject({
      code: "weight_already_released",
    });
  });

  it("releasing without refresh leaves rates until rebalance", async () => {
    h.power.setPower("carol", 100n);
    await h.controller.vote("carol", [1], [1n]);
    await h.controller.releaseReservedWeight("gov", 0, false);

    expect((await h.controller.getPool(0)).emissionRate).toBe(1000n);
    await h.controller.rebalance();
    expect((await h.controller.getPool(0)).emissionRate).toBe(0n);
    expect((await h.controller.getPool(1)).emissionRate).toBe(1000n);
  });

  it("registering with refresh splits the rate from that moment", async () => {
    h.power.setPower("alice", 100n);
    h.advance(100);
    const id = await h.controller.registerPool("gov", "lp-c", 100n, true);
    expect(id).toBe(2);

    const rates = (await h.controller.listPools()).map((p) => p.emissionRate);
    expect(rates).toEqual([500n, 0n, 500n]);
  });

  it("registering without refresh leaves existing rates", async () => {
    await h.controller.registerPool("gov", "lp-c", 100n, false);
    const rates = (await h.controller.listPools()).map((p) => p.emissionRate);
    expect(rates).toEqual([1000n, 0n, 0n]);
  });
});

describe("rebalance", () => {
  it("zero total weight is a no-op", async () => {
    await bootstrap(h, [["lp-a", 0n]]);
    const before = h.events.count();
    expect(await h.controller.rebalance()).toBe(false);
    expect(h.events.count()).toBe(before);
  });

  it("flooring remainder is reported as unallocated", async () => {
    await bootstrap(h, [
      ["lp-a", 1n],
      ["lp-b", 1n],
      ["lp-c", 1n],
    ]);
    // 1000 / 3 = 333 each, 1 left over
    const rates = (await h.controller.listPools()).map((p) => p.emissionRate);
    expect(rates).toEqual([333n, 333n, 333n]);
    expect((await h.controller.getSchedule()).unallocatedRate).toBe(1n);
  });
});

describe("emission window", () => {
  it("accrual stops at the end of the window and pays out the full supply", async () => {
    await bootstrap(h, [["lp-a", 100n]]);
    h.ledger.mint("lp-a", "alice", 1000n);
    h.power.setPower("alice", 100n);
    await h.controller.deposit("alice", 0, 1000n);

    const { schedule } = await h.controller.getSchedule();
    expect(schedule).toEqual({ totalRate: 1000n, startedAt: START, endsAt: START + EMISSION_WINDOW_SECS });

    h.advance(EMISSION_WINDOW_SECS + 5000);
    const claimed = await h.controller.claim("alice", 0);
    expect(claimed.rewardPaid).toBe(SUPPLY);
    expect(await h.ledger.balanceOf(REWARD, ACCOUNT)).toBe(0n);

    h.advance(100);
    expect((await h.controller.getPosition(0, "alice")).pending).toBe(0n);
  });
});

describe("claimMany", () => {
  beforeEach(async () => {
    await bootstrap(h, [
      ["lp-a", 100n],
      ["lp-b", 100n],
    ]);
    h.power.setPower("alice", 100n);
    h.ledger.mint("lp-a", "alice", 1000n);
    h.ledger.mint("lp-b", "alice", 1000n);
    await h.controller.deposit("alice", 0, 1000n);
    await h.controller.deposit("alice", 1, 1000n);
    h.advance(100);
  });

  it("pays every pool in one transfer", async () => {
    // 100s × 500/s in each pool
    expect(await h.controller.claimMany("alice", [0, 1])).toBe(100_000n);
    const payouts = h.ledger.transfers().filter((t) => t.asset === REWARD && t.to === "alice");
    expect(payouts).toEqual([{ asset: REWARD, from: ACCOUNT, to: "alice", amount: 100_000n }]);
  });

  it("rejects duplicates and unknown pools before paying", async () => {
    await expect(h.controller.claimMany("alice", [0, 0])).rejects.toMatchObject({ code: "duplicate_pool" });
    await expect(h.controller.claimMany("alice", [0, 9])).rejects.toMatchObject({ code: "unknown_pool" });
    expect(await h.ledger.balanceOf(REWARD, "alice")).toBe(0n);
  });
});

describe("notifications", () => {
  it("appends deposit and payout notices in order", async () => {
    await bootstrap(h, [["lp-a", 100n]]);
    h.ledger.mint("lp-a", "alice", 1000n);
    const seen: string[] = [];
    const unsubscribe = h.events.subscribe((e) => seen.push(e.type));

    await h.controller.deposit("alice", 0, 1000n);
    h.advance(10);
    await h.controller.withdraw("alice", 0, 1000n);
    unsubscribe();
    await h.controller.claim("alice", 0);

    expect(seen).toEqual(["deposit.v1", "withdrawal.v1", "reward.paid.v1"]);
    const [deposit] = h.events.getEventsByType("deposit.v1");
    expect(deposit?.payload).toEqual({ pool_id: 0, participant: "alice", amount: "1000" });
    expect(deposit?.timestamp).toBe(START);
    // 10s × 1000/s on derived 400 of 1000
    expect(h.events.getEventsByType("reward.paid.v1")[0]?.payload).toEqual({
      pool_id: 0,
      participant: "alice",
      amount: "4000",
    });
  });
});
