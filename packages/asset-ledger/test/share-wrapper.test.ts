import { describe, it, expect } from "vitest";
import { MemoryAssetLedger, ShareWrapper, LedgerError } from "../src/index.js";

function setup() {
  const ledger = new MemoryAssetLedger();
  ledger.mint("steth", "alice", 1000n);
  ledger.mint("steth", "bob", 1000n);
  const wrapper = new ShareWrapper(ledger, "steth", "vault");
  return { ledger, wrapper };
}

describe("ShareWrapper", () => {
  it("first deposit mints 1:1", async () => {
    const { ledger, wrapper } = setup();
    expect(await wrapper.deposit("alice", 100n)).toBe(100n);
    expect(wrapper.sharesOf("alice")).toBe(100n);
    expect(wrapper.totalShares).toBe(100n);
    expect(await ledger.balanceOf("steth", "vault")).toBe(100n);
  });

  it("a rebase moves every holder's claim proportionally", async () => {
    const { ledger, wrapper } = setup();
    await wrapper.deposit("alice", 100n);

    // underlying rebases +100% in the vault
    ledger.mint("steth", "vault", 100n);

    // bob deposits 100 at balance 200 / 100 shares → 100 × 100 / 200 = 50 shares
    expect(await wrapper.deposit("bob", 100n)).toBe(50n);

    // alice burns 100 of 150 shares against balance 300 → 100 × 300 / 150 = 200
    expect(await wrapper.withdraw("alice", 100n)).toBe(200n);
    expect(wrapper.sharesOf("alice")).toBe(0n);
    expect(await ledger.balanceOf("steth", "alice")).toBe(1100n);

    // bob's 50 shares are the rest: 50 × 100 / 50 = 100
    expect(await wrapper.withdraw("bob", 50n)).toBe(100n);
    expect(wrapper.totalShares).toBe(0n);
  });

  it("rejects deposits that mint nothing", async () => {
    const { ledger, wrapper } = setup();
    await wrapper.deposit("alice", 1n);
    ledger.mint("steth", "vault", 999n);
    // 1 × 1 / 1000 = 0
    await expect(wrapper.deposit("bob", 1n)).rejects.toBeInstanceOf(LedgerError);
  });

  it("rejects burning more than held", async () => {
    const { wrapper } = setup();
    await wrapper.deposit("alice", 10n);
    await expect(wrapper.withdraw("alice", 11n)).rejects.toMatchObject({ code: "insufficient_balance" });
  });

  it("failed transfer mints no shares", async () => {
    const { ledger, wrapper } = setup();
    ledger.refuse("alice");
    await expect(wrapper.deposit("alice", 10n)).rejects.toMatchObject({ code: "transfer_refused" });
    expect(wrapper.totalShares).toBe(0n);
  });
});
