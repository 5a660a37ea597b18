/**
 * Staged transfers and compensation.
 */

import { describe, it, expect, vi } from "vitest";
import { MemoryAssetLedger, LedgerError, type AssetLedger } from "@streamgauge/asset-ledger";
import { Transaction } from "../src/engine/transaction.js";
import { ControllerError } from "../src/engine/errors.js";
import { silentLogger } from "./helpers.js";

describe("Transaction", () => {
  it("applies staged transfers in order", async () => {
    const ledger = new MemoryAssetLedger();
    ledger.mint("lp", "a", 10n);
    const tx = new Transaction(ledger, silentLogger);
    tx.transfer({ asset: "lp", from: "a", to: "b", amount: 10n });
    tx.transfer({ asset: "lp", from: "b", to: "c", amount: 4n });
    await tx.flush();

    expect(await ledger.balanceOf("lp", "b")).toBe(6n);
    expect(await ledger.balanceOf("lp", "c")).toBe(4n);
  });

  it("skips zero transfers and rejects negative ones", () => {
    const ledger = new MemoryAssetLedger();
    const tx = new Transaction(ledger, silentLogger);
    tx.transfer({ asset: "lp", from: "a", to: "b", amount: 0n });
    expect(() => tx.transfer({ asset: "lp", from: "a", to: "b", amount: -1n })).toThrow(ControllerError);
  });

  it("wraps a ledger rejection as transfer_failed", async () => {
    const ledger = new MemoryAssetLedger();
    const tx = new Transaction(ledger, silentLogger);
    tx.transfer({ asset: "lp", from: "a", to: "b", amount: 1n });

    const err = await tx.flush().then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(ControllerError);
    expect(err).toMatchObject({ code: "transfer_failed" });
    expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(LedgerError);
  });

  it("rollback reverses applied transfers newest first", async () => {
    const ledger = new MemoryAssetLedger();
    ledger.mint("lp", "a", 10n);
    ledger.mint("rw", "pool", 5n);
    const tx = new Transaction(ledger, silentLogger);
    tx.transfer({ asset: "rw", from: "pool", to: "a", amount: 5n });
    tx.transfer({ asset: "lp", from: "a", to: "pool", amount: 10n });
    tx.transfer({ asset: "lp", from: "a", to: "pool", amount: 1n });

    await expect(tx.flush()).rejects.toMatchObject({ code: "transfer_failed" });
    await tx.rollback();

    expect(await ledger.balanceOf("lp", "a")).toBe(10n);
    expect(await ledger.balanceOf("rw", "pool")).toBe(5n);
    expect(ledger.transfers().slice(2)).toEqual([
      { asset: "lp", from: "pool", to: "a", amount: 10n },
      { asset: "rw", from: "a", to: "pool", amount: 5n },
    ]);
  });

  it("rollback reports a reversal that itself fails", async () => {
    const inner = new MemoryAssetLedger();
    inner.mint("lp", "a", 10n);
    let calls = 0;
    const ledger: AssetLedger = {
      balanceOf: (asset, holder) => inner.balanceOf(asset, holder),
      transfer: vi.fn(async (asset: string, from: string, to: string, amount: bigint) => {
        calls++;
        // 1: forward ok, 2: forward fails, 3: reversal fails
        if (calls >= 2) throw new LedgerError("transfer_refused", "ledger offline");
        await inner.transfer(asset, from, to, amount);
      }),
    };

    const tx = new Transaction(ledger, silentLogger);
    tx.transfer({ asset: "lp", from: "a", to: "b", amount: 3n });
    tx.transfer({ asset: "lp", from: "a", to: "b", amount: 3n });
    await expect(tx.flush()).rejects.toMatchObject({ code: "transfer_failed" });
    await expect(tx.rollback()).rejects.toMatchObject({ code: "rollback_failed" });
    expect(ledger.transfer).toHaveBeenCalledTimes(3);
  });
});
