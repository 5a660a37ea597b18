/**
 * In-memory asset ledger.
 *
 * Mint/burn/transfer bookkeeping per (asset, holder). Backs dev mode and
 * tests. refuse() makes every transfer touching a holder reject, to
 * exercise rollback paths.
 */

import { LedgerError, type AssetLedger, type TransferRecord } from "./types.js";

export class MemoryAssetLedger implements AssetLedger {
  private readonly balances = new Map<string, Map<string, bigint>>();
  private readonly supplies = new Map<string, bigint>();
  private readonly refused = new Set<string>();
  private readonly log: TransferRecord[] = [];

  async transfer(asset: string, from: string, to: string, amount: bigint): Promise<void> {
    if (amount < 0n) {
      throw new LedgerError("invalid_amount", `negative transfer of ${asset}: ${amount}`);
    }
    if (this.refused.has(from) || this.refused.has(to)) {
      throw new LedgerError("transfer_refused", `transfer of ${asset} ${from} → ${to} refused`);
    }
    const held = this.read(asset, from);
    if (held < amount) {
      throw new LedgerError(
        "insufficient_balance",
        `${from} holds ${held} ${asset}, needs ${amount}`,
      );
    }
    if (amount === 0n || from === to) return;

    this.write(asset, from, held - amount);
    this.write(asset, to, this.read(asset, to) + amount);
    this.log.push({ asset, from, to, amount });
  }

  async balanceOf(asset: string, holder: string): Promise<bigint> {
    return this.read(asset, holder);
  }

  totalSupply(asset: string): bigint {
    return this.supplies.get(asset) ?? 0n;
  }

  mint(asset: string, to: string, amount: bigint): void {
    if (amount <= 0n) throw new LedgerError("invalid_amount", `mint of ${amount} ${asset}`);
    this.write(asset, to, this.read(asset, to) + amount);
    this.supplies.set(asset, this.totalSupply(asset) + amount);
  }

  burn(asset: string, from: string, amount: bigint): void {
    if (amount <= 0n) throw new LedgerError("invalid_amount", `burn of ${amount} ${asset}`);
    const held = this.read(asset, from);
    if (held < amount) {
      throw new LedgerError("insufficient_balance", `${from} holds ${held} ${asset}, burns ${amount}`);
    }
    this.write(asset, from, held - amount);
    this.supplies.set(asset, this.totalSupply(asset) - amount);
  }

  /** Test helper: reject every transfer to or from `holder`. */
  refuse(holder: string): void {
    this.refused.add(holder);
  }

  /** Test helper: undo refuse(). */
  allow(holder: string): void {
    this.refused.delete(holder);
  }

  /** Applied transfers, oldest first. */
  transfers(): readonly TransferRecord[] {
    return this.log;
  }

  private read(asset: string, holder: string): bigint {
    return this.balances.get(asset)?.get(holder) ?? 0n;
  }

  private write(asset: string, holder: string, amount: bigint): void {
    let holders = this.balances.get(asset);
    if (!holders) {
      holders = new Map();
      this.balances.set(asset, holders);
    }
    if (amount === 0n) holders.delete(holder);
    else holders.set(holder, amount);
  }
}
