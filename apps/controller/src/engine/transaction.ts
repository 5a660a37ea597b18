/**
 * Transaction: staged ledger transfers with compensation.
 *
 * An operation stages transfers, flushes them in order, and only then
 * commits its state drafts (synchronously, in one step). If a transfer
 * rejects, the transfers already applied are reversed newest-first and
 * the operation's drafts are dropped.
 */

import type { Logger } from "pino";
import { formatAmount } from "@streamgauge/accrual";
import type { AssetLedger } from "@streamgauge/asset-ledger";
import { ControllerError } from "./errors.js";

export interface StagedTransfer {
  asset: string;
  from: string;
  to: string;
  amount: bigint;
}

export class Transaction {
  private readonly staged: StagedTransfer[] = [];
  private readonly applied: StagedTransfer[] = [];

  constructor(
    private readonly ledger: AssetLedger,
    private readonly logger: Logger,
  ) {}

  /** Stage a transfer. Zero amounts are skipped. */
  transfer(t: StagedTransfer): void {
    if (t.amount < 0n) {
      throw new ControllerError("invalid_amount", `negative transfer of ${t.asset}`);
    }
    if (t.amount === 0n) return;
    this.staged.push(t);
  }

  /** Apply staged transfers in order. */
  async flush(): Promise<void> {
    while (this.staged.length > 0) {
      const t = this.staged.shift();
      if (!t) break;
      try {
        await this.ledger.transfer(t.asset, t.from, t.to, t.amount);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ControllerError(
          "transfer_failed",
          `transfer of ${formatAmount(t.amount)} ${t.asset} ${t.from} → ${t.to} failed: ${reason}`,
          { cause: err },
        );
      }
      this.applied.push(t);
    }
  }

  /**
   * Reverse every applied transfer, newest first.
   *
   * @throws ControllerError rollback_failed if any reversal rejects
   */
  async rollback(): Promise<void> {
    this.staged.length = 0;
    const failures: unknown[] = [];

    while (this.applied.length > 0) {
      const t = this.applied.pop();
      if (!t) break;
      try {
        await this.ledger.transfer(t.asset, t.to, t.from, t.amount);
        this.logger.warn(
          { asset: t.asset, from: t.to, to: t.from, amount: formatAmount(t.amount) },
          "transfer reversed",
        );
      } catch (err) {
        failures.push(err);
        this.logger.error(
          { err, asset: t.asset, from: t.to, to: t.from, amount: formatAmount(t.amount) },
          "transfer reversal failed",
        );
      }
    }

    if (failures.length > 0) {
      throw new ControllerError(
        "rollback_failed",
        `${failures.length} transfer reversal(s) failed`,
        { cause: failures[0] },
      );
    }
  }
}
