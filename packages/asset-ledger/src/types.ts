/**
 * Collaborator interfaces: the controller's view of the outside world.
 *
 * AssetLedger moves and reports fungible balances (reward asset, staked
 * assets). PowerSource reports time-locked governance power; how that
 * power accrues or decays is its own business.
 *
 * Wire behind these interfaces so implementations can swap.
 */

export type LedgerErrorCode =
  | "insufficient_balance"
  | "transfer_refused"
  | "invalid_amount";

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

export interface TransferRecord {
  asset: string;
  from: string;
  to: string;
  amount: bigint;
}

export interface AssetLedger {
  /**
   * Move `amount` of `asset` from `from` to `to`.
   * Rejects with LedgerError if the balance is short or the transfer is
   * refused; a rejected transfer changes nothing.
   */
  transfer(asset: string, from: string, to: string, amount: bigint): Promise<void>;
  balanceOf(asset: string, holder: string): Promise<bigint>;
}

export interface PowerSource {
  /** Current voting power of `holder`. */
  powerOf(holder: string): Promise<bigint>;
  /** Total outstanding voting power. */
  totalPower(): Promise<bigint>;
}
