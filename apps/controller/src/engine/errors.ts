/**
 * Controller error taxonomy.
 *
 * Every code here rejects the whole operation with no state change.
 */

export type ControllerErrorCode =
  // invariant violations
  | "invalid_amount"
  | "insufficient_stake"
  | "length_mismatch"
  | "empty_vote"
  | "duplicate_pool"
  | "zero_weight_sum"
  | "unknown_pool"
  | "pool_exists"
  | "reward_asset_not_stakeable"
  | "emissions_already_started"
  | "emission_rate_zero"
  | "weight_already_released"
  | "forbidden"
  | "invalid_participant"
  | "too_many_pools"
  // resource failures
  | "transfer_failed"
  | "rollback_failed";

export class ControllerError extends Error {
  readonly code: ControllerErrorCode;

  constructor(code: ControllerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ControllerError";
    this.code = code;
  }
}

export function isControllerError(err: unknown): err is ControllerError {
  return err instanceof ControllerError;
}
