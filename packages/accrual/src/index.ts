/**
 * @streamgauge/accrual: frozen accrual primitives and wire schemas.
 *
 * Pure functions and constants only: no I/O, no state.
 * The controller imports from here, never the reverse.
 */

// Accumulator math
export {
  accrue,
  rewardDebt,
  pendingReward,
  type AccrualState,
  type AccrualResult,
} from "./accumulator.js";

// Boost
export { derivedStake, type BoostInput } from "./boost.js";

// Vote normalisation + emission split
export {
  normalizeVotes,
  poolEmissionRate,
  splitEmission,
  WeightError,
  type EmissionSplit,
} from "./weights.js";

// Wire amounts
export { parseAmount, formatAmount, isAmount } from "./amount.js";

// Encoding + digests
export { canonicalEncode, canonicalDecode } from "./canonical.js";
export { digestObject, fromHex, toHex } from "./digest.js";

// Ed25519 + payload signatures
export { generateKeypair, ed25519Sign, ed25519Verify } from "./ed25519.js";
export { signPayload, verifyPayloadSignature } from "./action-signature.js";

// ActionV1 operations
export {
  actionSigningPayload,
  computeActionId,
  signAction,
  verifyAction,
  encodeActionBody,
  decodeActionBody,
  type UnsignedActionV1,
} from "./action-v1.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
