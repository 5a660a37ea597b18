/**
 * Schema barrel export.
 * All V1 wire types used across the controller surface.
 */

export { Hex32, Amount, PoolId, AssetId } from "./common.js";

export {
  ActionV1,
  StakePayload,
  ClaimPayload,
  ClaimManyPayload,
  VotePayload,
  ResetVotesPayload,
  RegisterPoolPayload,
  ReleaseWeightPayload,
  StartEmissionsPayload,
} from "./action.js";

export { PoolV1 } from "./pool.js";

export { PositionV1 } from "./position.js";

export {
  VoteV1,
  VoteAllocation,
  PoolWeight,
  WeightsV1,
  ScheduleV1,
} from "./vote.js";
