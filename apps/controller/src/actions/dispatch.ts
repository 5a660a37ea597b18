/**
 * ActionV1 kind → controller call.
 *
 * The envelope is already verified (signature, nonce, skew). Here the body
 * is decoded, checked against its kind schema, and run. Amount strings are
 * parsed to bigint at this boundary and results formatted back.
 */

import { Value } from "@sinclair/typebox/value";
import type { TSchema, Static } from "@sinclair/typebox";
import {
  decodeActionBody,
  formatAmount,
  parseAmount,
  ACTION_KIND_DEPOSIT,
  ACTION_KIND_WITHDRAW,
  ACTION_KIND_CLAIM,
  ACTION_KIND_CLAIM_MANY,
  ACTION_KIND_VOTE,
  ACTION_KIND_RESET_VOTES,
  ACTION_KIND_REGISTER_POOL,
  ACTION_KIND_RELEASE_WEIGHT,
  ACTION_KIND_START_EMISSIONS,
  StakePayload,
  ClaimPayload,
  ClaimManyPayload,
  VotePayload,
  ResetVotesPayload,
  RegisterPoolPayload,
  ReleaseWeightPayload,
  StartEmissionsPayload,
  type ActionV1,
} from "@streamgauge/accrual";
import type { GaugeController } from "../engine/controller.js";
import { ballotToWire, positionToWire } from "../views/wire.js";

/** A body that does not decode or does not match its kind schema. */
export class InvalidActionBody extends Error {
  constructor(
    readonly kind: number,
    message: string,
  ) {
    super(message);
    this.name = "InvalidActionBody";
  }
}

export type ActionResult = Record<string, unknown>;

function payload<T extends TSchema>(schema: T, action: ActionV1): Static<T> {
  let decoded: unknown;
  try {
    decoded = decodeActionBody(action.body);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidActionBody(action.kind, `body does not decode: ${reason}`);
  }
  if (!Value.Check(schema, decoded)) {
    const first = Value.Errors(schema, decoded).First();
    throw new InvalidActionBody(
      action.kind,
      first ? `${first.path || "/"}: ${first.message}` : "body does not match kind schema",
    );
  }
  return decoded;
}

export async function dispatchAction(
  controller: GaugeController,
  action: ActionV1,
): Promise<ActionResult> {
  const from = action.from;

  switch (action.kind) {
    case ACTION_KIND_DEPOSIT:
    case ACTION_KIND_WITHDRAW: {
      const body = payload(StakePayload, action);
      const amount = parseAmount(body.amount);
      const receipt =
        action.kind === ACTION_KIND_DEPOSIT
          ? await controller.deposit(from, body.pool_id, amount)
          : await controller.withdraw(from, body.pool_id, amount);
      return {
        reward_paid: formatAmount(receipt.rewardPaid),
        position: positionToWire(receipt.position),
      };
    }

    case ACTION_KIND_CLAIM: {
      const body = payload(ClaimPayload, action);
      const receipt = await controller.claim(from, body.pool_id);
      return {
        reward_paid: formatAmount(receipt.rewardPaid),
        position: positionToWire(receipt.position),
      };
    }

    case ACTION_KIND_CLAIM_MANY: {
      const body = payload(ClaimManyPayload, action);
      const total = await controller.claimMany(from, body.pool_ids);
      return { reward_paid: formatAmount(total) };
    }

    case ACTION_KIND_VOTE: {
      const body = payload(VotePayload, action);
      const ballot = await controller.vote(from, body.pool_ids, body.weights.map(parseAmount));
      return { vote: ballotToWire(ballot) };
    }

    case ACTION_KIND_RESET_VOTES: {
      payload(ResetVotesPayload, action);
      const freed = await controller.resetVotes(from);
      return { freed: formatAmount(freed) };
    }

    case ACTION_KIND_REGISTER_POOL: {
      const body = payload(RegisterPoolPayload, action);
      const poolId = await controller.registerPool(
        from,
        body.staked_asset,
        parseAmount(body.reserved_weight),
        body.refresh_first,
      );
      return { pool_id: poolId };
    }

    case ACTION_KIND_RELEASE_WEIGHT: {
      const body = payload(ReleaseWeightPayload, action);
      const released = await controller.releaseReservedWeight(from, body.pool_id, body.refresh_first);
      return { released: formatAmount(released) };
    }

    case ACTION_KIND_START_EMISSIONS: {
      const body = payload(StartEmissionsPayload, action);
      const schedule = await controller.startEmissions(from, parseAmount(body.total_supply));
      return {
        total_rate: formatAmount(schedule.totalRate),
        started_at: schedule.startedAt,
        ends_at: schedule.endsAt,
      };
    }

    default:
      throw new InvalidActionBody(action.kind, `unknown kind 0x${action.kind.toString(16)}`);
  }
}
