/**
 * Controller server: gauge controller over HTTP.
 *
 * Owns: pools, positions, votes, emission schedule, notification log.
 * Every state change arrives as a signed ActionV1.
 *
 * Routes:
 *   POST /action                           : signed action ingest (ActionV1 envelope)
 *   POST /rebalance                        : convert weights into rates (public)
 *   POST /refresh                          : catch every pool up (public)
 *   GET  /pools                            : every pool, refreshed
 *   GET  /pools/:id                        : one pool, refreshed
 *   GET  /pools/:id/positions              : positions in a pool
 *   GET  /pools/:id/positions/:participant : one position with pending reward
 *   GET  /votes/:participant               : a participant's live ballot
 *   GET  /weights                          : reserved + voted weight per pool
 *   GET  /schedule                         : emission schedule
 *   GET  /events                           : notification log (from, type)
 *   GET  /health                           : health check
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyReply } from "fastify";
import { pino, type Logger } from "pino";
import { Value } from "@sinclair/typebox/value";
import { computeActionId, verifyAction, ActionV1 } from "@streamgauge/accrual";
import {
  MemoryAssetLedger,
  MemoryPowerSource,
  type AssetLedger,
  type PowerSource,
} from "@streamgauge/asset-ledger";
import { config } from "./config.js";
import { GaugeController } from "./engine/controller.js";
import { systemClock, type Clock } from "./engine/clock.js";
import { isControllerError, type ControllerErrorCode } from "./engine/errors.js";
import { EventLog } from "./event-log/writer.js";
import { NonceStore } from "./actions/nonce-store.js";
import { dispatchAction, InvalidActionBody } from "./actions/dispatch.js";
import {
  ballotToWire,
  poolToWire,
  positionToWire,
  scheduleToWire,
  weightsToWire,
} from "./views/wire.js";

const HEX32 = /^[0-9a-f]{64}$/;
const INDEX = /^(0|[1-9][0-9]*)$/;

const ERROR_STATUS: Partial<Record<ControllerErrorCode, number>> = {
  forbidden: 403,
  unknown_pool: 404,
  pool_exists: 409,
  emissions_already_started: 409,
  weight_already_released: 409,
};

export interface ControllerDeps {
  ledger?: AssetLedger;
  power?: PowerSource;
  clock?: Clock;
  logger?: Logger;
  events?: EventLog;
  governor?: string;
  account?: string;
  rewardAsset?: string;
  maxSkewMs?: number;
}

/** Map a thrown error onto `{ error, detail }`. Unknown errors are rethrown. */
function sendError(reply: FastifyReply, err: unknown) {
  if (isControllerError(err)) {
    return reply
      .status(ERROR_STATUS[err.code] ?? 422)
      .send({ error: err.code, detail: err.message });
  }
  if (err instanceof InvalidActionBody) {
    return reply.status(400).send({ error: "invalid_body", detail: err.message });
  }
  if (err instanceof RangeError) {
    return reply.status(400).send({ error: "invalid_amount", detail: err.message });
  }
  throw err;
}

function parsePoolId(raw: string): number | null {
  if (!INDEX.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

export async function buildApp(deps?: ControllerDeps) {
  const logger = deps?.logger ?? pino({ level: config.logLevel });
  const app = Fastify({ loggerInstance: logger });

  // Dev mode: no external ledger → in-memory collaborators
  const ledger = deps?.ledger ?? new MemoryAssetLedger();
  const power = deps?.power ?? new MemoryPowerSource();
  if (!deps?.ledger) {
    app.log.info("no asset ledger configured: dev mode (in-memory balances)");
  }

  const clock = deps?.clock ?? systemClock;
  const maxSkewMs = deps?.maxSkewMs ?? config.actionMaxSkewMs;
  const events = deps?.events ?? new EventLog({
    onListenerError: (err, event) => app.log.error({ err, type: event.type }, "event listener failed"),
  });

  const controller = new GaugeController({
    ledger,
    power,
    account: deps?.account ?? config.controllerAccount,
    rewardAsset: deps?.rewardAsset ?? config.rewardAsset,
    governor: deps?.governor ?? config.governorPubkey,
    clock,
    logger,
    events,
  });
  const nonces = new NonceStore();

  app.decorate("controller", controller);

  // ── Signed actions ─────────────────────────────────────────────
  app.post("/action", async (req, reply) => {
    // ── Envelope validation ─────────────────────────────────────
    const action: unknown = req.body;
    if (!Value.Check(ActionV1, action)) {
      const first = Value.Errors(ActionV1, action).First();
      return reply.status(400).send({
        error: "invalid_action",
        detail: first ? `${first.path || "/"}: ${first.message}` : undefined,
      });
    }

    // ── Verify Ed25519 signature ────────────────────────────────
    const sigValid = await verifyAction(action);
    if (!sigValid) {
      return reply
        .status(401)
        .send({ error: "invalid_signature", detail: "Ed25519 sig verification failed" });
    }

    // ── Replay protection ───────────────────────────────────────
    const skew = Math.abs(action.ts - clock() * 1000);
    if (skew > maxSkewMs) {
      return reply.status(422).send({ error: "stale_ts", detail: `skew ${skew}ms > ${maxSkewMs}ms` });
    }
    if (!nonces.claim(action.from, action.nonce)) {
      return reply.status(409).send({
        error: "stale_nonce",
        detail: `nonce must exceed ${nonces.last(action.from)}`,
      });
    }

    const actionId = computeActionId(action);
    try {
      const result = await dispatchAction(controller, action);
      return reply.send({ ok: true, action_id: actionId, ...result });
    } catch (err) {
      req.log.warn({ actionId, kind: action.kind, err }, "action rejected");
      return sendError(reply, err);
    }
  });

  // ── Maintenance (public) ───────────────────────────────────────
  app.post("/rebalance", async (_req, reply) => {
    const rebalanced = await controller.rebalance();
    const schedule = await controller.getSchedule();
    return reply.send({ ok: true, rebalanced, schedule: scheduleToWire(schedule) });
  });

  app.post("/refresh", async (_req, reply) => {
    await controller.refreshAll();
    return reply.send({ ok: true });
  });

  // ── Pools & positions ──────────────────────────────────────────
  app.get("/pools", async (_req, reply) => {
    const pools = await controller.listPools();
    return reply.send({ pools: pools.map(poolToWire) });
  });

  app.get<{ Params: { id: string } }>("/pools/:id", async (req, reply) => {
    const poolId = parsePoolId(req.params.id);
    if (poolId === null) return reply.status(400).send({ error: "invalid_pool_id" });
    try {
      return reply.send(poolToWire(await controller.getPool(poolId)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get<{ Params: { id: string } }>("/pools/:id/positions", async (req, reply) => {
    const poolId = parsePoolId(req.params.id);
    if (poolId === null) return reply.status(400).send({ error: "invalid_pool_id" });
    try {
      const positions = await controller.listPositions(poolId);
      return reply.send({ positions: positions.map(positionToWire) });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get<{ Params: { id: string; participant: string } }>(
    "/pools/:id/positions/:participant",
    async (req, reply) => {
      const poolId = parsePoolId(req.params.id);
      if (poolId === null) return reply.status(400).send({ error: "invalid_pool_id" });
      if (!HEX32.test(req.params.participant)) {
        return reply.status(400).send({ error: "invalid_participant" });
      }
      try {
        const position = await controller.getPosition(poolId, req.params.participant);
        if (position.stakedAmount === 0n && position.pending === 0n) {
          return reply.status(404).send({ error: "not_found" });
        }
        return reply.send(positionToWire(position));
      } catch (err) {
        return sendError(reply, err);
      }
    },
  );

  // ── Governance views ───────────────────────────────────────────
  app.get<{ Params: { participant: string } }>("/votes/:participant", async (req, reply) => {
    if (!HEX32.test(req.params.participant)) {
      return reply.status(400).send({ error: "invalid_participant" });
    }
    const ballot = await controller.getVotes(req.params.participant);
    if (ballot.allocations.length === 0) {
      return reply.status(404).send({ error: "not_found" });
    }
    return reply.send(ballotToWire(ballot));
  });

  app.get("/weights", async (_req, reply) => {
    return reply.send(weightsToWire(await controller.getWeights()));
  });

  app.get("/schedule", async (_req, reply) => {
    return reply.send(scheduleToWire(await controller.getSchedule()));
  });

  // ── Notification log ───────────────────────────────────────────
  app.get<{ Querystring: { from?: string; type?: string } }>("/events", async (req, reply) => {
    const { from, type } = req.query;
    if (from !== undefined && !INDEX.test(from)) {
      return reply.status(400).send({ error: "invalid_from" });
    }
    const fromSeq = from === undefined ? 0 : Number(from);
    const list = (type ? events.getEventsByType(type) : events.getEvents()).filter(
      (e) => e.seq >= fromSeq,
    );
    return reply.send({ events: list, count: events.count() });
  });

  // ── Health ─────────────────────────────────────────────────────
  app.get("/health", async (_req, reply) => {
    const weights = await controller.getWeights();
    return reply.send({
      status: "ok",
      pools: weights.pools.length,
      events: events.count(),
      timestamp: Date.now(),
    });
  });

  return app;
}

declare module "fastify" {
  interface FastifyInstance {
    controller: GaugeController;
  }
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── controller config ───");
  console.log(`  port:              ${config.port}`);
  console.log(`  account:           ${config.controllerAccount}`);
  console.log(`  reward_asset:      ${config.rewardAsset}`);
  console.log(`  governor:          ${config.governorPubkey ? config.governorPubkey.slice(0, 12) + "…" : "(none)"}`);
  console.log(`  rebalance:         ${config.rebalanceIntervalMs > 0 ? `${config.rebalanceIntervalMs}ms` : "disabled"}`);
  console.log(`  action_max_skew:   ${config.actionMaxSkewMs}ms`);
  console.log("──────────────────────────");

  const app = await buildApp();

  // Start scheduler BEFORE listen (Fastify 5 forbids addHook after listen)
  if (config.rebalanceIntervalMs > 0) {
    const { createRebalanceScheduler } = await import("./scheduler.js");
    const scheduler = createRebalanceScheduler(app.controller, {
      intervalMs: config.rebalanceIntervalMs,
      onRebalance: () => {
        app.log.info("rates rebalanced by scheduler");
      },
      onError: (err) => {
        app.log.error({ err }, "scheduler error");
      },
    });

    app.addHook("onClose", async () => {
      scheduler.stop();
    });

    scheduler.start();
    app.log.info({ intervalMs: config.rebalanceIntervalMs }, "rebalance scheduler started");
  }

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
