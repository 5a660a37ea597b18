/**
 * Shared harness: in-memory collaborators, manual clock, silent logger.
 */

import { pino } from "pino";
import { MemoryAssetLedger, MemoryPowerSource } from "@streamgauge/asset-ledger";
import { GaugeController } from "../src/engine/controller.js";
import { EventLog } from "../src/event-log/writer.js";

export const GOV = "gov";
export const ACCOUNT = "controller";
export const REWARD = "reward";
export const START = 1000;

/** 1000 reward units per second over the 365-day window. */
export const SUPPLY = 31_536_000_000n;

export const silentLogger = pino({ level: "silent" });

export function createHarness(ledger = new MemoryAssetLedger()) {
  const power = new MemoryPowerSource();
  const clock = { now: START };
  const events = new EventLog();
  const controller = new GaugeController({
    ledger,
    power,
    account: ACCOUNT,
    rewardAsset: REWARD,
    governor: GOV,
    clock: () => clock.now,
    logger: silentLogger,
    events,
  });

  return {
    ledger,
    power,
    events,
    controller,
    clock,
    advance(secs: number) {
      clock.now += secs;
    },
  };
}

export type Harness = ReturnType<typeof createHarness>;

/** Register pools (no refresh) and start emissions at the current time. */
export async function bootstrap(
  h: Harness,
  pools: Array<[asset: string, reserved: bigint]>,
  supply: bigint = SUPPLY,
): Promise<void> {
  h.ledger.mint(REWARD, GOV, supply);
  for (const [asset, reserved] of pools) {
    await h.controller.registerPool(GOV, asset, reserved, false);
  }
  await h.controller.startEmissions(GOV, supply);
}
