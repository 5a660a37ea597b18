/**
 * Rebalance scheduler: periodically turns current weights into rates.
 *
 * rebalance() is public and idempotent within a second (nothing elapses,
 * the split comes out the same), so a timer can call it freely. A tick
 * with zero total weight is a no-op and reports `false`.
 */

import type { GaugeController } from "./engine/controller.js";

export interface SchedulerOptions {
  /** How often to rebalance (ms). Default: 3_600_000 (1 hour). */
  intervalMs?: number;
  /** Called after each tick that changed rates. */
  onRebalance?: () => void;
  /** Callback for errors. */
  onError?: (error: unknown) => void;
}

export interface RebalanceScheduler {
  start(): void;
  stop(): void;
  /** Number of ticks that rebalanced. */
  rebalances(): number;
  /** Manually trigger a rebalance (useful for testing). */
  tick(): Promise<boolean>;
}

const DEFAULT_INTERVAL_MS = 60 * 60 * 1000;

export function createRebalanceScheduler(
  controller: GaugeController,
  options: SchedulerOptions = {},
): RebalanceScheduler {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const onRebalance = options.onRebalance;
  const onError = options.onError ?? ((err) => console.error("[scheduler] error:", err));

  let timer: ReturnType<typeof setInterval> | null = null;
  let count = 0;

  async function tick(): Promise<boolean> {
    try {
      const changed = await controller.rebalance();
      if (changed) {
        count++;
        if (onRebalance) onRebalance();
      }
      return changed;
    } catch (err) {
      onError(err);
      return false;
    }
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        void tick();
      }, intervalMs);
      void tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    rebalances() {
      return count;
    },

    tick,
  };
}
