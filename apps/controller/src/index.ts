/**
 * @streamgauge/controller: gauge controller engine and HTTP surface.
 */

export {
  GaugeController,
  type GaugeControllerOptions,
  type PoolView,
  type PositionView,
  type StakeReceipt,
  type BallotView,
  type WeightsView,
  type ScheduleView,
} from "./engine/controller.js";
export type { EmissionSchedule } from "./engine/accumulator.js";
export { ControllerError, isControllerError, type ControllerErrorCode } from "./engine/errors.js";
export { systemClock, type Clock } from "./engine/clock.js";

export { EventLog, type EventListener, type EventLogOptions } from "./event-log/writer.js";
export * from "./event-log/schemas.js";

export { createRebalanceScheduler, type RebalanceScheduler, type SchedulerOptions } from "./scheduler.js";
export { buildApp, type ControllerDeps } from "./server.js";
