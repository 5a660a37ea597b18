/**
 * @streamgauge/asset-ledger: collaborator abstractions.
 *
 * The controller moves assets through AssetLedger and reads governance
 * power through PowerSource. Swap the in-memory implementations for real
 * ones behind the same interfaces.
 */

export type { AssetLedger, PowerSource, TransferRecord, LedgerErrorCode } from "./types.js";
export { LedgerError } from "./types.js";

export { MemoryAssetLedger } from "./memory-ledger.js";
export { MemoryPowerSource } from "./memory-power.js";
export { ShareWrapper } from "./share-wrapper.js";
