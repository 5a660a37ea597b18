/**
 * Controller configuration.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("CONTROLLER_PORT", "3200"), 10),
  host: env("CONTROLLER_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** Hex Ed25519 public key allowed to run governor actions. Empty = none. */
  governorPubkey: env("GOVERNOR_PUBKEY", ""),
  /** Ledger identity holding staked assets and the reward reserve. */
  controllerAccount: env("CONTROLLER_ACCOUNT", "controller"),
  rewardAsset: env("REWARD_ASSET", "reward"),
  /** Rebalance scheduler interval (ms). 0 = disabled. */
  rebalanceIntervalMs: parseInt(env("REBALANCE_INTERVAL_MS", "0"), 10),
  /** Max |ActionV1.ts − server clock| accepted (ms). */
  actionMaxSkewMs: parseInt(env("ACTION_MAX_SKEW_MS", "300000"), 10),
} as const;
