/**
 * Frozen accrual constants.
 *
 * FROZEN constants never change: changing one changes every pending
 * reward computed from an existing accumulator.
 * TUNABLE values live in controller config, not here.
 */

// ── Fixed point ────────────────────────────────────────────────────
/** Scale of reward-per-share accumulators. */
export const ACC_SCALE = 10n ** 12n;

// ── Boost ──────────────────────────────────────────────────────────
// derived = min(staked × 40% + poolShare × 60%, staked)
export const BOOST_BASE_PCT = 40n;
export const BOOST_POWER_PCT = 60n;
export const PCT_DENOMINATOR = 100n;

// ── Emission ───────────────────────────────────────────────────────
export const EMISSION_WINDOW_SECS = 365 * 24 * 60 * 60; // 31_536_000

// ── ActionV1 Kind Bytes ────────────────────────────────────────────
export const ACTION_KIND_DEPOSIT = 0x01;
export const ACTION_KIND_WITHDRAW = 0x02;
export const ACTION_KIND_CLAIM = 0x03;
export const ACTION_KIND_CLAIM_MANY = 0x04;
export const ACTION_KIND_VOTE = 0x05;
export const ACTION_KIND_RESET_VOTES = 0x06;
export const ACTION_KIND_REGISTER_POOL = 0x10; // governor only
export const ACTION_KIND_RELEASE_WEIGHT = 0x11; // governor only
export const ACTION_KIND_START_EMISSIONS = 0x12; // governor only

export const ACTION_MAX_BODY = 4_096; // 4 KiB: max ActionV1.body size
export const MAX_VOTE_POOLS = 64; // cap pools per ballot
