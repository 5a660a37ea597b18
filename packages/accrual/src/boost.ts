/**
 * Derived (boosted) stake.
 *
 *   base      = staked × 40%
 *   poolShare = poolTotalStaked × power / totalPower
 *   derived   = min(base + poolShare × 60%, staked)
 *
 * Governance power lifts a position from 40% towards 100% of its own
 * stake. The cap keeps a large voter from earning on liquidity that is
 * not theirs.
 */

import { BOOST_BASE_PCT, BOOST_POWER_PCT, PCT_DENOMINATOR } from "./constants.js";

export interface BoostInput {
  stakedAmount: bigint;
  poolTotalStaked: bigint;
  power: bigint;
  totalPower: bigint;
}

export function derivedStake(input: BoostInput): bigint {
  const base = (input.stakedAmount * BOOST_BASE_PCT) / PCT_DENOMINATOR;
  if (input.totalPower <= 0n) return base;

  const poolShare = (input.poolTotalStaked * input.power) / input.totalPower;
  const boosted = (poolShare * BOOST_POWER_PCT) / PCT_DENOMINATOR;
  const derived = base + boosted;
  return derived < input.stakedAmount ? derived : input.stakedAmount;
}
