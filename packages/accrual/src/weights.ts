/**
 * Vote normalisation and emission split.
 *
 * A ballot states relative weights; the voter's full power is spread in
 * those proportions. Rates follow pool weight share of the global rate.
 */

export class WeightError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WeightError";
  }
}

/**
 * allocation_i = weights_i × power / Σ weights
 *
 * Flooring dust goes to the last non-zero weight so that
 * Σ allocation_i = power exactly.
 *
 * @throws WeightError if weights sum to zero or any weight is negative
 */
export function normalizeVotes(weights: readonly bigint[], power: bigint): bigint[] {
  let sum = 0n;
  for (const w of weights) {
    if (w < 0n) throw new WeightError("negative vote weight");
    sum += w;
  }
  if (sum === 0n) throw new WeightError("vote weights sum to zero");

  const allocations = weights.map((w) => (w * power) / sum);
  const dust = power - allocations.reduce((acc, a) => acc + a, 0n);

  if (dust > 0n) {
    let last = weights.length - 1;
    while (last > 0 && (weights[last] ?? 0n) === 0n) last--;
    allocations[last] = (allocations[last] ?? 0n) + dust;
  }
  return allocations;
}

/** emissionRate = floor(totalRate × poolWeight / totalWeight). */
export function poolEmissionRate(
  totalRate: bigint,
  poolWeight: bigint,
  totalWeight: bigint,
): bigint {
  if (totalWeight <= 0n) return 0n;
  return (totalRate * poolWeight) / totalWeight;
}

export interface EmissionSplit {
  rates: bigint[];
  /** totalRate − Σ rates. Not redistributed. */
  unallocated: bigint;
}

/** Split a global rate across pools by weight. Zero total weight → all zero. */
export function splitEmission(
  totalRate: bigint,
  poolWeights: readonly bigint[],
): EmissionSplit {
  const totalWeight = poolWeights.reduce((acc, w) => acc + w, 0n);
  if (totalWeight === 0n) {
    return { rates: poolWeights.map(() => 0n), unallocated: totalRate };
  }
  const rates = poolWeights.map((w) => poolEmissionRate(totalRate, w, totalWeight));
  return {
    rates,
    unallocated: totalRate - rates.reduce((acc, r) => acc + r, 0n),
  };
}
