/**
 * MMR Math Functions
 *
 * Relations between the number of leaves in the accumulator and the weights
 * of its peaks. Root weights are the set bits of the leaf count, so adding a
 * leaf behaves like incrementing a binary counter.
 */

/**
 * Returns true if n is a positive power of two
 */
export function isPowerOfTwo(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0 && (BigInt(n) & (BigInt(n) - 1n)) === 0n;
}

/**
 * Returns the zero-based height of a perfect tree with `weight` leaves.
 *
 * A leaf has height 0.
 * @throws Error if weight is not a power of two
 */
export function heightFromWeight(weight: number): number {
  if (!isPowerOfTwo(weight)) {
    throw new Error(`Tree weight must be a power of two, got ${weight}`);
  }
  return BigInt(weight).toString(2).length - 1;
}

/**
 * Returns the peak weights for an accumulator holding `leafCount` leaves,
 * largest first.
 *
 * Example: 7 leaves -> [4, 2, 1]; 8 leaves -> [8]
 */
export function peakWeights(leafCount: number): number[] {
  if (!Number.isSafeInteger(leafCount) || leafCount < 0) {
    throw new Error(`leafCount must be a non-negative integer, got ${leafCount}`);
  }
  const weights: number[] = [];
  let remaining = BigInt(leafCount);
  while (remaining > 0n) {
    const top = 1n << BigInt(remaining.toString(2).length - 1);
    weights.push(Number(top));
    remaining -= top;
  }
  return weights;
}

/**
 * Returns the number of peaks for `leafCount` leaves (its popcount)
 */
export function peakCount(leafCount: number): number {
  return peakWeights(leafCount).length;
}
