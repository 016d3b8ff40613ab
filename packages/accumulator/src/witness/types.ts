import type { Digest } from "../hashing/index.js";

/**
 * Inclusion proof for one element
 */
export interface Witness {
  /** Leaf digest of the element */
  leafHash: Digest;
  /** Sibling digests, from the leaf's sibling up to the one below the root */
  siblings: Digest[];
  /**
   * One bit per sibling. Bit i set: the sibling at level i is on the right
   * and the fold is H(current | sibling). Clear: H(sibling | current).
   */
  path: bigint;
}

/**
 * Returns a deep copy that shares no buffers with the original
 */
export function cloneWitness(witness: Witness): Witness {
  return {
    leafHash: witness.leafHash.slice(),
    siblings: witness.siblings.map((sibling) => sibling.slice()),
    path: witness.path,
  };
}
