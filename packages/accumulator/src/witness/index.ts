/**
 * WitnessEngine - inclusion proof generation and verification
 *
 * Generation starts at the element's leaf in the node index and climbs
 * parent links to its root. Verification folds the siblings back onto the
 * leaf hash and asks the index whether the running hash is a current root.
 */

import {
  isDigest,
  leafHash,
  parentHash,
  type Digest,
} from "../hashing/index.js";
import type { NodeIndex } from "../nodeindex/index.js";
import {
  MalformedTreeError,
  MalformedWitnessError,
  NotFoundError,
  ProofTooDeepError,
} from "../errors.js";
import type { AccumulatorLogger } from "../logger.js";
import { Uint64 } from "../uint64/index.js";
import type { Witness } from "./types.js";

export type { Witness } from "./types.js";
export { cloneWitness } from "./types.js";

export class WitnessEngine {
  constructor(
    private readonly index: NodeIndex,
    private readonly maxProofDepth: number,
    private readonly logger: AccumulatorLogger,
  ) {}

  /**
   * Builds the inclusion proof for an element and caches it in the index.
   *
   * @throws InvalidArgumentError if the element is empty
   * @throws NotFoundError if the element was never added
   * @throws ProofTooDeepError if the path is longer than maxProofDepth
   * @throws MalformedTreeError if a parent does not own its child
   */
  witness(element: Uint8Array): Witness {
    const leaf = leafHash(element);
    const start = this.index.lookupByDigest(leaf);
    if (start === null) {
      throw new NotFoundError(leaf);
    }

    const siblings: Digest[] = [];
    let path = new Uint64(0);
    let current = start;
    let node = this.index.node(current);

    while (node.parent !== null) {
      if (siblings.length >= this.maxProofDepth) {
        throw new ProofTooDeepError(this.maxProofDepth);
      }
      const parent = this.index.node(node.parent);

      if (parent.left === current && parent.right !== null) {
        path = path.setBit(siblings.length);
        siblings.push(this.index.node(parent.right).digest.slice());
      } else if (parent.right === current && parent.left !== null) {
        siblings.push(this.index.node(parent.left).digest.slice());
      } else {
        this.logger.error("[witness] parent does not own child", {
          child: current,
          parent: node.parent,
        });
        throw new MalformedTreeError(
          `Node ${node.parent} is not the parent of node ${current}`,
        );
      }

      current = node.parent;
      node = parent;
    }

    const witness: Witness = {
      leafHash: leaf,
      siblings,
      path: path.toBigInt(),
    };
    this.index.cacheWitness(leaf, witness);
    return witness;
  }

  /**
   * Checks a witness against the current roots.
   *
   * After every fold the running hash is compared with the current roots,
   * so a witness is accepted as soon as any prefix of its path reaches a
   * root. A witness captured before its tree was merged into a larger one
   * folds to a hash that is no longer a root and is rejected.
   *
   * Malformed witnesses are rejected before any hashing. Never mutates the
   * accumulator.
   */
  verify(witness: Witness): boolean {
    const problem = this.validateWitness(witness);
    if (problem !== null) {
      this.logger.warn("[witness] rejected malformed witness", {
        reason: problem.reason,
      });
      return false;
    }

    const path = new Uint64(witness.path);
    let running = witness.leafHash;
    for (let level = 0; level < witness.siblings.length; level++) {
      const sibling = witness.siblings[level];
      running = path.testBit(level)
        ? parentHash(running, sibling)
        : parentHash(sibling, running);
      if (this.index.isCurrentRoot(running)) {
        return true;
      }
    }
    return this.index.isCurrentRoot(running);
  }

  /**
   * Structural checks on a witness, independent of accumulator state.
   *
   * @returns the first problem found, or null if the witness is well formed
   */
  validateWitness(witness: Witness): MalformedWitnessError | null {
    if (!isDigest(witness.leafHash)) {
      return new MalformedWitnessError("leaf hash must be a 32-byte digest");
    }
    if (!Array.isArray(witness.siblings)) {
      return new MalformedWitnessError("siblings are missing");
    }
    const depth = witness.siblings.length;
    if (depth > this.maxProofDepth) {
      return new MalformedWitnessError(
        `${depth} siblings exceeds the maximum depth of ${this.maxProofDepth}`,
      );
    }
    if (typeof witness.path !== "bigint" || witness.path < 0n) {
      return new MalformedWitnessError("path must be a non-negative integer");
    }
    if (witness.path >= 1n << BigInt(depth)) {
      return new MalformedWitnessError(
        `path ${witness.path} has bits beyond ${depth} levels`,
      );
    }
    const bad = witness.siblings.findIndex((sibling) => !isDigest(sibling));
    if (bad !== -1) {
      return new MalformedWitnessError(`sibling ${bad} is not a 32-byte digest`);
    }
    return null;
  }
}
