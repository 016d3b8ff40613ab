/**
 * Forest - the chain of current roots
 *
 * The chain runs from the heaviest root to the lightest, each weight a
 * distinct power of two. Adding an element increments a binary counter: the
 * new leaf is carried through the lightest roots, merging with each one of
 * equal weight (existing root on the left, carried node on the right), and
 * the final carry takes the place of the roots it absorbed at the light end.
 *
 * Merged nodes are staged in the index first. Parent links of absorbed roots
 * and the chain itself are only written once every merge has succeeded; on
 * failure the staged nodes are rolled back and the forest is unchanged.
 */

import {
  leafHash,
  parentHash,
  type Digest,
} from "../hashing/index.js";
import type { NodeIndex } from "../nodeindex/index.js";
import { createLeafNode, type NodeRef } from "../nodeindex/types.js";
import { MalformedTreeError } from "../errors.js";
import type { AccumulatorLogger } from "../logger.js";
import { heightFromWeight, peakWeights } from "../mmr/math.js";

/**
 * Peak - a current root as reported to callers
 */
export interface Peak {
  digest: Digest;
  /** Leaves below the root */
  weight: number;
  /** Zero-based tree height */
  height: number;
}

/** An existing root absorbed by the merge that produced `parent` */
interface Absorption {
  root: NodeRef;
  parent: NodeRef;
}

export class Forest {
  /** Heaviest root, or null while empty */
  private head: NodeRef | null = null;

  private leaves = 0;

  constructor(
    private readonly index: NodeIndex,
    private readonly logger: AccumulatorLogger,
  ) {}

  /** Number of elements added */
  get leafCount(): number {
    return this.leaves;
  }

  /**
   * Adds one element.
   *
   * @throws InvalidArgumentError if the element is empty
   * @throws AllocationFailureError if the index cannot grow; nothing changes
   */
  add(element: Uint8Array): void {
    const digest = leafHash(element);
    const chain = this.chain();
    const absorbed: Absorption[] = [];
    const carried = this.stage(digest, chain, absorbed);

    for (const { root, parent } of absorbed) {
      const node = this.index.node(root);
      node.parent = parent;
      node.next = null;
    }
    chain.push(carried);
    this.relink(chain);
    this.leaves += 1;

    this.logger.debug("[forest] added element", {
      leafCount: this.leaves,
      merges: absorbed.length,
      peaks: chain.length,
    });
  }

  /**
   * Inserts the leaf and every merged node, popping absorbed roots off
   * `chain` and recording them in `absorbed`. Returns the final carry.
   */
  private stage(
    digest: Digest,
    chain: NodeRef[],
    absorbed: Absorption[],
  ): NodeRef {
    const mark = this.index.checkpoint();
    try {
      let carried = this.index.insert(createLeafNode(digest));

      // Lightest roots sit at the end of the chain
      while (chain.length > 0) {
        const root = chain[chain.length - 1];
        const existing = this.index.node(root);
        const carry = this.index.node(carried);
        if (existing.weight !== carry.weight) {
          break;
        }

        const merged = this.index.insert({
          digest: parentHash(existing.digest, carry.digest),
          weight: carry.weight * 2,
          parent: null,
          left: root,
          right: carried,
          next: null,
        });
        // The carry is staged, so linking it now is safe
        carry.parent = merged;
        absorbed.push({ root, parent: merged });
        chain.pop();
        carried = merged;
      }
      return carried;
    } catch (error) {
      this.index.rollback(mark);
      this.logger.warn("[forest] add rolled back", {
        leafCount: this.leaves,
        staged: absorbed.length + 1,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Returns the current roots, heaviest first
   */
  roots(): Peak[] {
    return this.chain().map((ref) => {
      const node = this.index.node(ref);
      return {
        digest: node.digest,
        weight: node.weight,
        height: heightFromWeight(node.weight),
      };
    });
  }

  /**
   * Checks the chain against the leaf count and the parent/child links.
   *
   * @throws MalformedTreeError on the first violation found
   */
  checkInvariants(): void {
    const chain = this.chain();
    const actual = chain.map((ref) => this.index.node(ref).weight);
    const expected = peakWeights(this.leaves);
    if (
      actual.length !== expected.length ||
      actual.some((weight, i) => weight !== expected[i])
    ) {
      throw new MalformedTreeError(
        `Root weights [${actual.join(", ")}] do not match ${this.leaves} leaves`,
      );
    }
    for (const ref of chain) {
      if (this.index.node(ref).parent !== null) {
        throw new MalformedTreeError(`Root ${ref} has a parent`);
      }
    }
  }

  /**
   * Forgets the chain. The caller clears the index.
   */
  reset(): void {
    this.head = null;
    this.leaves = 0;
  }

  private chain(): NodeRef[] {
    const refs: NodeRef[] = [];
    let ref = this.head;
    while (ref !== null) {
      refs.push(ref);
      ref = this.index.node(ref).next;
    }
    return refs;
  }

  private relink(chain: NodeRef[]): void {
    for (let i = 0; i < chain.length; i++) {
      this.index.node(chain[i]).next = i + 1 < chain.length ? chain[i + 1] : null;
    }
    this.head = chain.length > 0 ? chain[0] : null;
  }
}
