/**
 * Accumulator - append-only set commitment over a Merkle Mountain Range
 *
 * Composes the node index, the forest of roots and the witness engine. The
 * class methods throw typed errors; the functions at the bottom of this
 * module wrap them into boolean / null outcomes for callers that prefer not
 * to handle exceptions. MalformedTreeError always propagates.
 *
 * Instances are single-owner and synchronous. Calls must not interleave with
 * an add() from elsewhere.
 */

import {
  resolveConfig,
  type AccumulatorConfig,
  type ResolvedAccumulatorConfig,
} from "./config.js";
import {
  AccumulatorDestroyedError,
  AllocationFailureError,
  InvalidArgumentError,
  MalformedWitnessError,
  NotFoundError,
  ProofTooDeepError,
  UnsupportedOperationError,
} from "./errors.js";
import { leafHash } from "./hashing/index.js";
import { NodeIndex } from "./nodeindex/index.js";
import { Forest, type Peak } from "./forest/index.js";
import { WitnessEngine } from "./witness/index.js";
import type { Witness } from "./witness/types.js";

export class Accumulator {
  readonly config: Readonly<ResolvedAccumulatorConfig>;

  private readonly index: NodeIndex;
  private readonly forest: Forest;
  private readonly engine: WitnessEngine;
  private destroyed = false;

  constructor(config: Partial<AccumulatorConfig> = {}) {
    this.config = resolveConfig(config);
    const { logger } = this.config;
    this.index = new NodeIndex({
      initialCapacity: this.config.initialCapacity,
      loadFactor: this.config.loadFactor,
      maxCapacity: this.config.maxCapacity,
      logger,
    });
    this.forest = new Forest(this.index, logger);
    this.engine = new WitnessEngine(this.index, this.config.maxProofDepth, logger);
  }

  /** Number of elements added */
  get leafCount(): number {
    this.assertLive();
    return this.forest.leafCount;
  }

  /** Number of nodes held by the index, leaves and interior */
  get nodeCount(): number {
    this.assertLive();
    return this.index.size;
  }

  /**
   * Adds an element. On failure the accumulator is unchanged.
   *
   * @throws InvalidArgumentError if the element is empty
   * @throws AllocationFailureError if the node index cannot grow
   */
  add(element: Uint8Array): void {
    this.assertLive();
    this.forest.add(element);
  }

  /**
   * Returns a fresh inclusion proof for an element.
   *
   * @throws NotFoundError if the element was never added
   * @throws ProofTooDeepError if the proof would exceed maxProofDepth
   */
  witness(element: Uint8Array): Witness {
    this.assertLive();
    return this.engine.witness(element);
  }

  /**
   * True iff the witness folds to a current root.
   */
  verify(witness: Witness): boolean {
    this.assertLive();
    return this.engine.verify(witness);
  }

  /**
   * Structural check of a witness, without consulting the roots
   */
  validateWitness(witness: Witness): MalformedWitnessError | null {
    return this.engine.validateWitness(witness);
  }

  /**
   * Deletion by witness is not supported.
   *
   * @throws UnsupportedOperationError always
   */
  remove(_witness: Witness): never {
    this.assertLive();
    throw new UnsupportedOperationError("remove");
  }

  /**
   * Current roots, heaviest first
   */
  roots(): Peak[] {
    this.assertLive();
    return this.forest.roots();
  }

  /**
   * The witness cached by the last witness() call for this element, or null
   */
  cachedWitness(element: Uint8Array): Witness | null {
    this.assertLive();
    return this.index.cachedWitness(leafHash(element));
  }

  /**
   * @throws MalformedTreeError if the root chain is inconsistent
   */
  checkInvariants(): void {
    this.assertLive();
    this.forest.checkInvariants();
  }

  /**
   * Releases every node and cached witness. Later calls throw
   * AccumulatorDestroyedError.
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.forest.reset();
    this.index.clear();
    this.destroyed = true;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  private assertLive(): void {
    if (this.destroyed) {
      throw new AccumulatorDestroyedError();
    }
  }
}

/**
 * Creates an empty accumulator
 */
export function init(config: Partial<AccumulatorConfig> = {}): Accumulator {
  return new Accumulator(config);
}

export function destroy(acc: Accumulator): void {
  acc.destroy();
}

/**
 * Adds an element, returning false for empty input or allocation failure.
 */
export function add(acc: Accumulator, element: Uint8Array): boolean {
  try {
    acc.add(element);
    return true;
  } catch (error) {
    if (
      error instanceof InvalidArgumentError ||
      error instanceof AllocationFailureError
    ) {
      return false;
    }
    throw error;
  }
}

/**
 * Returns the element's witness, or null if it was never added (or the
 * input is empty, or the proof is too deep).
 */
export function witness(acc: Accumulator, element: Uint8Array): Witness | null {
  try {
    return acc.witness(element);
  } catch (error) {
    if (
      error instanceof NotFoundError ||
      error instanceof InvalidArgumentError ||
      error instanceof ProofTooDeepError
    ) {
      return null;
    }
    throw error;
  }
}

export function verify(acc: Accumulator, w: Witness): boolean {
  return acc.verify(w);
}

/**
 * Reserved for deletion by witness; always reports failure.
 */
export function remove(acc: Accumulator, w: Witness): boolean {
  try {
    acc.remove(w);
  } catch (error) {
    if (error instanceof UnsupportedOperationError) {
      return false;
    }
    throw error;
  }
}

export function roots(acc: Accumulator): Peak[] {
  return acc.roots();
}
