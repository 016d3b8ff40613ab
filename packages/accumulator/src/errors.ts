/**
 * Error types raised by the accumulator.
 *
 * Every error carries a `kind` so callers can branch without instanceof
 * chains. Only MalformedTreeError is fatal: it means the node graph is
 * corrupt and the accumulator must not be used further.
 */

import { bytesToHex } from "@noble/hashes/utils";

export type AccumulatorErrorKind =
  | "InvalidArgument"
  | "AllocationFailure"
  | "NotFound"
  | "ProofTooDeep"
  | "MalformedTree"
  | "MalformedWitness"
  | "Unsupported"
  | "Destroyed";

/**
 * Base class for all accumulator errors.
 */
export abstract class AccumulatorError extends Error {
  abstract readonly kind: AccumulatorErrorKind;

  /** True when the error signals a broken invariant rather than bad input */
  get isFatal(): boolean {
    return false;
  }
}

/**
 * Null, empty or wrongly sized input.
 */
export class InvalidArgumentError extends AccumulatorError {
  readonly kind = "InvalidArgument";

  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * The node index could not grow.
 *
 * Raised before any state is published, so the accumulator stays as it was
 * and the call may be retried.
 */
export class AllocationFailureError extends AccumulatorError {
  readonly kind = "AllocationFailure";

  /** Capacity the index tried to grow to */
  readonly requestedCapacity: number;

  /** Configured ceiling */
  readonly maxCapacity: number;

  constructor(requestedCapacity: number, maxCapacity: number, cause?: unknown) {
    super(
      `Node index cannot grow to ${requestedCapacity} buckets (max ${maxCapacity})`,
      cause === undefined ? undefined : { cause },
    );
    this.name = "AllocationFailureError";
    this.requestedCapacity = requestedCapacity;
    this.maxCapacity = maxCapacity;
  }
}

/**
 * No node with the requested digest has been indexed.
 */
export class NotFoundError extends AccumulatorError {
  readonly kind = "NotFound";

  readonly digest: Uint8Array;

  constructor(digest: Uint8Array) {
    super(`No element indexed for leaf hash ${bytesToHex(digest)}`);
    this.name = "NotFoundError";
    this.digest = digest;
  }
}

/**
 * The ancestry walk passed the maximum supported proof depth.
 */
export class ProofTooDeepError extends AccumulatorError {
  readonly kind = "ProofTooDeep";

  readonly maxDepth: number;

  constructor(maxDepth: number) {
    super(`Proof depth exceeds maximum of ${maxDepth} levels`);
    this.name = "ProofTooDeepError";
    this.maxDepth = maxDepth;
  }
}

/**
 * A parent does not recognize its child. The tree is corrupt.
 */
export class MalformedTreeError extends AccumulatorError {
  readonly kind = "MalformedTree";

  constructor(message: string) {
    super(message);
    this.name = "MalformedTreeError";
  }

  override get isFatal(): boolean {
    return true;
  }
}

/**
 * A witness failed structural validation.
 *
 * verify() reports this as `false`; validateWitness() returns it so callers
 * can see the reason.
 */
export class MalformedWitnessError extends AccumulatorError {
  readonly kind = "MalformedWitness";

  readonly reason: string;

  constructor(reason: string) {
    super(`Malformed witness: ${reason}`);
    this.name = "MalformedWitnessError";
    this.reason = reason;
  }
}

export class UnsupportedOperationError extends AccumulatorError {
  readonly kind = "Unsupported";

  readonly operation: string;

  constructor(operation: string) {
    super(`Operation not supported: ${operation}`);
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}

export class AccumulatorDestroyedError extends AccumulatorError {
  readonly kind = "Destroyed";

  constructor() {
    super("Accumulator has been destroyed");
    this.name = "AccumulatorDestroyedError";
  }
}
