/**
 * Hash primitives for the accumulator
 *
 * Leaves are SHA-256(element). Interior nodes are SHA-256(left || right),
 * so the order of the operands is part of the commitment.
 */

import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex } from "@noble/hashes/utils";
import { InvalidArgumentError } from "../errors.js";
import { arraysEqual, concatBytes } from "../utils/arrays.js";

/** Size of every digest in bytes */
export const DIGEST_BYTES = 32;

/** A 32-byte SHA-256 value */
export type Digest = Uint8Array;

/**
 * Hashes a raw element into its leaf digest.
 *
 * @throws InvalidArgumentError if the element is empty
 */
export function leafHash(element: Uint8Array): Digest {
  if (!(element instanceof Uint8Array) || element.length === 0) {
    throw new InvalidArgumentError("Element must be a non-empty byte array");
  }
  return sha256(element);
}

/**
 * Hashes two child digests into their parent digest.
 *
 * @throws InvalidArgumentError unless both inputs are 32 bytes
 */
export function parentHash(left: Digest, right: Digest): Digest {
  if (!isDigest(left) || !isDigest(right)) {
    throw new InvalidArgumentError(
      `Parent hash operands must be ${DIGEST_BYTES}-byte digests`,
    );
  }
  return sha256(concatBytes(left, right));
}

export function digestsEqual(a: Digest, b: Digest): boolean {
  return arraysEqual(a, b);
}

export function isDigest(value: unknown): value is Digest {
  return value instanceof Uint8Array && value.length === DIGEST_BYTES;
}

export function digestToHex(digest: Digest): string {
  return bytesToHex(digest);
}

/**
 * Short printable form: the first `bytes` bytes in hex followed by "...".
 */
export function formatDigest(digest: Digest, bytes: number = 4): string {
  return `${bytesToHex(digest.subarray(0, bytes))}...`;
}
