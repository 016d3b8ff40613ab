/**
 * @mmr-accumulator/core - Merkle Mountain Range set accumulator
 *
 * An append-only commitment to a growing set of byte strings, kept as a
 * forest of perfect binary SHA-256 trees. Supports adding elements,
 * producing inclusion witnesses and verifying them against the current roots.
 *
 * @example
 * ```typescript
 * import { init, add, witness, verify } from "@mmr-accumulator/core";
 *
 * const acc = init();
 * const enc = new TextEncoder();
 * for (const e of ["a", "b", "c", "d"]) add(acc, enc.encode(e));
 *
 * const w = witness(acc, enc.encode("b"));
 * console.log(w !== null && verify(acc, w)); // true
 * ```
 *
 * @packageDocumentation
 */

// Accumulator
export {
  Accumulator,
  init,
  destroy,
  add,
  witness,
  verify,
  remove,
  roots,
} from "./accumulator.js";

// Configuration and logging
export {
  DEFAULT_ACCUMULATOR_CONFIG,
  MAX_PROOF_DEPTH,
  resolveConfig,
  parseLogLevel,
} from "./config.js";
export type { AccumulatorConfig, ResolvedAccumulatorConfig } from "./config.js";
export { createConsoleLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { AccumulatorLogger, LogContext, LogLevel } from "./logger.js";

// Errors
export {
  AccumulatorError,
  InvalidArgumentError,
  AllocationFailureError,
  NotFoundError,
  ProofTooDeepError,
  MalformedTreeError,
  MalformedWitnessError,
  UnsupportedOperationError,
  AccumulatorDestroyedError,
} from "./errors.js";
export type { AccumulatorErrorKind } from "./errors.js";

// Hashing
export {
  DIGEST_BYTES,
  leafHash,
  parentHash,
  digestsEqual,
  isDigest,
  digestToHex,
  formatDigest,
} from "./hashing/index.js";
export type { Digest } from "./hashing/index.js";

// Components
export { NodeIndex } from "./nodeindex/index.js";
export type { NodeIndexOptions, MmrNode, NodeRef } from "./nodeindex/index.js";
export { Forest } from "./forest/index.js";
export type { Peak } from "./forest/index.js";
export { WitnessEngine, cloneWitness } from "./witness/index.js";
export type { Witness } from "./witness/index.js";

// MMR math
export {
  isPowerOfTwo,
  heightFromWeight,
  peakWeights,
  peakCount,
} from "./mmr/math.js";

// uint64
export { Uint64, fnv1a64 } from "./uint64/index.js";
