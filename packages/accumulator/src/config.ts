import { InvalidArgumentError } from "./errors.js";
import {
  createConsoleLogger,
  isLogLevel,
  type AccumulatorLogger,
  type LogLevel,
} from "./logger.js";

/** Deepest supported inclusion proof; bounds tree weight to 2^63 */
export const MAX_PROOF_DEPTH = 63;

/**
 * Accumulator configuration
 */
export interface AccumulatorConfig {
  /** Bucket count the node index starts with */
  initialCapacity: number;
  /** Occupancy ratio above which the node index doubles */
  loadFactor: number;
  /** Bucket count the node index may never exceed */
  maxCapacity: number;
  /** Maximum number of siblings in a witness (at most 63) */
  maxProofDepth: number;
  /** Threshold for the default console logger */
  logLevel: LogLevel;
  /** Replaces the console logger when given */
  logger?: AccumulatorLogger;
}

/**
 * Configuration with the logger resolved
 */
export interface ResolvedAccumulatorConfig extends AccumulatorConfig {
  logger: AccumulatorLogger;
}

export const DEFAULT_ACCUMULATOR_CONFIG: Readonly<AccumulatorConfig> = {
  initialCapacity: 16,
  loadFactor: 0.75,
  maxCapacity: 2 ** 30,
  maxProofDepth: MAX_PROOF_DEPTH,
  logLevel: "warn",
};

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws InvalidArgumentError if any setting is out of range
 */
export function resolveConfig(
  overrides: Partial<AccumulatorConfig> = {},
): ResolvedAccumulatorConfig {
  const merged: AccumulatorConfig = { ...DEFAULT_ACCUMULATOR_CONFIG, ...overrides };

  if (!Number.isSafeInteger(merged.initialCapacity) || merged.initialCapacity < 1) {
    throw new InvalidArgumentError(
      `initialCapacity must be a positive integer, got ${merged.initialCapacity}`,
    );
  }
  if (
    !Number.isSafeInteger(merged.maxCapacity) ||
    merged.maxCapacity < merged.initialCapacity
  ) {
    throw new InvalidArgumentError(
      `maxCapacity must be an integer >= initialCapacity, got ${merged.maxCapacity}`,
    );
  }
  if (!(merged.loadFactor > 0 && merged.loadFactor <= 1)) {
    throw new InvalidArgumentError(
      `loadFactor must be in (0, 1], got ${merged.loadFactor}`,
    );
  }
  if (
    !Number.isInteger(merged.maxProofDepth) ||
    merged.maxProofDepth < 0 ||
    merged.maxProofDepth > MAX_PROOF_DEPTH
  ) {
    throw new InvalidArgumentError(
      `maxProofDepth must be between 0 and ${MAX_PROOF_DEPTH}, got ${merged.maxProofDepth}`,
    );
  }
  if (!isLogLevel(merged.logLevel)) {
    throw new InvalidArgumentError(`Unknown log level: ${merged.logLevel}`);
  }

  return {
    ...merged,
    logger: merged.logger ?? createConsoleLogger(merged.logLevel),
  };
}

/**
 * Reads a log level from an environment value such as MMR_LOG_LEVEL.
 * Unset or blank values fall back to the default level.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  if (normalized === "") {
    return DEFAULT_ACCUMULATOR_CONFIG.logLevel;
  }
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError(`Unknown log level: ${value}`);
  }
  return normalized;
}
