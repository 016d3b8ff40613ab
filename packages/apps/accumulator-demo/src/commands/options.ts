import { InvalidArgumentError } from "commander";

/**
 * Commander argument parser for strictly positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Commander argument parser for element text; empty elements cannot be added
 */
export function parseNonEmptyText(value: string): string {
  if (value.length === 0) {
    throw new InvalidArgumentError("Must not be empty.");
  }
  return value;
}

/**
 * Variadic form of parseNonEmptyText
 */
export function collectNonEmptyText(
  value: string,
  previous: string[] | undefined,
): string[] {
  return [...(previous ?? []), parseNonEmptyText(value)];
}
