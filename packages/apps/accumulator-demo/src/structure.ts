import { formatDigest, type Peak } from "@mmr-accumulator/core";

/** Sink for CLI output lines */
export type Writer = (line: string) => void;

/**
 * Renders the root chain heaviest first, e.g.
 * `Structure: 1a2b3c4d...: [size 2] -> 5e6f7a8b...: [size 1] -> NULL`
 */
export function formatStructure(peaks: readonly Peak[]): string {
  const links = peaks
    .map((peak) => `${formatDigest(peak.digest)}: [size ${peak.weight}] -> `)
    .join("");
  return `Structure: ${links}NULL`;
}
