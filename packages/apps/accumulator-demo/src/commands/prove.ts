/**
 * Prove Command
 *
 * Adds the given elements in order, then builds and verifies the inclusion
 * witness of one of them.
 *
 * Usage:
 *   mmr-demo prove <elements...> --element <e> [--json]
 */

import type { Command } from "commander";
import {
  Accumulator,
  digestToHex,
  NotFoundError,
  type LogLevel,
  type Witness,
} from "@mmr-accumulator/core";
import { formatStructure, type Writer } from "../structure.js";
import { collectNonEmptyText, parseNonEmptyText } from "./options.js";

export interface ProveOptions {
  readonly elements: readonly string[];
  readonly element: string;
  readonly logLevel: LogLevel;
}

export interface ProofStep {
  readonly sibling: string;
  readonly side: "left" | "right";
}

export type ProveResult =
  | {
      readonly found: true;
      readonly leafHash: string;
      readonly steps: ProofStep[];
      readonly path: string;
      readonly verified: boolean;
      readonly structure: string;
    }
  | {
      readonly found: false;
      readonly structure: string;
    };

export function proveElement(options: ProveOptions): ProveResult {
  const acc = new Accumulator({ logLevel: options.logLevel });
  const encoder = new TextEncoder();
  try {
    for (const element of options.elements) {
      acc.add(encoder.encode(element));
    }
    const structure = formatStructure(acc.roots());

    let witness: Witness;
    try {
      witness = acc.witness(encoder.encode(options.element));
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { found: false, structure };
      }
      throw error;
    }

    const steps = witness.siblings.map(
      (sibling, level): ProofStep => ({
        sibling: digestToHex(sibling),
        side: ((witness.path >> BigInt(level)) & 1n) === 1n ? "right" : "left",
      }),
    );

    return {
      found: true,
      leafHash: digestToHex(witness.leafHash),
      steps,
      path: witness.path.toString(2).padStart(witness.siblings.length, "0"),
      verified: acc.verify(witness),
      structure,
    };
  } finally {
    acc.destroy();
  }
}

/**
 * Renders a prove result as text lines
 */
export function formatProveResult(element: string, result: ProveResult): string[] {
  if (!result.found) {
    return [result.structure, `Element "${element}" was not added`];
  }
  return [
    result.structure,
    `Element:  ${element}`,
    `Leaf:     ${result.leafHash}`,
    `Path:     ${result.path}`,
    ...result.steps.map(
      (step, level) => `  [${level}] ${step.side.padEnd(5)} ${step.sibling}`,
    ),
    `Verified: ${result.verified}`,
  ];
}

export function registerProveCommand(
  program: Command,
  logLevel: LogLevel,
  write: Writer,
): void {
  program
    .command("prove")
    .description("Add elements and print the witness of one of them")
    .argument("<elements...>", "Elements to add, in order", collectNonEmptyText)
    .requiredOption("-e, --element <text>", "Element to prove", parseNonEmptyText)
    .option("--json", "Output as JSON")
    .action(
      (elements: string[], options: { element: string; json?: boolean }) => {
        const result = proveElement({
          elements,
          element: options.element,
          logLevel,
        });
        if (options.json) {
          write(JSON.stringify(result, null, 2));
        } else {
          for (const line of formatProveResult(options.element, result)) {
            write(line);
          }
        }
        if (!result.found || !result.verified) {
          process.exitCode = 1;
        }
      },
    );
}
