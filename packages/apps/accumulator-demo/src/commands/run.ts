/**
 * Run Command
 *
 * Grows an element by repeating a seed ("1", "11", "111", ...), adds each
 * version to a fresh accumulator and prints the root chain after every add.
 *
 * Usage:
 *   mmr-demo run [--count <n>] [--seed <text>]
 */

import type { Command } from "commander";
import { Accumulator, type LogLevel } from "@mmr-accumulator/core";
import { formatStructure, type Writer } from "../structure.js";
import { parseNonEmptyText, parsePositiveInt } from "./options.js";

export interface RunOptions {
  readonly count: number;
  readonly seed: string;
  readonly logLevel: LogLevel;
}

/**
 * Runs the demo and returns one structure line per add
 */
export function runDemo(options: RunOptions): string[] {
  const acc = new Accumulator({ logLevel: options.logLevel });
  const encoder = new TextEncoder();
  const lines: string[] = [];
  try {
    let element = "";
    for (let i = 0; i < options.count; i++) {
      element += options.seed;
      acc.add(encoder.encode(element));
      lines.push(formatStructure(acc.roots()));
    }
  } finally {
    acc.destroy();
  }
  return lines;
}

export function registerRunCommand(
  program: Command,
  logLevel: LogLevel,
  write: Writer,
): void {
  program
    .command("run")
    .description("Add a growing element repeatedly and print the roots")
    .option("-n, --count <n>", "Number of elements to add", parsePositiveInt, 10)
    .option(
      "-s, --seed <text>",
      "Text appended to the element each round",
      parseNonEmptyText,
      "1",
    )
    .action((options: { count: number; seed: string }) => {
      for (const line of runDemo({ ...options, logLevel })) {
        write("");
        write(line);
      }
    });
}
