/**
 * MMR accumulator demo CLI
 *
 * Commands:
 *   run    Add a growing element repeatedly and print the root chain
 *   prove  Add elements and print the witness of one of them
 *
 * The library log level is read from MMR_LOG_LEVEL.
 */

import { Command } from "commander";
import { parseLogLevel } from "@mmr-accumulator/core";
import { registerRunCommand } from "./commands/run.js";
import { registerProveCommand } from "./commands/prove.js";
import type { Writer } from "./structure.js";

export const CLI_NAME = "mmr-demo";
export const CLI_VERSION = "0.1.0";

export interface ProgramOptions {
  readonly env?: Record<string, string | undefined>;
  readonly write?: Writer;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const env = options.env ?? process.env;
  const write = options.write ?? ((line: string) => console.log(line));
  const logLevel = parseLogLevel(env.MMR_LOG_LEVEL);

  const program = new Command()
    .name(CLI_NAME)
    .description("Merkle Mountain Range accumulator demo")
    .version(CLI_VERSION);

  registerRunCommand(program, logLevel, write);
  registerProveCommand(program, logLevel, write);

  return program;
}
