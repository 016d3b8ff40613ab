import { afterEach, describe, it, expect } from "vitest";
import { InvalidArgumentError } from "@mmr-accumulator/core";
import { createProgram, CLI_NAME } from "../src/program.js";

/** Makes commander throw instead of exiting, and silences its stderr */
function quietProgram(write: (line: string) => void) {
  const program = createProgram({ env: { MMR_LOG_LEVEL: "silent" }, write });
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeErr: () => {} });
  }
  return program;
}

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe("createProgram", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it("should register the demo commands", () => {
    const program = createProgram({ env: {} });
    expect(program.name()).toBe(CLI_NAME);
    expect(program.commands.map((command) => command.name())).toEqual([
      "run",
      "prove",
    ]);
  });

  it("should reject an unknown MMR_LOG_LEVEL", () => {
    expect(() => createProgram({ env: { MMR_LOG_LEVEL: "loud" } })).toThrow(
      InvalidArgumentError,
    );
  });

  it("should print a blank line before each structure in run", async () => {
    const { lines, write } = capture();
    await createProgram({ env: { MMR_LOG_LEVEL: "silent" }, write }).parseAsync(
      ["run", "--count", "2"],
      { from: "user" },
    );
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe("");
    expect(lines[2]).toBe("");
    expect(lines[3]).toMatch(/^Structure: [0-9a-f]{8}\.\.\.: \[size 2\] -> NULL$/);
  });

  it("should print the proof as JSON", async () => {
    const { lines, write } = capture();
    await createProgram({ env: { MMR_LOG_LEVEL: "silent" }, write }).parseAsync(
      ["prove", "a", "b", "c", "--element", "c", "--json"],
      { from: "user" },
    );
    expect(lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(lines[0]);
    expect(parsed).toMatchObject({ found: true, path: "0", steps: [], verified: true });
    expect(process.exitCode).toBeUndefined();
  });

  it("should set a failing exit code when the element is missing", async () => {
    const { lines, write } = capture();
    await createProgram({ env: { MMR_LOG_LEVEL: "silent" }, write }).parseAsync(
      ["prove", "a", "--element", "q"],
      { from: "user" },
    );
    expect(lines[1]).toBe('Element "q" was not added');
    expect(process.exitCode).toBe(1);
  });

  it("should reject an empty run seed before adding anything", async () => {
    const { lines, write } = capture();
    await expect(
      quietProgram(write).parseAsync(["run", "--seed", ""], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(lines).toEqual([]);
  });

  it("should reject empty elements to prove", async () => {
    const { lines, write } = capture();
    await expect(
      quietProgram(write).parseAsync(["prove", "a", "", "-e", "a"], {
        from: "user",
      }),
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
    await expect(
      quietProgram(write).parseAsync(["prove", "a", "-e", ""], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(lines).toEqual([]);
  });
});
