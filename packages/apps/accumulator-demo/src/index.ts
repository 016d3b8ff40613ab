import { createProgram } from "./program.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("[mmr-demo] unhandled error", error);
    process.exitCode = 1;
  });
