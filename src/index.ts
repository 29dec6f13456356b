#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { EXIT, exit } from "./shared/errors.js";

async function main() {
  if (process.env.MATCHLINK_DEBUG_ARGS) {
    process.stderr.write(`[DEBUG ARGS] argv: ${JSON.stringify(process.argv)}\n`);
  }
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  const code =
    message.includes("invalid") || message.includes("Unknown option") || message.includes("Invalid")
      ? EXIT.INVALID_ARGS
      : EXIT.GENERIC_ERROR;
  exit(code);
});
