#!/usr/bin/env node
import { CommanderError } from "commander";
import { createProgram } from "./cli/program.js";
import { getDataDir, ensureDefaultConfig } from "./config.js";
import {
  BridgeSetupError,
  DialError,
  EXIT,
  ProcessIoError,
  errorMessage,
  exit,
} from "./shared/errors.js";

async function main() {
  // Ensure ~/.tunnel-pump/tunnel-pump.json exists with defaults on first run.
  await ensureDefaultConfig(getDataDir());

  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander already printed usage or the problem
    exit(error.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  }
  const message = errorMessage(error);
  process.stderr.write(`${message}\n`);
  if (error instanceof DialError) exit(EXIT.CONNECT_FAILURE);
  if (error instanceof BridgeSetupError || error instanceof ProcessIoError) exit(EXIT.BRIDGE_FAILURE);
  exit(message.includes("Invalid") ? EXIT.INVALID_ARGS : EXIT.GENERIC_ERROR);
});
