import { readFileSync, existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { InvalidArgumentError } from "commander";
import { parsePositiveInt } from "../config.js";
import { VERSION } from "../shared/constants.js";
import { parseHostPort, type HostPort } from "../shared/net.js";

/** Options every command inherits from the root program. */
export interface GlobalOptions {
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
  dataDir?: string;
}

/** Commander parser for --tick-ms / --timeout-ms. */
export function positiveIntOption(value: string): number {
  try {
    return parsePositiveInt(value, "value");
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

/** Commander parser for --tcp. */
export function hostPortOption(value: string): HostPort {
  try {
    return parseHostPort(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

/** Split "cmd arg arg" operands into the executable and its arguments. */
export function splitCommand(command: readonly string[]): { cmd: string; args: string[] } | undefined {
  const [cmd, ...args] = command;
  if (cmd === undefined || cmd === "") return undefined;
  return { cmd, args };
}

export function getPackageJsonVersion(): string {
  // src/cli/ when run from sources, dist/src/cli/ when built.
  const candidates = ["../../package.json", "../../../package.json"].map((rel) =>
    fileURLToPath(new URL(rel, import.meta.url))
  );
  for (const p of candidates) {
    if (!existsSync(p)) continue;
    const pkg: unknown = JSON.parse(readFileSync(p, "utf8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return VERSION;
}
