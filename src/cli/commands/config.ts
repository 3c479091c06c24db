import {
  configGet,
  configSet,
  getConfigPath,
  getDataDir,
  isConfigKey,
  type ConfigKey,
} from "../../config.js";
import { EXIT, exit } from "../../shared/errors.js";
import type { GlobalOptions } from "../utils.js";

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    exit(EXIT.INVALID_ARGS, `Unknown config key: ${key}`);
  }
  return key;
}

export async function runConfigGet(key: string, opts: GlobalOptions): Promise<void> {
  const value = await configGet(getDataDir(opts.dataDir), requireKey(key));
  if (value !== undefined) process.stdout.write(`${value}\n`);
}

export async function runConfigSet(key: string, value: string, opts: GlobalOptions): Promise<void> {
  await configSet(getDataDir(opts.dataDir), requireKey(key), value);
}

export function runConfigPath(opts: GlobalOptions): void {
  process.stdout.write(`${getConfigPath(getDataDir(opts.dataDir))}\n`);
}
