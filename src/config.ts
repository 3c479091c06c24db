import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { type } from "arktype";
import {
  DEFAULT_LISTEN,
  INACTIVITY_TIMEOUT_MS,
  TICK_DURATION_MS,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from "./shared/logging.js";

const CONFIG_FILENAME = "tunnel-pump.json";

export function getDataDir(custom?: string): string {
  const dir = custom ?? getEnv("DATA_DIR");
  if (dir) return path.resolve(dir);
  return path.join(homedir(), ".tunnel-pump");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export const FileConfigSchema = type({
  "tick.ms?": "number > 0",
  "timeout.ms?": "number > 0",
  "echo?": "boolean",
  "log.level?": "'error' | 'warn' | 'info' | 'debug'",
  "log.format?": "'text' | 'json' | 'plain'",
  "server.listen?": "string",
  "server.token?": "string",
  /** Comma-separated names of the variables passed to spawned commands. */
  "child.env?": "string",
});

export type FileConfig = typeof FileConfigSchema.infer;
export type ConfigKey = keyof FileConfig;

const CONFIG_KEYS: readonly ConfigKey[] = [
  "tick.ms",
  "timeout.ms",
  "echo",
  "log.level",
  "log.format",
  "server.listen",
  "server.token",
  "child.env",
];

export function isConfigKey(s: string): s is ConfigKey {
  return CONFIG_KEYS.some((key) => key === s);
}

const DEFAULT_CONFIG: FileConfig = {
  "tick.ms": TICK_DURATION_MS,
  "timeout.ms": INACTIVITY_TIMEOUT_MS,
  echo: false,
  "log.level": "info",
  "log.format": "text",
  "server.listen": DEFAULT_LISTEN,
};

export function parseFileConfig(data: unknown, source: string): FileConfig {
  const out = FileConfigSchema(data);
  if (out instanceof type.errors) {
    throw new Error(`Invalid config ${source}: ${out.summary}`);
  }
  return out;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readConfig(dataDir: string): Promise<FileConfig> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid config ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseFileConfig(data, configPath);
}

export async function writeConfig(dataDir: string, cfg: FileConfig): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  await writeFile(getConfigPath(dataDir), JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

/** Ensure a config file exists with sensible defaults. Called on first CLI entry. */
export async function ensureDefaultConfig(dataDir: string): Promise<void> {
  try {
    await readFile(getConfigPath(dataDir), "utf8");
    return;
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }
  try {
    await writeConfig(dataDir, DEFAULT_CONFIG);
  } catch (error) {
    // Read-only homes (sandboxes, containers): run on built-in defaults.
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "EPERM" || code === "EACCES" || code === "EROFS") return;
    throw error;
  }
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | undefined> {
  const cfg = await readConfig(dataDir);
  const value = cfg[key];
  return value === undefined ? undefined : String(value);
}

function coerceValue(key: ConfigKey, value: string): unknown {
  switch (key) {
    case "tick.ms":
    case "timeout.ms":
      return Number(value);
    case "echo":
      return value === "true" ? true : value === "false" ? false : value;
    default:
      return value;
  }
}

export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<void> {
  const cfg = await readConfig(dataDir);
  const next = parseFileConfig({ ...cfg, [key]: coerceValue(key, value) }, `value for ${key}`);
  await writeConfig(dataDir, next);
}

export function parsePositiveInt(value: string, label: string): number {
  const n = Number(value.trim());
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Invalid ${label}: expected a positive integer, got "${value}"`);
  }
  return n;
}

function parseFlag(value: string, label: string): boolean {
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  throw new Error(`Invalid ${label}: expected true or false, got "${value}"`);
}

/** Values given on the command line; anything left out falls back to env, file, default. */
export interface CliSettings {
  tickMs?: number;
  timeoutMs?: number;
  echo?: boolean;
  logLevel?: string;
  logFormat?: string;
  listen?: string;
  token?: string;
}

export interface Settings {
  tickMs: number;
  inactivityTimeoutMs: number;
  echo: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  listen: string;
  token?: string;
  childEnv?: string[];
}

export function resolveSettings(
  cli: CliSettings,
  file: FileConfig,
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const envTick = getEnv("TICK_MS", env);
  const envTimeout = getEnv("TIMEOUT_MS", env);
  const envEcho = getEnv("ECHO", env);
  const envLevel = getEnv("LOG_LEVEL", env);

  const logLevel = cli.logLevel ?? envLevel ?? file["log.level"] ?? "info";
  if (!isLogLevel(logLevel)) throw new Error(`Invalid log level: ${logLevel}`);
  const logFormat = cli.logFormat ?? file["log.format"] ?? "text";
  if (!isLogFormat(logFormat)) throw new Error(`Invalid log format: ${logFormat}`);

  const token = cli.token ?? getEnv("TOKEN", env) ?? file["server.token"];
  const childEnv = file["child.env"]
    ?.split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return {
    tickMs:
      cli.tickMs ??
      (envTick !== undefined ? parsePositiveInt(envTick, "TUNNEL_PUMP_TICK_MS") : undefined) ??
      file["tick.ms"] ??
      TICK_DURATION_MS,
    inactivityTimeoutMs:
      cli.timeoutMs ??
      (envTimeout !== undefined ? parsePositiveInt(envTimeout, "TUNNEL_PUMP_TIMEOUT_MS") : undefined) ??
      file["timeout.ms"] ??
      INACTIVITY_TIMEOUT_MS,
    echo: cli.echo ?? (envEcho !== undefined ? parseFlag(envEcho, "TUNNEL_PUMP_ECHO") : undefined) ?? file.echo ?? false,
    logLevel,
    logFormat,
    listen: cli.listen ?? getEnv("LISTEN", env) ?? file["server.listen"] ?? DEFAULT_LISTEN,
    ...(token ? { token } : {}),
    ...(childEnv ? { childEnv } : {}),
  };
}
