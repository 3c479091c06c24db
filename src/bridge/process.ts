import { spawn, type ChildProcess } from "node:child_process";
import { ProcessIoError, errorMessage } from "../shared/errors.js";
import { log } from "../shared/logging.js";
import type { FramedConnection } from "../transport/types.js";
import { connectStreams, type BridgeOptions, type SessionReport } from "./loop.js";

export function buildChildEnv(allowlist?: readonly string[]): NodeJS.ProcessEnv {
  if (!allowlist) return { ...process.env };
  const env: NodeJS.ProcessEnv = {};
  for (const key of allowlist) {
    if (process.env[key] !== undefined) {
      env[key] = process.env[key];
    }
  }
  return env;
}

export interface SpawnLocalOptions {
  cwd?: string;
  /** Only these variables reach the child; the whole environment when omitted. */
  envAllowlist?: readonly string[];
}

/** Spawn with piped stdin/stdout; stderr stays attached to ours. */
export function spawnLocal(
  command: string,
  args: string[],
  options: SpawnLocalOptions = {}
): ChildProcess {
  log.debug(`Spawning: ${command} ${args.join(" ")}`);
  const child = spawn(command, args, {
    cwd: options.cwd ?? process.cwd(),
    env: buildChildEnv(options.envAllowlist),
    stdio: ["pipe", "pipe", "inherit"],
  });
  child.on("error", (err) => {
    log.error(`Cannot run ${command}: ${err.message}`);
  });
  child.on("exit", (code, signal) => {
    log.debug({ code, signal, pid: child.pid }, "Process exited");
  });
  return child;
}

function waitForExit(child: ChildProcess): Promise<void> {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    child.once("exit", () => resolve());
    child.once("error", () => resolve());
  });
}

/**
 * Kill then reap; the process may already be gone, so neither step can fail the caller.
 * SIGKILL, since a child that traps SIGTERM would otherwise never be reaped.
 */
async function reap(child: ChildProcess): Promise<void> {
  try {
    child.kill("SIGKILL");
  } catch (err) {
    log.debug({ err: errorMessage(err) }, "Kill failed");
  }
  await waitForExit(child);
}

/**
 * Bridge a spawned process: its stdout goes to the remote peer, remote binary
 * messages go to its stdin. The process is killed and reaped once the session
 * ends, whatever ended it.
 */
export async function connectProcess(
  connection: FramedConnection,
  child: ChildProcess,
  options: BridgeOptions = {}
): Promise<SessionReport> {
  const { stdin, stdout } = child;
  if (!stdin) throw new ProcessIoError("Cannot take control of stdin");
  if (!stdout) throw new ProcessIoError("Cannot take control of stdout");

  try {
    return await connectStreams(connection, { readable: stdout, writable: stdin }, options);
  } finally {
    await reap(child);
  }
}
