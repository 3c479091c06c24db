import type { BridgeOptions, SessionReport } from "../../bridge/loop.js";
import { connectStreams } from "../../bridge/loop.js";
import { endpointFromSocket, stdioEndpoint } from "../../bridge/endpoint.js";
import { connectProcess, spawnLocal } from "../../bridge/process.js";
import { getDataDir, readConfig, resolveSettings } from "../../config.js";
import { EXIT, exit } from "../../shared/errors.js";
import { initLogger, log } from "../../shared/logging.js";
import { connectTcp, type HostPort } from "../../shared/net.js";
import { dialWebSocket, type WebSocketConnection } from "../../transport/websocket.js";
import { splitCommand, type GlobalOptions } from "../utils.js";

export interface ConnectCommandOptions extends GlobalOptions {
  tcp?: HostPort;
  token?: string;
  insecure?: boolean;
  echo?: boolean;
  tickMs?: number;
  timeoutMs?: number;
}

async function bridgeTcp(
  connection: WebSocketConnection,
  { host, port }: HostPort,
  options: BridgeOptions
): Promise<SessionReport> {
  const socket = await connectTcp(host, port);
  try {
    return await connectStreams(connection, endpointFromSocket(socket), options);
  } finally {
    socket.destroy();
  }
}

export async function runConnect(
  url: string,
  command: string[],
  opts: ConnectCommandOptions
): Promise<void> {
  const settings = resolveSettings(opts, await readConfig(getDataDir(opts.dataDir)));
  initLogger(opts.verbose ? "debug" : settings.logLevel, settings.logFormat);

  const connection = await dialWebSocket(url, {
    token: settings.token,
    insecure: opts.insecure,
  });
  log.debug(`Connected to ${url}`);

  const bridge: BridgeOptions = {
    tickMs: settings.tickMs,
    inactivityTimeoutMs: settings.inactivityTimeoutMs,
    echo: settings.echo,
  };
  const target = splitCommand(command);
  let report: SessionReport;
  if (target) {
    const child = spawnLocal(target.cmd, target.args, { envAllowlist: settings.childEnv });
    report = await connectProcess(connection, child, bridge);
  } else if (opts.tcp) {
    report = await bridgeTcp(connection, opts.tcp, bridge);
  } else {
    // stdout carries the relayed bytes here, so echo goes to stderr.
    report = await connectStreams(connection, stdioEndpoint(), { ...bridge, echoSink: process.stderr });
  }

  await connection.shutdown(1000, "session ended");
  if (report.restoreError) {
    exit(EXIT.BRIDGE_FAILURE, `Session ended (${report.reason}) but connection options were not restored`);
  }
  // The local reader may still be parked on stdin; nothing else is left to do.
  exit(EXIT.SUCCESS);
}
