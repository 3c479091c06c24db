import { createServer, type IncomingMessage, type Server } from "node:http";
import type { Duplex } from "node:stream";
import { getRequestListener } from "@hono/node-server";
import { Hono } from "hono";
import { WebSocketServer, type WebSocket } from "ws";
import type { BridgeOptions } from "../bridge/loop.js";
import { connectProcess, spawnLocal } from "../bridge/process.js";
import { VERSION } from "../shared/constants.js";
import { errorMessage } from "../shared/errors.js";
import { log } from "../shared/logging.js";
import { acceptWebSocket } from "../transport/websocket.js";

export interface TunnelServerOptions {
  host: string;
  port: number;
  /** Spawned once per accepted connection. */
  command: string;
  args?: string[];
  cwd?: string;
  envAllowlist?: readonly string[];
  /** When set, upgrades must carry `Authorization: Bearer <token>` or `?token=<token>`. */
  token?: string;
  bridge?: BridgeOptions;
}

export interface ServerHandle {
  port: number;
  host: string;
  readonly sessions: number;
  close: () => Promise<void>;
}

export function createTunnelApp(activeSessions: () => number): Hono {
  const app = new Hono();
  app.get("/", (c) => c.json({ server: "tunnel-pump", version: VERSION }));
  app.get("/health", (c) => c.json({ ok: true, sessions: activeSessions() }));
  return app;
}

export function extractToken(request: IncomingMessage): string | undefined {
  const auth = request.headers.authorization;
  if (typeof auth === "string" && auth.startsWith("Bearer ")) return auth.slice(7);
  const url = new URL(request.url ?? "/", "http://localhost");
  return url.searchParams.get("token") ?? undefined;
}

function rejectUpgrade(socket: Duplex, status: number, text: string): void {
  socket.write(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

async function runSession(ws: WebSocket, request: IncomingMessage, options: TunnelServerOptions): Promise<void> {
  const connection = acceptWebSocket(ws, request);
  const peer = `${request.socket.remoteAddress ?? "?"}:${request.socket.remotePort ?? "?"}`;
  log.info({ peer, command: options.command }, "Session opened");
  try {
    const child = spawnLocal(options.command, options.args ?? [], {
      cwd: options.cwd,
      envAllowlist: options.envAllowlist,
    });
    const report = await connectProcess(connection, child, options.bridge);
    log.info({ peer, reason: report.reason }, "Session closed");
    await connection.shutdown(1000, "session ended");
  } catch (err) {
    log.error({ peer }, `Session failed: ${errorMessage(err)}`);
    await connection.shutdown(1011, "bridge failed");
  }
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

/**
 * Listen for WebSocket upgrades; each connection gets its own spawned command
 * bridged through its own pump. Plain HTTP requests reach a small status app.
 */
export async function startTunnelServer(options: TunnelServerOptions): Promise<ServerHandle> {
  const active = new Set<Promise<void>>();
  const app = createTunnelApp(() => active.size);
  const server = createServer(getRequestListener(app.fetch));
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    if (options.token && extractToken(request) !== options.token) {
      log.warn({ url: request.url }, "Rejected upgrade: missing or wrong token");
      rejectUpgrade(socket, 401, "Unauthorized");
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      const session: Promise<void> = runSession(ws, request, options).finally(() => {
        active.delete(session);
      });
      active.add(session);
    });
  });

  await listen(server, options.port, options.host);
  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : options.port;
  log.debug({ host: options.host, port }, "Tunnel server listening");

  return {
    host: options.host,
    port,
    get sessions() {
      return active.size;
    },
    close: async () => {
      for (const client of wss.clients) client.terminate();
      await Promise.allSettled([...active]);
      wss.close();
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
