import type { IncomingMessage } from "node:http";
import type { Socket } from "node:net";
import { WebSocket, type RawData } from "ws";
import { Channel } from "../bridge/channel.js";
import {
  ConnectionClosedError,
  DeadlineExpiredError,
  DialError,
  errorMessage,
} from "../shared/errors.js";
import { log } from "../shared/logging.js";
import { streamFor, type TimeoutCapableStream } from "./timeout-stream.js";
import type { FrameMessage, FramedConnection } from "./types.js";

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** FramedConnection over a `ws` WebSocket. Inbound events are queued in arrival order. */
export class WebSocketConnection implements FramedConnection {
  private readonly inbound = new Channel<FrameMessage>();
  private failure?: Error;

  constructor(
    private readonly socket: WebSocket,
    readonly stream: TimeoutCapableStream
  ) {
    socket.on("message", (data: RawData, isBinary: boolean) => {
      const payload = toBuffer(data);
      this.inbound.send(
        isBinary ? { type: "binary", data: payload } : { type: "text", data: payload.toString("utf8") }
      );
    });
    socket.on("ping", (data: Buffer) => this.inbound.send({ type: "ping", data }));
    socket.on("pong", (data: Buffer) => this.inbound.send({ type: "pong", data }));
    socket.on("close", (code: number, reason: Buffer) => {
      this.inbound.send({ type: "close", code, reason: reason.toString("utf8") });
      this.inbound.closeSender();
    });
    socket.on("error", (err: Error) => {
      log.debug({ err: err.message }, "WebSocket error");
      this.failure ??= err;
      this.inbound.closeSender();
    });
  }

  async readMessage(): Promise<FrameMessage> {
    const deadline = this.stream.readDeadlineMs;
    const result = await this.inbound.recv(deadline);
    switch (result.kind) {
      case "ready":
        return result.value;
      case "timeout":
        throw new DeadlineExpiredError(deadline ?? 0);
      case "disconnected":
        throw this.failure ?? new ConnectionClosedError();
    }
  }

  sendBinary(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new ConnectionClosedError("Cannot send: connection is not open"));
        return;
      }
      this.socket.send(data, { binary: true }, (err?: Error) => (err ? reject(err) : resolve()));
    });
  }

  close(code = 1000, reason = ""): void {
    const state = this.socket.readyState;
    if (state === WebSocket.OPEN || state === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }

  /** Close and wait for the closing handshake; the socket is dropped if the peer stays silent. */
  shutdown(code = 1000, reason = "", timeoutMs = 1000): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.socket.terminate();
        resolve();
      }, timeoutMs);
      this.socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      this.close(code, reason);
    });
  }
}

export interface DialOptions {
  /** Sent as `Authorization: Bearer <token>`. */
  token?: string;
  /** Accept self-signed or otherwise unverifiable TLS certificates. */
  insecure?: boolean;
  headers?: Record<string, string>;
  handshakeTimeoutMs?: number;
}

/** Open a client connection to a ws:// or wss:// URL. */
export function dialWebSocket(url: string, options: DialOptions = {}): Promise<WebSocketConnection> {
  const headers: Record<string, string> = { ...options.headers };
  if (options.token) headers.authorization = `Bearer ${options.token}`;

  return new Promise((resolve, reject) => {
    let ws: WebSocket;
    try {
      ws = new WebSocket(url, {
        headers,
        rejectUnauthorized: !options.insecure,
        handshakeTimeout: options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
      });
    } catch (err) {
      reject(new DialError(`Invalid WebSocket URL ${url}: ${errorMessage(err)}`, { cause: err }));
      return;
    }

    let upgraded: Socket | undefined;
    const onError = (err: Error) => {
      reject(new DialError(`Cannot connect to ${url}: ${err.message}`, { cause: err }));
    };
    ws.once("upgrade", (response: IncomingMessage) => {
      upgraded = response.socket;
    });
    ws.once("error", onError);
    ws.once("open", () => {
      ws.off("error", onError);
      if (!upgraded) {
        ws.terminate();
        reject(new DialError(`Cannot connect to ${url}: upgraded socket unavailable`));
        return;
      }
      resolve(new WebSocketConnection(ws, streamFor(upgraded)));
    });
  });
}

/** Wrap a connection accepted by a WebSocketServer. */
export function acceptWebSocket(ws: WebSocket, request: IncomingMessage): WebSocketConnection {
  return new WebSocketConnection(ws, streamFor(request.socket));
}
