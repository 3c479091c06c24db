import type { AddressInfo } from "node:net";
import { PassThrough, Writable } from "node:stream";
import { Channel } from "../src/bridge/channel.js";
import {
  ConnectionClosedError,
  DeadlineExpiredError,
  SocketOptionError,
} from "../src/shared/errors.js";
import type { TimeoutCapableStream } from "../src/transport/timeout-stream.js";
import type { FrameMessage, FramedConnection } from "../src/transport/types.js";

/** Records every option change; `failOn` makes the matching call throw. */
export class FakeStream implements TimeoutCapableStream {
  readDeadlineMs: number | null = null;
  readonly calls: string[] = [];
  failOn?: "deadline" | "nodelay" | "clear-deadline";

  setReadDeadline(ms: number | null): void {
    this.calls.push(`deadline:${ms}`);
    if (this.failOn === "deadline" && ms !== null) throw new SocketOptionError("deadline refused");
    if (this.failOn === "clear-deadline" && ms === null) throw new SocketOptionError("clear refused");
    this.readDeadlineMs = ms;
  }

  setNoDelay(enabled: boolean): void {
    this.calls.push(`nodelay:${enabled}`);
    if (this.failOn === "nodelay") throw new SocketOptionError("nodelay refused");
  }
}

/** In-memory framed connection; tests push inbound messages and inspect what was sent. */
export class FakeConnection implements FramedConnection {
  readonly stream = new FakeStream();
  readonly inbound = new Channel<FrameMessage>();
  readonly sent: Buffer[] = [];
  sendAttempts = 0;
  failSends = false;
  failure?: Error;
  closed?: { code?: number; reason?: string };

  async readMessage(): Promise<FrameMessage> {
    const deadline = this.stream.readDeadlineMs;
    const result = await this.inbound.recv(deadline);
    if (result.kind === "ready") return result.value;
    if (result.kind === "timeout") throw new DeadlineExpiredError(deadline ?? 0);
    throw this.failure ?? new ConnectionClosedError();
  }

  async sendBinary(data: Buffer): Promise<void> {
    this.sendAttempts += 1;
    if (this.failSends) throw new Error("send refused");
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  pushBinary(data: string | Buffer): void {
    this.inbound.send({ type: "binary", data: Buffer.isBuffer(data) ? data : Buffer.from(data) });
  }

  pushClose(code = 1000, reason = ""): void {
    this.inbound.send({ type: "close", code, reason });
    this.inbound.closeSender();
  }

  fail(error: Error): void {
    this.failure = error;
    this.inbound.closeSender();
  }
}

/** Writable that keeps everything written to it. */
export function collector(): { stream: PassThrough; text: () => string } {
  const stream = new PassThrough();
  const parts: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => parts.push(chunk));
  return { stream, text: () => Buffer.concat(parts).toString("utf8") };
}

export function failingWritable(message = "EPIPE"): Writable {
  return new Writable({
    write(_chunk, _enc, cb) {
      cb(new Error(message));
    },
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until `check` passes or `timeoutMs` elapses. */
export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (!check()) {
    if (Date.now() - start > timeoutMs) throw new Error("Timed out waiting for condition");
    await sleep(5);
  }
}

/** Port of a listening server bound to a TCP address. */
export function portOf(server: { address(): AddressInfo | string | null }): number {
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Server is not listening on TCP");
  return address.port;
}
