import type { TimeoutCapableStream } from "./timeout-stream.js";

/** One inbound message of a framed connection. */
export type FrameMessage =
  | { type: "binary"; data: Buffer }
  | { type: "text"; data: string }
  | { type: "ping"; data: Buffer }
  | { type: "pong"; data: Buffer }
  | { type: "close"; code: number; reason: string };

/**
 * Message-oriented connection the bridge relays over.
 *
 * `readMessage` waits at most `stream.readDeadlineMs` and rejects with
 * DeadlineExpiredError when nothing arrived in time; after the close message has
 * been delivered (or the socket failed) it rejects with the failure.
 */
export interface FramedConnection {
  readonly stream: TimeoutCapableStream;
  readMessage(): Promise<FrameMessage>;
  sendBinary(data: Buffer): Promise<void>;
  close(code?: number, reason?: string): void;
}
