import type { Writable } from "node:stream";
import {
  INACTIVITY_TIMEOUT_MS,
  TICK_DURATION_MS,
  TRANSFER_BUFFER_SIZE,
} from "../shared/constants.js";
import {
  BridgeSetupError,
  DeadlineExpiredError,
  SocketOptionError,
  errorMessage,
} from "../shared/errors.js";
import { log } from "../shared/logging.js";
import type { FrameMessage, FramedConnection } from "../transport/types.js";
import { Channel } from "./channel.js";
import { writeEcho } from "./echo.js";
import { writeAll, type DuplexEndpoint } from "./endpoint.js";
import { OutboundPump } from "./outbound-pump.js";

export interface BridgeOptions {
  /** Read deadline on the framed connection; bounds outbound relay latency. */
  tickMs?: number;
  /** Session ends after this long without data in either direction. */
  inactivityTimeoutMs?: number;
  /** Largest chunk taken from the local source in one read. */
  bufferSize?: number;
  /** Copy every payload, with a direction marker, to `echoSink`. */
  echo?: boolean;
  echoSink?: Writable;
  /** Clock source, in milliseconds. */
  now?: () => number;
}

export type TerminationReason =
  | "remote-closed"
  | "transport-error"
  | "local-eof"
  | "write-failed"
  | "send-failed"
  | "inactivity";

export interface SessionReport {
  reason: TerminationReason;
  bytesToRemote: number;
  bytesFromRemote: number;
  chunksToRemote: number;
  messagesFromRemote: number;
  durationMs: number;
  /** Set when the connection's socket options could not be restored. */
  restoreError?: SocketOptionError;
}

type BridgeState = { status: "running" } | { status: "terminated"; reason: TerminationReason };

function asSocketOptionError(err: unknown): SocketOptionError {
  return err instanceof SocketOptionError ? err : new SocketOptionError(errorMessage(err));
}

/**
 * Relays between a framed connection and a local byte endpoint until either side
 * ends, a transfer fails or the session goes idle.
 *
 * Each tick waits up to `tickMs` for an inbound message. Binary payloads are
 * written to the endpoint; when the wait expires instead, at most one queued
 * outbound chunk is sent.
 */
export class BridgeLoop {
  private readonly tickMs: number;
  private readonly inactivityTimeoutMs: number;
  private readonly bufferSize: number;
  private readonly echoSink?: Writable;
  private readonly now: () => number;
  private state: BridgeState = { status: "running" };
  private lastActivity = 0;
  private readonly stats = {
    bytesToRemote: 0,
    bytesFromRemote: 0,
    chunksToRemote: 0,
    messagesFromRemote: 0,
  };

  constructor(
    private readonly connection: FramedConnection,
    private readonly endpoint: DuplexEndpoint,
    options: BridgeOptions = {}
  ) {
    this.tickMs = options.tickMs ?? TICK_DURATION_MS;
    this.inactivityTimeoutMs = options.inactivityTimeoutMs ?? INACTIVITY_TIMEOUT_MS;
    this.bufferSize = options.bufferSize ?? TRANSFER_BUFFER_SIZE;
    this.echoSink = options.echo ? (options.echoSink ?? process.stdout) : undefined;
    this.now = options.now ?? Date.now;
  }

  get terminationReason(): TerminationReason | undefined {
    return this.state.status === "terminated" ? this.state.reason : undefined;
  }

  async run(): Promise<SessionReport> {
    if (this.state.status !== "running") {
      throw new Error("Bridge loop already ran");
    }
    const startedAt = this.now();
    this.configure();

    const outbound = new Channel<Buffer>();
    const pump = new OutboundPump(this.endpoint.readable, outbound, this.bufferSize);
    this.endpoint.writable.on("error", (err: Error) => {
      log.debug({ err: err.message }, "Local endpoint write error");
    });
    log.debug({ tickMs: this.tickMs, timeoutMs: this.inactivityTimeoutMs }, "Bridge session started");

    this.lastActivity = this.now();
    let reason: TerminationReason;
    for (;;) {
      const next = await this.tick(outbound);
      if (next) {
        reason = next;
        break;
      }
    }
    this.state = { status: "terminated", reason };

    outbound.closeReceiver();
    const restoreError = this.restore();
    const report: SessionReport = {
      reason,
      ...this.stats,
      durationMs: this.now() - startedAt,
      ...(restoreError ? { restoreError } : {}),
    };
    log.info(
      { ...report, restoreError: restoreError?.message, pumpChunks: pump.chunksForwarded },
      `Bridge session ended: ${reason}`
    );
    return report;
  }

  /** One iteration; returns the termination reason once the session is over. */
  private async tick(outbound: Channel<Buffer>): Promise<TerminationReason | undefined> {
    let message: FrameMessage;
    try {
      message = await this.connection.readMessage();
    } catch (err) {
      if (!(err instanceof DeadlineExpiredError)) {
        log.debug({ err: errorMessage(err) }, "Framed read failed");
        return "transport-error";
      }
      return this.pollOutbound(outbound);
    }

    switch (message.type) {
      case "binary":
        return this.deliverInbound(message.data);
      case "close":
        log.debug({ code: message.code, reason: message.reason }, "Remote closed the connection");
        return "remote-closed";
      default:
        return undefined;
    }
  }

  private async deliverInbound(data: Buffer): Promise<TerminationReason | undefined> {
    if (this.echoSink) writeEcho(this.echoSink, "from-remote", data);
    try {
      await writeAll(this.endpoint.writable, data);
    } catch (err) {
      log.debug({ err: errorMessage(err) }, "Write to local endpoint failed");
      return "write-failed";
    }
    this.lastActivity = this.now();
    this.stats.messagesFromRemote += 1;
    this.stats.bytesFromRemote += data.length;
    return undefined;
  }

  private async pollOutbound(outbound: Channel<Buffer>): Promise<TerminationReason | undefined> {
    if (this.now() - this.lastActivity >= this.inactivityTimeoutMs) {
      return "inactivity";
    }
    const next = outbound.tryRecv();
    if (next.kind === "empty") return undefined;
    if (next.kind === "disconnected") return "local-eof";

    this.lastActivity = this.now();
    if (this.echoSink) writeEcho(this.echoSink, "to-remote", next.value);
    try {
      await this.connection.sendBinary(next.value);
    } catch (err) {
      log.debug({ err: errorMessage(err) }, "Send to remote failed");
      return "send-failed";
    }
    this.stats.chunksToRemote += 1;
    this.stats.bytesToRemote += next.value.length;
    return undefined;
  }

  private configure(): void {
    const { stream } = this.connection;
    try {
      stream.setReadDeadline(this.tickMs);
      stream.setNoDelay(true);
    } catch (err) {
      const message = `Cannot configure connection: ${errorMessage(err)}`;
      log.error(message);
      throw new BridgeSetupError(message, { cause: err });
    }
  }

  private restore(): SocketOptionError | undefined {
    const { stream } = this.connection;
    try {
      stream.setReadDeadline(null);
      stream.setNoDelay(false);
      return undefined;
    } catch (err) {
      const failure = asSocketOptionError(err);
      log.error(`Cannot restore connection options: ${failure.message}`);
      return failure;
    }
  }
}

export function connectStreams(
  connection: FramedConnection,
  endpoint: DuplexEndpoint,
  options: BridgeOptions = {}
): Promise<SessionReport> {
  return new BridgeLoop(connection, endpoint, options).run();
}
