import type { Socket } from "node:net";
import { TLSSocket } from "node:tls";
import { SocketOptionError } from "../shared/errors.js";

/**
 * Read-deadline and no-delay control for the socket under a framed connection.
 * The framed reader consults `readDeadlineMs` on every read; null blocks forever.
 */
export interface TimeoutCapableStream {
  readonly readDeadlineMs: number | null;
  setReadDeadline(ms: number | null): void;
  setNoDelay(enabled: boolean): void;
}

function checkDeadline(ms: number | null): void {
  if (ms === null) return;
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new SocketOptionError(`Invalid read deadline: ${ms}`);
  }
}

abstract class SocketStream implements TimeoutCapableStream {
  private deadline: number | null = null;

  /** Socket that carries the option; for TLS this is the raw transport socket. */
  protected abstract get raw(): Socket;

  get readDeadlineMs(): number | null {
    return this.deadline;
  }

  setReadDeadline(ms: number | null): void {
    checkDeadline(ms);
    if (ms !== null && this.raw.destroyed) {
      throw new SocketOptionError("Cannot set read deadline: socket is closed");
    }
    this.deadline = ms;
  }

  setNoDelay(enabled: boolean): void {
    const socket = this.raw;
    if (socket.destroyed) {
      if (enabled) throw new SocketOptionError("Cannot set no-delay: socket is closed");
      return;
    }
    socket.setNoDelay(enabled);
  }
}

export class PlainSocketStream extends SocketStream {
  constructor(private readonly socket: Socket) {
    super();
  }

  protected get raw(): Socket {
    return this.socket;
  }
}

/**
 * TLS-wrapped socket. The read deadline is enforced by the framed reader, and
 * `TLSSocket.setNoDelay` is forwarded by Node to the TCP handle underneath, so
 * the secure socket itself carries both options.
 */
export class SecureSocketStream extends SocketStream {
  constructor(private readonly secure: TLSSocket) {
    super();
  }

  protected get raw(): Socket {
    return this.secure;
  }
}

export function streamFor(socket: Socket): TimeoutCapableStream {
  return socket instanceof TLSSocket ? new SecureSocketStream(socket) : new PlainSocketStream(socket);
}
