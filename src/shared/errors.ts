import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
  CONNECT_FAILURE: 4,
  BRIDGE_FAILURE: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exit(code: ExitCode, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** A read deadline or no-delay setting could not be applied to a socket. */
export class SocketOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SocketOptionError";
  }
}

/** A framed read waited past the stream's read deadline without a message arriving. */
export class DeadlineExpiredError extends Error {
  constructor(readonly deadlineMs: number) {
    super(`No message within ${deadlineMs}ms`);
    this.name = "DeadlineExpiredError";
  }
}

export class ConnectionClosedError extends Error {
  constructor(message = "Connection closed") {
    super(message);
    this.name = "ConnectionClosedError";
  }
}

/** The bridge could not configure the transport; no data was relayed. */
export class BridgeSetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeSetupError";
  }
}

/** Thrown when a child process was not spawned with piped stdin/stdout. */
export class ProcessIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProcessIoError";
  }
}

/** WebSocket or TCP connection could not be established. */
export class DialError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DialError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
