import type { Socket } from "node:net";
import type { Readable, Writable } from "node:stream";

/**
 * The local side of a bridge: independent read and write halves, backed by one
 * socket or by two process pipes.
 */
export interface DuplexEndpoint {
  readable: Readable;
  writable: Writable;
}

export function endpointFromSocket(socket: Socket): DuplexEndpoint {
  return { readable: socket, writable: socket };
}

export function stdioEndpoint(): DuplexEndpoint {
  return { readable: process.stdin, writable: process.stdout };
}

/** Resolves once the whole payload has been handed to the underlying resource. */
export function writeAll(writable: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (writable.destroyed || writable.writableEnded) {
      reject(new Error("Local endpoint is not writable"));
      return;
    }
    writable.write(data, (err?: Error | null) => (err ? reject(err) : resolve()));
  });
}
