import type { Readable } from "node:stream";
import { TRANSFER_BUFFER_SIZE } from "../shared/constants.js";
import { errorMessage } from "../shared/errors.js";
import { log } from "../shared/logging.js";
import type { Channel } from "./channel.js";

function toBuffer(chunk: unknown): Buffer | undefined {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return undefined;
}

/**
 * Reads the local byte source and queues every non-empty chunk on the channel.
 *
 * Ends on end-of-data, on a read error (not reported; the consumer sees the
 * channel close) or as soon as the receiving end is gone. The sender is closed
 * exactly once, when the pump ends.
 */
export class OutboundPump {
  readonly finished: Promise<void>;
  private forwarded = 0;

  constructor(
    private readonly source: Readable,
    private readonly channel: Channel<Buffer>,
    private readonly bufferSize = TRANSFER_BUFFER_SIZE
  ) {
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new RangeError(`Invalid transfer buffer size: ${bufferSize}`);
    }
    this.finished = this.run();
  }

  /** Chunks handed to the channel so far. */
  get chunksForwarded(): number {
    return this.forwarded;
  }

  private async run(): Promise<void> {
    try {
      for await (const chunk of this.source) {
        const data = toBuffer(chunk);
        if (!data || data.length === 0) continue;
        if (!this.forward(data)) {
          log.trace("Outbound receiver gone; pump stopping");
          return;
        }
      }
      log.trace("Local source reached end of data");
    } catch (err) {
      log.debug({ err: errorMessage(err) }, "Local source read failed");
    } finally {
      this.channel.closeSender();
    }
  }

  /** A read never yields more than one transfer buffer; larger chunks go out as successive reads. */
  private forward(data: Buffer): boolean {
    for (let offset = 0; offset < data.length; offset += this.bufferSize) {
      const piece = Buffer.from(data.subarray(offset, offset + this.bufferSize));
      if (!this.channel.send(piece)) return false;
      this.forwarded += 1;
    }
    return true;
  }
}
