import { PassThrough } from "node:stream";
import { describe, it, expect } from "vitest";
import { Channel } from "../../src/bridge/channel.js";
import { OutboundPump } from "../../src/bridge/outbound-pump.js";

function drain(channel: Channel<Buffer>): string[] {
  const out: string[] = [];
  for (let next = channel.tryRecv(); next.kind === "ready"; next = channel.tryRecv()) {
    out.push(next.value.toString());
  }
  return out;
}

describe("OutboundPump", () => {
  it("queues data and closes the sender at end-of-data", async () => {
    const source = new PassThrough();
    const channel = new Channel<Buffer>();
    const pump = new OutboundPump(source, channel);

    source.end("hello");
    await pump.finished;

    expect(drain(channel)).toEqual(["hello"]);
    expect(channel.tryRecv()).toEqual({ kind: "disconnected" });
    expect(pump.chunksForwarded).toBe(1);
  });

  it("splits chunks larger than the buffer size", async () => {
    const source = new PassThrough();
    const channel = new Channel<Buffer>();
    const pump = new OutboundPump(source, channel, 4);

    source.end("abcdefghij");
    await pump.finished;

    expect(drain(channel)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("skips empty chunks", async () => {
    const source = new PassThrough();
    const channel = new Channel<Buffer>();
    const pump = new OutboundPump(source, channel);

    source.write(Buffer.alloc(0));
    source.end();
    await pump.finished;

    expect(channel.tryRecv()).toEqual({ kind: "disconnected" });
    expect(pump.chunksForwarded).toBe(0);
  });

  it("stops once the receiver is gone", async () => {
    const source = new PassThrough();
    const channel = new Channel<Buffer>();
    const pump = new OutboundPump(source, channel);

    channel.closeReceiver();
    source.write("dropped");
    await pump.finished;

    expect(pump.chunksForwarded).toBe(0);
    expect(channel.isSenderClosed).toBe(true);
  });

  it("treats a read error as end-of-data", async () => {
    const source = new PassThrough();
    const channel = new Channel<Buffer>();
    const pump = new OutboundPump(source, channel);

    source.destroy(new Error("EIO"));
    await expect(pump.finished).resolves.toBeUndefined();

    expect(channel.tryRecv()).toEqual({ kind: "disconnected" });
  });

  it("rejects an invalid buffer size", () => {
    expect(() => new OutboundPump(new PassThrough(), new Channel<Buffer>(), 0)).toThrow(RangeError);
  });
});
