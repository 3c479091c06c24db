import { describe, it, expect } from "vitest";
import { Channel } from "../../src/bridge/channel.js";

const buf = (s: string) => Buffer.from(s);

describe("Channel", () => {
  it("reports empty while the sender is open and nothing is queued", () => {
    const channel = new Channel<Buffer>();
    expect(channel.tryRecv()).toEqual({ kind: "empty" });
  });

  it("delivers values in the order they were sent", () => {
    const channel = new Channel<Buffer>();
    channel.send(buf("a"));
    channel.send(buf("b"));
    const first = channel.tryRecv();
    const second = channel.tryRecv();
    expect(first.kind === "ready" && first.value.toString()).toBe("a");
    expect(second.kind === "ready" && second.value.toString()).toBe("b");
  });

  it("drains queued values before reporting disconnected", () => {
    const channel = new Channel<Buffer>();
    channel.send(buf("last"));
    channel.closeSender();
    expect(channel.tryRecv().kind).toBe("ready");
    expect(channel.tryRecv()).toEqual({ kind: "disconnected" });
  });

  it("refuses sends once the receiver is gone and drops what was queued", () => {
    const channel = new Channel<Buffer>();
    channel.send(buf("x"));
    channel.closeReceiver();
    expect(channel.size).toBe(0);
    expect(channel.send(buf("y"))).toBe(false);
  });

  it("recv resolves as soon as a value is sent", async () => {
    const channel = new Channel<Buffer>();
    const pending = channel.recv(1000);
    channel.send(buf("now"));
    const result = await pending;
    expect(result.kind).toBe("ready");
    expect(result.kind === "ready" && result.value.toString()).toBe("now");
  });

  it("recv times out when nothing arrives", async () => {
    const channel = new Channel<Buffer>();
    await expect(channel.recv(5)).resolves.toEqual({ kind: "timeout" });
  });

  it("recv reports disconnected when the sender closes while waiting", async () => {
    const channel = new Channel<Buffer>();
    const pending = channel.recv(null);
    channel.closeSender();
    await expect(pending).resolves.toEqual({ kind: "disconnected" });
  });

  it("allows only one waiting receiver", async () => {
    const channel = new Channel<Buffer>();
    const first = channel.recv(20);
    await expect(channel.recv(20)).rejects.toThrow("already has a waiting receiver");
    await expect(first).resolves.toEqual({ kind: "timeout" });
  });
});
