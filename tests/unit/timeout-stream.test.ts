import { Socket } from "node:net";
import { TLSSocket } from "node:tls";
import { describe, it, expect, vi } from "vitest";
import {
  PlainSocketStream,
  SecureSocketStream,
  streamFor,
} from "../../src/transport/timeout-stream.js";
import { SocketOptionError } from "../../src/shared/errors.js";

describe("PlainSocketStream", () => {
  it("starts without a read deadline", () => {
    expect(new PlainSocketStream(new Socket()).readDeadlineMs).toBeNull();
  });

  it("sets and clears the read deadline", () => {
    const stream = new PlainSocketStream(new Socket());
    stream.setReadDeadline(10);
    expect(stream.readDeadlineMs).toBe(10);
    stream.setReadDeadline(null);
    expect(stream.readDeadlineMs).toBeNull();
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])("rejects deadline %s", (ms) => {
    const stream = new PlainSocketStream(new Socket());
    expect(() => stream.setReadDeadline(ms)).toThrow(SocketOptionError);
    expect(stream.readDeadlineMs).toBeNull();
  });

  it("passes no-delay through to the socket", () => {
    const socket = new Socket();
    const spy = vi.spyOn(socket, "setNoDelay");
    new PlainSocketStream(socket).setNoDelay(true);
    expect(spy).toHaveBeenCalledWith(true);
  });

  it("refuses to configure a destroyed socket but lets it be restored", () => {
    const socket = new Socket();
    socket.destroy();
    const stream = new PlainSocketStream(socket);
    expect(() => stream.setReadDeadline(10)).toThrow("socket is closed");
    expect(() => stream.setNoDelay(true)).toThrow("socket is closed");
    expect(() => stream.setReadDeadline(null)).not.toThrow();
    expect(() => stream.setNoDelay(false)).not.toThrow();
  });
});

describe("SecureSocketStream", () => {
  it("applies no-delay through the TLS socket", () => {
    const secure = new TLSSocket(new Socket());
    const spy = vi.spyOn(secure, "setNoDelay");

    new SecureSocketStream(secure).setNoDelay(true);

    expect(spy).toHaveBeenCalledWith(true);
    secure.destroy();
  });

  it("refuses a deadline once the TLS socket is closed", () => {
    const secure = new TLSSocket(new Socket());
    secure.destroy();
    const stream = new SecureSocketStream(secure);
    expect(() => stream.setReadDeadline(10)).toThrow(SocketOptionError);
    expect(() => stream.setReadDeadline(null)).not.toThrow();
  });
});

describe("streamFor", () => {
  it("uses the plain implementation for a TCP socket", () => {
    expect(streamFor(new Socket())).toBeInstanceOf(PlainSocketStream);
  });

  it("uses the secure implementation for a TLS socket", () => {
    const secure = new TLSSocket(new Socket());
    const stream = streamFor(secure);
    expect(stream).toBeInstanceOf(SecureSocketStream);
    expect(stream.readDeadlineMs).toBeNull();
    secure.destroy();
  });
});
