import { connect, type Socket } from "node:net";
import { DialError } from "./errors.js";

/**
 * Parse a --listen value (e.g. "127.0.0.1:4321" or "4321"); bad parts fall back to defaults.
 */
export function parseListen(listen: string): { host: string; port: number } {
  const defaultHost = "127.0.0.1";
  const defaultPort = 4321;
  if (!listen || listen === "") return { host: defaultHost, port: defaultPort };
  const colon = listen.lastIndexOf(":");
  if (colon === -1) {
    const port = parseInt(listen, 10);
    if (Number.isNaN(port) || port <= 0 || port > 65535)
      return { host: defaultHost, port: defaultPort };
    return { host: defaultHost, port };
  }
  const host = listen.slice(0, colon).trim() || defaultHost;
  const port = parseInt(listen.slice(colon + 1), 10);
  if (Number.isNaN(port) || port <= 0 || port > 65535)
    return { host, port: defaultPort };
  return { host, port };
}

export interface HostPort {
  host: string;
  port: number;
}

/** Strict "host:port" for a connect target; unlike parseListen nothing is defaulted. */
export function parseHostPort(value: string): HostPort {
  const colon = value.lastIndexOf(":");
  const host = colon === -1 ? "" : value.slice(0, colon).trim().replace(/^\[(.*)\]$/, "$1");
  const portText = colon === -1 ? "" : value.slice(colon + 1).trim();
  const port = /^\d+$/.test(portText) ? Number(portText) : Number.NaN;
  if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid target "${value}": expected host:port`);
  }
  return { host, port };
}

/** Open a TCP connection; resolves once connected. */
export function connectTcp(host: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });
    const onError = (err: Error) => {
      socket.destroy();
      reject(new DialError(`Cannot connect to ${host}:${port}: ${err.message}`, { cause: err }));
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(socket);
    });
  });
}
