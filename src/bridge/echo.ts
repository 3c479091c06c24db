import type { Writable } from "node:stream";

export type EchoDirection = "to-remote" | "from-remote";

const MARKERS: Record<EchoDirection, string> = {
  "to-remote": "> ",
  "from-remote": "< ",
};

/** Marker plus the payload as UTF-8; invalid sequences become U+FFFD. */
export function formatEcho(direction: EchoDirection, data: Buffer): string {
  return MARKERS[direction] + data.toString("utf8");
}

export function writeEcho(sink: Writable, direction: EchoDirection, data: Buffer): void {
  sink.write(formatEcho(direction, data));
}
