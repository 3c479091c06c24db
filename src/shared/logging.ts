import { Writable } from "node:stream";
import { pino, type Logger } from "pino";
import { PinoPretty } from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export function redactSecrets(input: string): string {
  return input
    .replace(/\b(Bearer)\s+[A-Za-z0-9._~+/=-]+/g, "$1 [REDACTED]")
    .replace(/([?&]token=)[^&\s"']+/gi, "$1[REDACTED]")
    .replace(/\b(wss?|https?|tcp):\/\/([^\s:/@"']+):([^\s@/"']+)@/gi, "$1://$2:[REDACTED]@");
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isLogFormat(s: string): s is LogFormat {
  return LOG_FORMATS.some((format) => format === s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        let msg: unknown;
        try {
          const record: unknown = JSON.parse(line);
          msg = record && typeof record === "object" && "msg" in record ? record.msg : undefined;
        } catch {
          msg = line;
        }
        if (typeof msg === "string") {
          process.stderr.write(redactSecrets(msg) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: Logger | null = null;

function createLogger(level: string, format: string): Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  const logFormat = isLogFormat(format) ? format : "text";
  const options = { level: logLevel, name: "tunnel-pump" };
  if (logFormat === "plain") return pino(options, plainMessageStderr());
  if (logFormat === "text") {
    return pino(options, PinoPretty({ colorize: true, destination: redactingStderr() }));
  }
  return pino(options, redactingStderr());
}

export function initLogger(level = "info", format: string = "text"): void {
  rootLogger = createLogger(level, format);
}

function ensureLogger(): Logger {
  rootLogger ??= createLogger("info", "plain");
  return rootLogger;
}

export function getLogger(): Logger {
  return ensureLogger();
}

type LogMethodName = "info" | "warn" | "error" | "debug" | "trace";
type LogMethod = (objOrMsg: unknown, msg?: string, ...args: unknown[]) => void;

function method(name: LogMethodName): LogMethod {
  return (objOrMsg, msg, ...args) => {
    const logger = ensureLogger();
    if (typeof objOrMsg === "string") {
      logger[name](objOrMsg, ...(msg === undefined ? args : [msg, ...args]));
    } else {
      logger[name](objOrMsg, msg, ...args);
    }
  };
}

export const log = {
  info: method("info"),
  warn: method("warn"),
  error: method("error"),
  debug: method("debug"),
  trace: method("trace"),
};
