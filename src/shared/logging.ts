import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

function stderrStream(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      process.stderr.write(chunk);
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
        try {
          const o = JSON.parse(line) as { msg?: unknown };
          if (typeof o.msg === "string") process.stderr.write(o.msg + "\n");
        } catch {
          process.stderr.write(line + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): pino.Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: "patchtap" }, plainMessageStderr());
  } else if (format === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: stderrStream() });
    rootLogger = pino({ level: logLevel, name: "patchtap" }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: "patchtap" }, stderrStream());
  }
  return rootLogger;
}

export function getLogger(): pino.Logger {
  if (!rootLogger) return initLogger("info", "plain");
  return rootLogger;
}

export function childLogger(component: string, parent?: pino.Logger): pino.Logger {
  return (parent ?? getLogger()).child({ component });
}

export type Logger = pino.Logger;
