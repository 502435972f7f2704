import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

// stdout belongs to the MCP stdio transport, so logs always go to stderr.
export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    {
      name: "tickbar",
      level,
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
