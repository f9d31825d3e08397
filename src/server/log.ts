import { pino, type DestinationStream } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export type LogFields = Record<string, unknown>;

/** Tagged, structured events. The tag becomes the record's `msg`. */
export interface Logger {
  debug(tag: string, fields?: LogFields): void;
  info(tag: string, fields?: LogFields): void;
  warn(tag: string, fields?: LogFields): void;
  error(tag: string, fields?: LogFields): void;
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((l) => l === s);
}

/**
 * pino-backed logger writing one JSON record per event:
 *   {"level":30,"time":"2024-05-01T12:00:00.000Z","connId":"...","msg":"ws:connect"}
 * Errors go under `err` and are serialized by pino.
 */
export function createLogger(level: LogLevel = "info", destination?: DestinationStream): Logger {
  const options = { level, base: null, timestamp: pino.stdTimeFunctions.isoTime };
  const base = destination ? pino(options, destination) : pino(options);

  return {
    debug: (tag, fields = {}) => base.debug(fields, tag),
    info: (tag, fields = {}) => base.info(fields, tag),
    warn: (tag, fields = {}) => base.warn(fields, tag),
    error: (tag, fields = {}) => base.error(fields, tag),
  };
}

export const silentLogger: Logger = createLogger("silent");
