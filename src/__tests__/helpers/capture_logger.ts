import type { LogLevel, Logger } from "../../utils/logger";

export interface LogRecord {
  level: LogLevel;
  msg: string;
  extra?: Record<string, unknown>;
}

/** A Logger that keeps every record instead of writing it. */
export function capture_logger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const at =
    (level: LogLevel) => (msg: string, extra?: Record<string, unknown>) => {
      records.push({ level, msg, extra });
    };
  return {
    records,
    logger: {
      debug: at("debug"),
      info: at("info"),
      warn: at("warn"),
      error: at("error"),
    },
  };
}
