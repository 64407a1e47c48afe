/***
 * Logger — Leveled console logger.
 *
 * Records below the configured level are dropped. Output is either a plain
 * line ("[ts] name LEVEL: msg {extra}") or one JSON object per line.
 * The sink defaults to console.log and can be swapped (tests capture lines).
 *
 ***/

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export interface LoggerOptions {
  name: string;
  level: LogLevel;
  json?: boolean;
  sink?: (line: string) => void;
  clock?: () => Date;
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const level_order: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createLogger(opt: LoggerOptions): Logger {
  const sink = opt.sink ?? ((line: string) => console.log(line));
  const clock = opt.clock ?? (() => new Date());
  const enabled = (lvl: LogLevel) => level_order[lvl] >= level_order[opt.level];

  function out(lvl: LogLevel, msg: string, extra?: Record<string, unknown>) {
    if (!enabled(lvl)) return;
    const ts = clock().toISOString();
    if (opt.json) {
      sink(JSON.stringify({ level: lvl, ts, name: opt.name, msg, ...extra }));
      return;
    }
    const rest = extra ? " " + JSON.stringify(extra) : "";
    sink(`[${ts}] ${opt.name} ${lvl.toUpperCase()}: ${msg}${rest}`);
  }

  return {
    debug: (m, e) => out("debug", m, e),
    info: (m, e) => out("info", m, e),
    warn: (m, e) => out("warn", m, e),
    error: (m, e) => out("error", m, e),
  };
}
