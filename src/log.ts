/**
 * Purpose: Leveled console logger shared by engine components and the CLI.
 * Intent: Keep log lines uniform (`[timestamp] [LEVEL] [source] message`) and injectable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, from: string): void;
  info(message: string, from: string): void;
  warn(message: string, from: string): void;
  error(message: string, from: string): void;
}

/** Minimal sink so the CLI can route everything to stderr. */
export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && Object.prototype.hasOwnProperty.call(levelRank, v);
}

export function formatLogLine(level: Exclude<LogLevel, "silent">, message: string, from: string, now: Date): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${from}] ${message}`;
}

export function createLogger(level: LogLevel, sink: LogSink = console, clock: () => Date = () => new Date()): Logger {
  const threshold = levelRank[level];
  const emit = (at: Exclude<LogLevel, "silent">, message: string, from: string): void => {
    if (levelRank[at] < threshold) return;
    sink[at](formatLogLine(at, message, from, clock()));
  };
  return {
    debug: (message, from) => emit("debug", message, from),
    info: (message, from) => emit("info", message, from),
    warn: (message, from) => emit("warn", message, from),
    error: (message, from) => emit("error", message, from),
  };
}
