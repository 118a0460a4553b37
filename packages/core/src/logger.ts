/**
 * Scoped console loggers.
 *
 * Lines are formatted `[exprfuse/<scope>] LEVEL: message` and filtered by the
 * configured `log.level`. The writer is pluggable so tests and embedding
 * applications can capture output.
 */

import { config, type LogLevel } from "./config.js";

export type LogSeverity = Exclude<LogLevel, "silent">;

/** Receives one formatted line per emitted message. */
export type LogWriter = (severity: LogSeverity, line: string) => void;

export interface Logger {
  readonly scope: string;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  /** True when a message of this severity would be written */
  enabled(severity: LogSeverity): boolean;
}

const SEVERITY_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const consoleWriter: LogWriter = (severity, line) => {
  switch (severity) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
};

let writer: LogWriter = consoleWriter;

/**
 * Replace the destination of every logger. Call with no argument to restore
 * the console writer.
 */
export function setLogWriter(next?: LogWriter): void {
  writer = next ?? consoleWriter;
}

export function formatLogLine(scope: string, severity: LogSeverity, message: string): string {
  return `[exprfuse/${scope}] ${severity.toUpperCase()}: ${message}`;
}

export function createLogger(scope: string): Logger {
  const enabled = (severity: LogSeverity): boolean =>
    SEVERITY_RANK[severity] <= SEVERITY_RANK[config.logLevel()];

  const emit = (severity: LogSeverity, message: string): void => {
    if (enabled(severity)) {
      writer(severity, formatLogLine(scope, severity, message));
    }
  };

  return {
    scope,
    error: (message) => emit("error", message),
    warn: (message) => emit("warn", message),
    info: (message) => emit("info", message),
    debug: (message) => emit("debug", message),
    enabled,
  };
}
