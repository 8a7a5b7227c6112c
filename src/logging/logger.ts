/**
 * Lightweight logging utility.
 * Outputs to console and, optionally, a log file with timestamps and the
 * render session ID.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Fields attached to every entry; `session` fills the session column */
  bindings?: LogContext;
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "views.log",
  console: true,
  file: false,
  bindings: {},
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger that adds `bindings` to every entry. */
  child(bindings: LogContext): Logger;
}

/**
 * Format a log entry with timestamp, level, session ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context: LogContext = {},
  timestamp: Date = new Date()
): string {
  const { session, ...rest } = context;
  const sessionId = typeof session === "string" ? session : "no-session";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp.toISOString()}] [${levelStr}] [${sessionId}] ${message}`;

  if (Object.keys(rest).length > 0) {
    entry += ` ${JSON.stringify(rest)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, { ...opts.bindings, ...context });

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (bindings) =>
      createLogger({ ...opts, bindings: { ...opts.bindings, ...bindings } }),
  };
}

/** A logger that drops every entry. */
export const silentLogger: Logger = createLogger({ console: false, file: false });
