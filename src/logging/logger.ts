/**
 * Lightweight leveled logger.
 * Writes to console and, optionally, a log file with timestamps and run ID.
 *
 * Engine components accept a Logger and default to `silentLogger`, so the
 * library stays quiet unless the host application wires one in.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

/** Receives each formatted line; defaults to the matching console method */
export type LogSink = (level: LogLevel, line: string) => void;

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
  /** Context merged into every entry */
  bindings?: LogContext;
  /** Replace console output (used by tests and the CLI's --json mode) */
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger whose entries always carry `bindings` */
  child(bindings: LogContext): Logger;
}

type ResolvedOptions = Required<Omit<LoggerOptions, "sink">> & { sink?: LogSink };

const DEFAULT_OPTIONS: ResolvedOptions = {
  level: "info",
  logDir: "output/logs",
  logFile: "explorer.log",
  console: true,
  file: false,
  bindings: {},
};

/**
 * Type guard for level names read from configuration.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.info(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);
  const sink = opts.sink ?? consoleSink;

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const merged = { ...opts.bindings, ...context };
    const entry = formatLogEntry(level, message, merged);

    if (opts.console) {
      sink(level, entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fall back to console if the file write fails
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
      createLogger({ ...options, bindings: { ...opts.bindings, ...bindings } }),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
