/**
 * Structured logging: one JSON object per line to a sink (stdout by default),
 * optionally mirrored to a JSONL file, or colored text for terminals
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { LoggingConfig, LogLevel } from "../config/types.js";
import type { LogContext, LogEntry, LogEntryLevel, LogSink } from "./log-types.js";
import { epochMicros, formatTimestamp } from "./time.js";

/** Log level values for comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const ENTRY_LEVELS: Record<LogLevel, LogEntryLevel> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
};

export interface LoggerOptions {
  /** Where lines go; defaults to process.stdout */
  sink?: LogSink;
  logFilePath?: string;
  /** Force colors on or off in pretty format */
  colors?: boolean;
}

/** Color formatting per log level */
function colorLevel(c: ChalkInstance, level: LogEntryLevel): string {
  const label = level.padEnd(5);
  switch (level) {
    case "DEBUG":
      return c.dim.white(label);
    case "INFO":
      return c.cyan(label);
    case "WARN":
      return c.yellow(label);
    case "ERROR":
      return c.red(label);
  }
}

/** Format a LogEntry as a single human-readable line */
export function formatPretty(entry: LogEntry, c: ChalkInstance = chalk): string {
  const { message, component, ...rest } = entry.fields;
  const tag = component ? c.blue(`[${component}]`) + " " : "";
  const extras: string[] = [];
  for (const [key, value] of Object.entries(rest)) {
    if (value === undefined || value === null) continue;
    extras.push(`${c.dim.white(key)}=${String(value)}`);
  }
  const extrasStr = extras.length > 0 ? ` ${extras.join(" ")}` : "";
  return `${c.dim.white(entry.timestamp)} ${colorLevel(c, entry.level)} ${tag}${message}${extrasStr}`;
}

/** Logger with a JSON-lines sink and an optional JSONL file */
export class Logger {
  private readonly level: number;
  private fileFailureReported = false;
  private readonly pretty: boolean;
  private readonly sink: LogSink;
  private readonly logFilePath: string | undefined;
  private readonly chalk: ChalkInstance;

  constructor(config: LoggingConfig, options?: LoggerOptions) {
    this.level = LOG_LEVEL_VALUES[config.level];
    this.pretty = config.format === "pretty";
    this.sink = options?.sink ?? process.stdout;
    this.logFilePath = options?.logFilePath ?? config.file;
    this.chalk = options?.colors === undefined ? chalk : new Chalk({ level: options.colors ? 1 : 0 });

    if (this.logFilePath) {
      mkdirSync(dirname(this.logFilePath), { recursive: true });
    }
  }

  /** Create a child logger with bound context */
  child(ctx: LogContext): ChildLogger {
    return new ChildLogger(this, ctx);
  }

  /** Check if a level should be logged */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= this.level;
  }

  /**
   * Core log method. `at` overrides the entry timestamp (epoch microseconds).
   * Each line goes out in a single write so concurrent requests never interleave.
   */
  log(level: LogLevel, message: string, fields?: LogContext, at?: number): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: formatTimestamp(at ?? epochMicros()),
      level: ENTRY_LEVELS[level],
      fields: { message, ...fields },
    };
    const json = JSON.stringify(entry);
    this.writeSink(entry, json);

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, json + "\n");
      } catch (err) {
        this.reportFileFailure(this.logFilePath, err);
      }
    }
  }

  private writeSink(entry: LogEntry, json: string = JSON.stringify(entry)): void {
    this.sink.write((this.pretty ? formatPretty(entry, this.chalk) : json) + "\n");
  }

  /** One WARN entry on the sink for the first failed mirror write; later failures stay silent */
  private reportFileFailure(filePath: string, err: unknown): void {
    if (this.fileFailureReported || !this.isEnabled("warn")) return;
    this.fileFailureReported = true;
    this.writeSink({
      timestamp: formatTimestamp(epochMicros()),
      level: "WARN",
      fields: {
        message: "log file write failed",
        path: filePath,
        error: err instanceof Error ? err.message : String(err),
      },
    });
  }

  /** Log debug message */
  debug(message: string, fields?: LogContext): void {
    this.log("debug", message, fields);
  }

  /** Log info message */
  info(message: string, fields?: LogContext): void {
    this.log("info", message, fields);
  }

  /** Log warning message */
  warn(message: string, fields?: LogContext): void {
    this.log("warn", message, fields);
  }

  /** Log error message */
  error(message: string, fields?: LogContext): void {
    this.log("error", message, fields);
  }

  /** Get the log file path */
  getLogFilePath(): string | undefined {
    return this.logFilePath;
  }
}

/** Child logger that adds bound context to every log entry */
export class ChildLogger {
  private parent: Logger;
  private ctx: LogContext;

  constructor(parent: Logger, ctx: LogContext) {
    this.parent = parent;
    this.ctx = ctx;
  }

  debug(message: string, fields?: LogContext): void {
    this.parent.log("debug", message, { ...this.ctx, ...fields });
  }

  info(message: string, fields?: LogContext): void {
    this.parent.log("info", message, { ...this.ctx, ...fields });
  }

  warn(message: string, fields?: LogContext): void {
    this.parent.log("warn", message, { ...this.ctx, ...fields });
  }

  error(message: string, fields?: LogContext): void {
    this.parent.log("error", message, { ...this.ctx, ...fields });
  }
}
