/**
 * Structured log entry types for JSON-lines output
 */

export type LogEntryLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

/** Context fields that can be bound to a child logger or passed per call */
export interface LogContext {
  component?: "proxy" | "server" | "config" | "cli";
  path?: string;
  method?: string;
  status?: string;
  latency_ms?: string;
  error?: string;
  [key: string]: unknown;
}

/** Payload of a log line; `message` always comes first */
export interface LogFields extends LogContext {
  message: string;
}

export interface LogEntry {
  timestamp: string; // ISO 8601, microsecond precision
  level: LogEntryLevel;
  fields: LogFields;
}

/** Anything that accepts whole lines, e.g. process.stdout */
export interface LogSink {
  write(line: string): unknown;
}
