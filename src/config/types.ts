/**
 * Configuration types for cranscope
 */

/** Listener bind address */
export interface ListenConfig {
  host: string;
  port: number;
}

/** Upstream mirror configuration */
export interface UpstreamConfig {
  /** Absolute URL of the mirror; a path component is prepended to every request path */
  base: string;
  /** Maximum time to establish the TCP connection */
  connectTimeoutMs: number;
  /** Maximum idle time waiting for response headers or the next body chunk */
  timeoutMs: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "json" | "pretty";

/** Logging configuration */
export interface LoggingConfig {
  level: LogLevel;
  format?: LogFormat;
  /** Also append JSON lines to this file */
  file?: string;
}

/** Complete configuration structure */
export interface Config {
  listen: ListenConfig;
  upstream: UpstreamConfig;
  logging: LoggingConfig;
}

/** Result of loading configuration */
export interface LoadConfigResult {
  config: Readonly<Config>;
  warnings: string[];
}

/** Raw parsed YAML structure (before environment variable expansion) */
export interface RawConfig {
  listen?: string;
  upstream?: Partial<UpstreamConfig>;
  logging?: Partial<LoggingConfig>;
}
