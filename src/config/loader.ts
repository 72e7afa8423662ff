/**
 * Configuration loader for cranscope
 * Handles YAML parsing, environment variable overrides and expansion, and validation
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { isIP } from "node:net";
import { parse as parseYaml } from "yaml";
import type {
  Config,
  ListenConfig,
  LoadConfigResult,
  LogFormat,
  LoggingConfig,
  LogLevel,
  RawConfig,
  UpstreamConfig,
} from "./types.js";

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(["debug", "info", "warn", "error"]);

const VALID_LOG_FORMATS: ReadonlySet<string> = new Set<LogFormat>(["json", "pretty"]);

/** Default configuration values */
const DEFAULTS = {
  listen: "0.0.0.0:8080",
  upstream: {
    base: "https://cloud.r-project.org",
    connectTimeoutMs: 5_000,
    timeoutMs: 60_000,
  },
  logging: {
    level: "info",
    format: "json",
  },
} as const;

export interface LoadConfigOptions {
  /** YAML file to read; defaults to $CRANSCOPE_CONFIG */
  filePath?: string;
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv;
}

/**
 * Expand environment variables in a string
 * Supports ${VAR} and ${VAR:-default} syntax
 */
function expandEnvVars(str: string, env: NodeJS.ProcessEnv): string {
  return str.replace(/\$\{([^}:]+)(:-([^}]*))?\}/g, (_match: string, name: string, _fallback: string | undefined, fallback: string | undefined) => {
    return env[name] ?? fallback ?? "";
  });
}

/**
 * Load configuration: environment > YAML file > defaults.
 * Throws on invalid values; callers treat that as fatal.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadConfigResult> {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? env.CRANSCOPE_CONFIG;
  const warnings: string[] = [];
  let raw: RawConfig = {};

  if (filePath) {
    if (existsSync(filePath)) {
      try {
        const content = await readFile(filePath, "utf-8");
        const parsed: unknown = parseYaml(content);
        if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
          raw = parsed as RawConfig;
        }
      } catch (error) {
        throw new Error(`Failed to parse config file at ${filePath}: ${error}`);
      }
    } else {
      warnings.push(`Config file not found: ${filePath}, using defaults`);
    }
  }

  const config = mergeAndValidateConfig(raw, env, warnings);
  return { config, warnings };
}

/**
 * Merge raw config with environment overrides and defaults, then validate
 */
function mergeAndValidateConfig(raw: RawConfig, env: NodeJS.ProcessEnv, warnings: string[]): Readonly<Config> {
  const config: Config = {
    listen: mergeListenConfig(env.LISTEN_ADDR ?? raw.listen),
    upstream: mergeUpstreamConfig(raw.upstream, env),
    logging: mergeLoggingConfig(raw.logging, env),
  };

  validateConfig(config, warnings);

  return Object.freeze({
    listen: Object.freeze(config.listen),
    upstream: Object.freeze(config.upstream),
    logging: Object.freeze(config.logging),
  });
}

/**
 * Parse an `ip:port` or `[ipv6]:port` listen address
 */
export function parseListenAddr(addr: string): ListenConfig {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(addr.trim());
  if (!match) {
    throw new Error(`Invalid listen address: "${addr}". Expected ip:port or [ipv6]:port.`);
  }

  const host = match[1] ?? match[2] ?? "";
  if (isIP(host) === 0) {
    throw new Error(`Invalid listen address: "${addr}". Host must be an IP address.`);
  }
  if (match[1] !== undefined && isIP(host) !== 6) {
    throw new Error(`Invalid listen address: "${addr}". Bracketed host must be an IPv6 address.`);
  }

  const port = Number(match[3]);
  if (!Number.isInteger(port) || port > 65535) {
    throw new Error(`Invalid port in listen address: "${addr}". Must be between 0 and 65535.`);
  }

  return { host, port };
}

function mergeListenConfig(raw?: unknown): ListenConfig {
  if (raw === undefined) {
    return parseListenAddr(DEFAULTS.listen);
  }
  if (typeof raw !== "string") {
    throw new Error(`Invalid listen address: must be a string, got ${typeof raw}`);
  }
  return parseListenAddr(raw);
}

/** Parse a positive integer timeout from env or YAML */
function parseTimeout(name: string, value: unknown, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n <= 0) {
    throw new Error(`Invalid ${name}: ${String(value)}. Must be a positive integer (milliseconds).`);
  }
  return n;
}

function mergeUpstreamConfig(raw: Partial<UpstreamConfig> | undefined, env: NodeJS.ProcessEnv): UpstreamConfig {
  const rawBase = env.UPSTREAM_BASE ?? (typeof raw?.base === "string" ? expandEnvVars(raw.base, env) : undefined);

  return {
    base: rawBase || DEFAULTS.upstream.base,
    connectTimeoutMs: parseTimeout(
      "upstream.connectTimeoutMs",
      env.UPSTREAM_CONNECT_TIMEOUT_MS ?? raw?.connectTimeoutMs,
      DEFAULTS.upstream.connectTimeoutMs,
    ),
    timeoutMs: parseTimeout("upstream.timeoutMs", env.UPSTREAM_TIMEOUT_MS ?? raw?.timeoutMs, DEFAULTS.upstream.timeoutMs),
  };
}

function mergeLoggingConfig(raw: Partial<LoggingConfig> | undefined, env: NodeJS.ProcessEnv): LoggingConfig {
  const level = String(env.LOG_LEVEL ?? raw?.level ?? DEFAULTS.logging.level).toLowerCase();
  const format = String(env.LOG_FORMAT ?? raw?.format ?? DEFAULTS.logging.format).toLowerCase();

  if (!isLogLevel(level)) {
    throw new Error(`Invalid logging level: ${level}. Must be one of: ${Array.from(VALID_LOG_LEVELS).join(", ")}`);
  }
  if (!isLogFormat(format)) {
    throw new Error(`Invalid logging format: ${format}. Must be one of: ${Array.from(VALID_LOG_FORMATS).join(", ")}`);
  }

  const rawFile = env.LOG_FILE ?? (typeof raw?.file === "string" ? expandEnvVars(raw.file, env) : undefined);

  return rawFile ? { level, format, file: rawFile } : { level, format };
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

function isLogFormat(value: string): value is LogFormat {
  return VALID_LOG_FORMATS.has(value);
}

/**
 * Validate the complete configuration
 */
function validateConfig(config: Config, warnings: string[]): void {
  let url: URL;
  try {
    url = new URL(config.upstream.base);
  } catch {
    throw new Error(`Invalid upstream URL: ${config.upstream.base}`);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`Invalid upstream URL: ${config.upstream.base}. Protocol must be http or https.`);
  }
  if (url.search || url.hash) {
    throw new Error(`Invalid upstream URL: ${config.upstream.base}. Query strings and fragments are not allowed.`);
  }

  if (url.protocol === "http:") {
    warnings.push(`Upstream ${config.upstream.base} uses plain http`);
  }
}
