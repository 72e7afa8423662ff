#!/usr/bin/env node
/**
 * CLI entry point for cranscope
 */

import { createRequire } from "node:module";
import type { Server } from "node:http";
import { loadConfig } from "../config/loader.js";
import { parseArgs } from "./args.js";
import { startProxy } from "../proxy/server.js";
import { Logger } from "../utils/logger.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

/** Time allowed for in-flight downloads to finish after a stop signal */
const SHUTDOWN_GRACE_MS = 10_000;

const HELP_TEXT = `cranscope - logging proxy for CRAN-style package repositories

Usage:
  cranscope [options]

Options:
  -c, --config=PATH  Read settings from a YAML file (default: $CRANSCOPE_CONFIG)
  -h, --help         Show this help message
  -v, --version      Show version

Environment:
  UPSTREAM_BASE                 Upstream mirror URL (default: https://cloud.r-project.org)
  LISTEN_ADDR                   Bind address ip:port (default: 0.0.0.0:8080)
  LOG_LEVEL                     debug | info | warn | error (default: info)
  LOG_FORMAT                    json | pretty (default: json)
  LOG_FILE                      Also append JSON lines to this file
  UPSTREAM_CONNECT_TIMEOUT_MS   Connect timeout (default: 5000)
  UPSTREAM_TIMEOUT_MS           Idle timeout for headers and body chunks (default: 60000)
`;

function printHelp(): void {
  process.stdout.write(HELP_TEXT);
}

function printVersion(): void {
  process.stdout.write(`${version}\n`);
}

/** Stop accepting connections, give in-flight responses a grace period, then exit */
function installShutdownHandlers(server: Server, logger: Logger): void {
  const log = logger.child({ component: "cli" });
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    log.info("shutting down", { signal });

    server.closeIdleConnections();
    server.close((err) => {
      if (err) {
        log.error(`close failed: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });

    setTimeout(() => {
      log.warn("grace period elapsed, dropping open connections");
      server.closeAllConnections();
    }, SHUTDOWN_GRACE_MS).unref();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/** Main CLI function */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }
  if (args.unknown !== undefined) {
    process.stderr.write(`Unknown option: ${args.unknown}\n\n`);
    printHelp();
    process.exit(1);
  }

  // Any configuration error is fatal before a socket is bound
  const { config, warnings } = await loadConfig({ filePath: args.configPath });
  const logger = new Logger(config.logging);

  for (const warning of warnings) {
    logger.warn(warning, { component: "config" });
  }
  const logFile = logger.getLogFilePath();
  if (logFile) {
    logger.debug(`mirroring log lines to ${logFile}`, { component: "config" });
  }

  const server = await startProxy(config, logger);
  installShutdownHandlers(server, logger);
}

main().catch((err) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
