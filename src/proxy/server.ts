/**
 * HTTP server shell: health check plus the proxy handler for everything else
 */

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Config } from "../config/types.js";
import type { Logger } from "../utils/logger.js";
import { createProxyHandler, pathOf } from "./handler.js";
import { RecordEmitter } from "./record.js";
import type { UpstreamClient } from "./types.js";
import { HttpUpstreamClient } from "./upstream.js";

export const HEALTH_PATH = "/healthz";

export interface ProxyServerOptions {
  /** Replaces the HTTP upstream client, e.g. with a stand-in */
  upstream?: UpstreamClient;
}

function formatAddress(address: AddressInfo | string | null): string {
  if (address === null) return "-";
  if (typeof address === "string") return address;
  return address.family === "IPv6" ? `[${address.address}]:${address.port}` : `${address.address}:${address.port}`;
}

/** Create and start the proxy server */
export function createProxyServer(config: Readonly<Config>, logger: Logger, options: ProxyServerOptions = {}): Server {
  const log = logger.child({ component: "server" });
  const upstream = options.upstream ?? new HttpUpstreamClient(config.upstream);
  const handleProxy = createProxyHandler({ upstream, emitter: new RecordEmitter(logger), logger });

  const server = createServer(async (req, res) => {
    if (pathOf(req.url ?? "/") === HEALTH_PATH) {
      res.writeHead(200, { "content-type": "text/plain; charset=utf-8" });
      res.end("ok");
      return;
    }
    await handleProxy(req, res);
  });

  server.on("close", () => upstream.close());

  const { port, host } = config.listen;
  server.listen(port, host, () => {
    log.info("listening", { addr: formatAddress(server.address()), upstream: config.upstream.base });
  });

  return server;
}

/** Start the proxy and resolve once it is accepting connections */
export function startProxy(config: Readonly<Config>, logger: Logger, options: ProxyServerOptions = {}): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = createProxyServer(config, logger, options);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
    server.once("error", reject);
  });
}
