/**
 * Upstream client: forwards one request to the mirror and hands back
 * the response with its body as a lazy stream
 */

import {
  Agent as HttpAgent,
  request as httpRequest,
  type ClientRequest,
  type IncomingMessage,
  type RequestOptions,
} from "node:http";
import { Agent as HttpsAgent, request as httpsRequest } from "node:https";
import type { UpstreamConfig } from "../config/types.js";
import type { ForwardRequest, ForwardResult, UpstreamClient, UpstreamErrorKind } from "./types.js";

/** Idle keep-alive sockets kept per upstream host */
const MAX_IDLE_SOCKETS = 8;

/** Failure talking to the upstream mirror */
export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly code: string | undefined;

  constructor(kind: UpstreamErrorKind, message: string, code?: string) {
    super(message);
    this.name = "UpstreamError";
    this.kind = kind;
    this.code = code;
  }
}

/**
 * Map a low-level error onto the upstream error taxonomy
 */
export function toUpstreamError(err: unknown): UpstreamError {
  if (err instanceof UpstreamError) return err;
  if (!(err instanceof Error)) return new UpstreamError("unreachable", String(err));

  const code = (err as NodeJS.ErrnoException).code;
  if (err.name === "AbortError" || code === "ABORT_ERR") {
    return new UpstreamError("aborted", "request aborted by client", code);
  }
  if (code === "ETIMEDOUT" || code === "ESOCKETTIMEDOUT") {
    return new UpstreamError("timeout", err.message, code);
  }
  if (code !== undefined && (code.startsWith("HPE_") || code === "ERR_INVALID_HTTP_TOKEN" || code === "ERR_UNESCAPED_CHARACTERS")) {
    return new UpstreamError("protocol", err.message, code);
  }
  // ECONNREFUSED, ENOTFOUND, EAI_AGAIN, ECONNRESET, ...
  return new UpstreamError("unreachable", err.message, code);
}

/**
 * Forwards requests over node:http / node:https with keep-alive pooling.
 * The target is the configured base joined with the raw request path, byte for byte.
 */
export class HttpUpstreamClient implements UpstreamClient {
  private readonly origin: URL;
  private readonly basePath: string;
  private readonly connectTimeoutMs: number;
  private readonly timeoutMs: number;
  private readonly isHttps: boolean;
  private readonly agent: HttpAgent;

  constructor(config: Readonly<UpstreamConfig>) {
    const base = new URL(config.base);
    this.origin = base;
    this.basePath = base.pathname.replace(/\/$/, "");
    this.connectTimeoutMs = config.connectTimeoutMs;
    this.timeoutMs = config.timeoutMs;

    this.isHttps = base.protocol === "https:";
    const agentOptions = { keepAlive: true, maxFreeSockets: MAX_IDLE_SOCKETS };
    this.agent = this.isHttps ? new HttpsAgent(agentOptions) : new HttpAgent(agentOptions);
  }

  forward(request: ForwardRequest): Promise<ForwardResult> {
    return new Promise<ForwardResult>((resolve) => {
      let settled = false;
      let response: IncomingMessage | null = null;

      const fail = (err: unknown): void => {
        if (settled) return;
        settled = true;
        resolve({ ok: false, error: toUpstreamError(err) });
      };

      const options: RequestOptions = {
        protocol: this.origin.protocol,
        hostname: this.origin.hostname.replace(/^\[(.*)\]$/, "$1"),
        port: this.origin.port || undefined,
        // Raw path and query, not normalized or re-encoded
        path: this.basePath + request.path,
        method: request.method,
        headers: request.headers,
        agent: this.agent,
        timeout: this.timeoutMs,
        signal: request.signal,
      };

      let req: ClientRequest;
      try {
        req = this.isHttps ? httpsRequest(options) : httpRequest(options);
      } catch (err) {
        // Node rejects the request line or headers before anything is sent
        const { message, code } = toUpstreamError(err);
        fail(new UpstreamError("protocol", message, code));
        return;
      }

      req.on("socket", (socket) => {
        if (!socket.connecting) return;
        const timer = setTimeout(() => {
          req.destroy(new UpstreamError("timeout", `connect timeout after ${this.connectTimeoutMs}ms`, "ETIMEDOUT"));
        }, this.connectTimeoutMs);
        const clear = (): void => clearTimeout(timer);
        socket.once("connect", clear);
        socket.once("close", clear);
      });

      req.on("timeout", () => {
        if (response) {
          response.destroy(new UpstreamError("timeout", `no body data within ${this.timeoutMs}ms`, "ETIMEDOUT"));
        } else {
          req.destroy(new UpstreamError("timeout", `no response headers within ${this.timeoutMs}ms`, "ETIMEDOUT"));
        }
      });

      req.on("error", fail);

      req.on("response", (res) => {
        response = res;
        if (settled) {
          res.destroy();
          return;
        }
        // Idle timeout between body chunks
        res.setTimeout(this.timeoutMs, () => {
          res.destroy(new UpstreamError("timeout", `no body data within ${this.timeoutMs}ms`, "ETIMEDOUT"));
        });
        settled = true;
        resolve({
          ok: true,
          response: {
            status: res.statusCode ?? 502,
            headers: res.headers,
            body: res,
          },
        });
      });

      if (request.body) {
        request.body.on("error", (err) => req.destroy(err));
        request.body.pipe(req);
      } else {
        req.end();
      }
    });
  }

  /** Close pooled sockets */
  close(): void {
    this.agent.destroy();
  }
}
