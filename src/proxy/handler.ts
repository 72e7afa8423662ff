/**
 * Proxy handler: forwards one request, streams the response back and
 * emits exactly one request record however the exchange ends
 */

import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from "node:http";
import { Transform, type TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";
import { classify } from "../classifier/classify.js";
import type { Logger } from "../utils/logger.js";
import { elapsedMs, epochMicros, monotonicMs } from "../utils/time.js";
import { buildForwardHeaders, buildResponseHeaders, headerValue } from "./headers.js";
import type { RecordEmitter } from "./record.js";
import type { RequestHandler, RequestOutcome, UpstreamClient } from "./types.js";
import type { UpstreamError } from "./upstream.js";

/** Status recorded when the client disconnects before upstream headers arrive */
export const CLIENT_CLOSED_STATUS = 499;

const BAD_GATEWAY_BODY = "upstream error";

export interface ProxyHandlerDeps {
  upstream: UpstreamClient;
  emitter: RecordEmitter;
  logger: Logger;
}

/** Which side ended the stream first; both are set from event callbacks */
interface ExchangeState {
  clientGone: boolean;
  upstreamFailure: Error | null;
}

/** Counts bytes on their way to the client without holding on to them */
class ByteMeter extends Transform {
  bytes = 0;

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    callback(null, chunk);
  }
}

/** Request path without the query string, as received */
export function pathOf(rawUrl: string): string {
  const q = rawUrl.indexOf("?");
  return q === -1 ? rawUrl : rawUrl.slice(0, q);
}

/**
 * Determine if request has a body based on method and headers
 */
export function hasRequestBody(method: string, headers: IncomingHttpHeaders): boolean {
  const upper = method.toUpperCase();
  if (upper === "GET" || upper === "HEAD") return false;

  const contentLength = headers["content-length"];
  return (contentLength !== undefined && parseInt(contentLength, 10) > 0) || headers["transfer-encoding"] !== undefined;
}

function describe(error: UpstreamError): string {
  return `${error.kind}: ${error.message}`;
}

function sendBadGateway(res: ServerResponse): void {
  if (!res.headersSent) {
    res.writeHead(502, { "content-type": "text/plain; charset=utf-8" });
  }
  res.end(BAD_GATEWAY_BODY);
}

/** Create the request handler for proxied (non-health) paths */
export function createProxyHandler(deps: ProxyHandlerDeps): RequestHandler {
  const log = deps.logger.child({ component: "proxy" });

  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startedAt = monotonicMs();
    const timestamp = epochMicros();
    const rawUrl = req.url ?? "/";
    const path = pathOf(rawUrl);
    const method = req.method ?? "GET";
    const derived = classify(path);

    // Record fields filled in as the exchange progresses
    let status = 502;
    let outcome: RequestOutcome = "bad_gateway";
    let errorText: string | undefined;
    let upstreamHeaders: IncomingHttpHeaders = {};
    let meter: ByteMeter | null = null;
    const state: ExchangeState = { clientGone: false, upstreamFailure: null };

    const abort = new AbortController();
    const onClientClose = (): void => {
      if (res.writableFinished || state.upstreamFailure) return;
      state.clientGone = true;
      abort.abort();
    };
    res.once("close", onClientClose);

    try {
      log.debug("forwarding", { method, path });

      const result = await deps.upstream.forward({
        method,
        path: rawUrl,
        headers: buildForwardHeaders(req.headers),
        body: hasRequestBody(method, req.headers) ? req : undefined,
        signal: abort.signal,
      });

      if (!result.ok) {
        errorText = describe(result.error);
        if (state.clientGone || result.error.kind === "aborted") {
          status = CLIENT_CLOSED_STATUS;
          outcome = "client_aborted";
        } else {
          log.warn("upstream_error", { method, path, error: errorText, errorCode: result.error.code });
          sendBadGateway(res);
        }
        return;
      }

      const upstreamRes = result.response;
      upstreamHeaders = upstreamRes.headers;
      status = upstreamRes.status;

      // Registered before pipeline() so the first failure is attributed correctly
      upstreamRes.body.on("error", (err: Error) => {
        if (!state.clientGone && !state.upstreamFailure) state.upstreamFailure = err;
      });

      res.writeHead(upstreamRes.status, buildResponseHeaders(upstreamRes.headers));
      meter = new ByteMeter();

      try {
        await pipeline(upstreamRes.body, meter, res);
        outcome = "complete";
      } catch (err) {
        // Headers are already out: the client sees a truncated body, the record keeps the status
        const failure: unknown = state.upstreamFailure ?? err;
        outcome = state.upstreamFailure ? "upstream_aborted" : "client_aborted";
        errorText = failure instanceof Error ? failure.message : String(failure);
        if (outcome === "upstream_aborted") {
          log.warn("upstream stream failed", { method, path, error: errorText, status: String(status) });
        }
      }
    } catch (err) {
      errorText = err instanceof Error ? err.message : String(err);
      log.error(`handler error: ${errorText}`, { method, path });
      if (res.headersSent) {
        outcome = "upstream_aborted";
        res.destroy();
      } else {
        status = 502;
        outcome = "bad_gateway";
        sendBadGateway(res);
      }
    } finally {
      res.off("close", onClientClose);
      deps.emitter.emit({
        timestamp,
        method,
        path,
        status,
        latencyMs: elapsedMs(startedAt),
        userAgent: headerValue(req.headers["user-agent"]),
        range: headerValue(req.headers["range"]),
        etagOut: headerValue(upstreamHeaders["etag"]),
        contentLength: headerValue(upstreamHeaders["content-length"]),
        bytesOut: meter?.bytes ?? 0,
        outcome,
        error: errorText,
        derived,
      });
    }
  };
}
