/**
 * Type definitions for proxy functionality
 */

import type { IncomingHttpHeaders, IncomingMessage, OutgoingHttpHeaders, ServerResponse } from "node:http";
import type { Readable } from "node:stream";
import type { ArtifactDescriptor } from "../classifier/types.js";
import type { UpstreamError } from "./upstream.js";

/** HTTP request handler */
export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export type UpstreamErrorKind = "unreachable" | "timeout" | "protocol" | "aborted";

/** One request to forward upstream */
export interface ForwardRequest {
  method: string;
  /** Raw path plus query string as received */
  path: string;
  headers: OutgoingHttpHeaders;
  /** Request body for methods other than GET/HEAD */
  body?: Readable;
  /** Aborts the upstream request, e.g. when the client disconnects */
  signal?: AbortSignal;
}

/** Upstream response; the body is read lazily as the upstream sends it */
export interface UpstreamResponse {
  status: number;
  headers: IncomingHttpHeaders;
  body: Readable;
}

export type ForwardResult = { ok: true; response: UpstreamResponse } | { ok: false; error: UpstreamError };

/** Anything that can forward a request to the mirror */
export interface UpstreamClient {
  forward(request: ForwardRequest): Promise<ForwardResult>;
  close(): void;
}

/**
 * How a proxied request ended:
 * - complete: every upstream byte reached the client
 * - bad_gateway: no upstream response, the client got a 502
 * - upstream_aborted: the upstream failed after headers were sent
 * - client_aborted: the client went away first
 */
export type RequestOutcome = "complete" | "bad_gateway" | "upstream_aborted" | "client_aborted";

/** One record per proxied request, read-only once emitted */
export interface RequestRecord {
  /** Request start, epoch microseconds */
  readonly timestamp: number;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly latencyMs: number;
  readonly userAgent: string | undefined;
  readonly range: string | undefined;
  readonly etagOut: string | undefined;
  readonly contentLength: string | undefined;
  readonly bytesOut: number;
  readonly outcome: RequestOutcome;
  readonly error: string | undefined;
  readonly derived: ArtifactDescriptor;
}
