/**
 * Header filtering for forwarded requests and relayed responses
 */

import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";

/**
 * Hop-by-hop headers that should not be forwarded per RFC 7230
 */
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "trailers",
  "transfer-encoding",
  "upgrade",
  "proxy-connection",
]);

/**
 * Headers that should be removed to prevent spoofing (RFC 7239)
 */
const SECURITY_HEADERS_TO_REMOVE = new Set([
  "x-forwarded-for",
  "x-forwarded-host",
  "x-forwarded-proto",
  "x-forwarded-port",
  "x-real-ip",
  "forwarded",
]);

/** Sentinel used in log records for absent header values */
export const ABSENT = "-";

/**
 * Parse Connection header to extract additional hop-by-hop header names
 * per RFC 7230 Section 6.1
 */
export function parseConnectionHeader(connection: string | string[] | undefined): Set<string> {
  const names = new Set<string>();
  if (!connection) return names;

  const values = Array.isArray(connection) ? connection : [connection];
  for (const value of values) {
    for (const h of value.split(",")) {
      const name = h.trim().toLowerCase();
      if (name) names.add(name);
    }
  }

  return names;
}

/**
 * Build forwarded request headers.
 * Keeps end-to-end headers (User-Agent, Range, If-None-Match, If-Modified-Since, ...)
 * and drops hop-by-hop, host and origin-spoofing headers.
 */
export function buildForwardHeaders(reqHeaders: IncomingHttpHeaders): OutgoingHttpHeaders {
  const forwardHeaders: OutgoingHttpHeaders = {};
  const connectionHeaders = parseConnectionHeader(reqHeaders["connection"]);

  for (const [key, value] of Object.entries(reqHeaders)) {
    const keyLower = key.toLowerCase();

    if (HOP_BY_HOP_HEADERS.has(keyLower)) continue;
    if (connectionHeaders.has(keyLower)) continue;
    if (SECURITY_HEADERS_TO_REMOVE.has(keyLower)) continue;
    // Set from the upstream URL
    if (keyLower === "host") continue;

    if (value !== undefined) {
      forwardHeaders[key] = value;
    }
  }

  return forwardHeaders;
}

/**
 * Build response headers, removing hop-by-hop headers.
 * Content-Encoding and Content-Length pass through untouched since the body is relayed verbatim.
 */
export function buildResponseHeaders(upstreamHeaders: IncomingHttpHeaders): OutgoingHttpHeaders {
  const resHeaders: OutgoingHttpHeaders = {};
  const connectionHeaders = parseConnectionHeader(upstreamHeaders["connection"]);

  for (const [key, value] of Object.entries(upstreamHeaders)) {
    const keyLower = key.toLowerCase();

    if (HOP_BY_HOP_HEADERS.has(keyLower)) continue;
    if (connectionHeaders.has(keyLower)) continue;

    if (value !== undefined) {
      resHeaders[key] = value;
    }
  }

  return resHeaders;
}

/** First value of a header, or undefined */
export function headerValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) return value[0];
  return value;
}
