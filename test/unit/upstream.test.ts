/**
 * Unit tests for the upstream client against in-process servers
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createServer, type IncomingHttpHeaders, type Server } from "node:http";
import { createServer as createNetServer, type Socket } from "node:net";
import type { Readable } from "node:stream";
import { HttpUpstreamClient, UpstreamError, toUpstreamError } from "../../src/proxy/upstream.js";
import type { ForwardResult, UpstreamResponse } from "../../src/proxy/types.js";
import { closedPort, closeServer, listen } from "../helpers/http.js";

function expectOk(result: ForwardResult): UpstreamResponse {
  if (!result.ok) throw new Error(`expected a response, got ${result.error.kind}: ${result.error.message}`);
  return result.response;
}

function expectError(result: ForwardResult): UpstreamError {
  if (result.ok) throw new Error(`expected an error, got status ${result.response.status}`);
  return result.error;
}

async function readAll(body: Readable): Promise<string> {
  let text = "";
  for await (const chunk of body) {
    text += String(chunk);
  }
  return text;
}

describe("toUpstreamError", () => {
  it("maps refused connections to unreachable", () => {
    const err = toUpstreamError(Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }));
    expect(err.kind).toBe("unreachable");
    expect(err.code).toBe("ECONNREFUSED");
  });

  it("maps timeouts", () => {
    expect(toUpstreamError(Object.assign(new Error("timed out"), { code: "ETIMEDOUT" })).kind).toBe("timeout");
  });

  it("maps parser failures to protocol", () => {
    expect(toUpstreamError(Object.assign(new Error("Parse Error"), { code: "HPE_INVALID_CONSTANT" })).kind).toBe("protocol");
  });

  it("maps abort errors", () => {
    const abortError = Object.assign(new Error("The operation was aborted"), { name: "AbortError", code: "ABORT_ERR" });
    const err = toUpstreamError(abortError);
    expect(err.kind).toBe("aborted");
    expect(err.message).toBe("request aborted by client");
  });

  it("passes UpstreamError through and wraps non-errors", () => {
    const original = new UpstreamError("timeout", "slow");
    expect(toUpstreamError(original)).toBe(original);
    expect(toUpstreamError("boom")).toMatchObject({ kind: "unreachable", message: "boom" });
  });
});

describe("HttpUpstreamClient", () => {
  let upstream: Server;
  let base: string;
  const seen: { url: string | undefined; headers: IncomingHttpHeaders }[] = [];

  beforeAll(async () => {
    upstream = createServer((req, res) => {
      seen.push({ url: req.url, headers: req.headers });
      if (req.url?.startsWith("/cran/slow")) {
        // Never answers
        return;
      }
      if (req.url === "/cran/stall") {
        res.writeHead(200, { "content-type": "application/octet-stream" });
        res.write("head");
        return;
      }
      if (req.url === "/cran/missing") {
        res.writeHead(404, { "content-type": "text/plain" });
        res.end("not found");
        return;
      }
      res.writeHead(200, { "content-type": "text/plain", etag: '"v1"' });
      res.write("Package: digest\n");
      res.end("Version: 0.6.37\n");
    });
    const port = await listen(upstream);
    base = `http://127.0.0.1:${port}/cran/`;
  });

  afterAll(async () => {
    await closeServer(upstream);
  });

  it("joins the base path with the raw path and query", async () => {
    const client = new HttpUpstreamClient({ base, connectTimeoutMs: 1000, timeoutMs: 2000 });
    const response = expectOk(
      await client.forward({ method: "GET", path: "/src/contrib/PACKAGES?x=%41", headers: { "user-agent": "test-agent" } }),
    );

    expect(response.status).toBe(200);
    expect(response.headers.etag).toBe('"v1"');
    expect(await readAll(response.body)).toBe("Package: digest\nVersion: 0.6.37\n");
    expect(seen.at(-1)?.url).toBe("/cran/src/contrib/PACKAGES?x=%41");
    expect(seen.at(-1)?.headers["user-agent"]).toBe("test-agent");
    client.close();
  });

  it("returns upstream error statuses as responses", async () => {
    const client = new HttpUpstreamClient({ base, connectTimeoutMs: 1000, timeoutMs: 2000 });
    const response = expectOk(await client.forward({ method: "GET", path: "/missing", headers: {} }));

    expect(response.status).toBe(404);
    expect(await readAll(response.body)).toBe("not found");
    client.close();
  });

  it("times out when headers never arrive", async () => {
    const client = new HttpUpstreamClient({ base, connectTimeoutMs: 1000, timeoutMs: 100 });
    const error = expectError(await client.forward({ method: "GET", path: "/slow", headers: {} }));

    expect(error.kind).toBe("timeout");
    expect(error.message).toBe("no response headers within 100ms");
    client.close();
  });

  it("times out when the body stalls", async () => {
    const client = new HttpUpstreamClient({ base, connectTimeoutMs: 1000, timeoutMs: 100 });
    const response = expectOk(await client.forward({ method: "GET", path: "/stall", headers: {} }));

    await expect(readAll(response.body)).rejects.toThrow("no body data within 100ms");
    client.close();
  });

  it("reports aborted requests", async () => {
    const client = new HttpUpstreamClient({ base, connectTimeoutMs: 1000, timeoutMs: 2000 });
    const controller = new AbortController();
    const pending = client.forward({ method: "GET", path: "/slow/abort", headers: {}, signal: controller.signal });
    controller.abort();

    expect(expectError(await pending).kind).toBe("aborted");
    client.close();
  });

  it("reports unreachable upstreams", async () => {
    const port = await closedPort();
    const client = new HttpUpstreamClient({ base: `http://127.0.0.1:${port}`, connectTimeoutMs: 1000, timeoutMs: 2000 });
    const error = expectError(await client.forward({ method: "GET", path: "/src/contrib/PACKAGES", headers: {} }));

    expect(error.kind).toBe("unreachable");
    expect(error.code).toBe("ECONNREFUSED");
    client.close();
  });

  it("reports malformed responses as protocol errors", async () => {
    const sockets: Socket[] = [];
    const garbage = createNetServer((socket) => {
      sockets.push(socket);
      socket.on("error", () => undefined);
      socket.end("this is not http\r\n\r\n");
    });
    const port = await listen(garbage);
    const client = new HttpUpstreamClient({ base: `http://127.0.0.1:${port}`, connectTimeoutMs: 1000, timeoutMs: 2000 });

    const error = expectError(await client.forward({ method: "GET", path: "/src/contrib/PACKAGES", headers: {} }));

    expect(error.kind).toBe("protocol");
    expect(error.code).toMatch(/^HPE_/);
    client.close();
    for (const socket of sockets) socket.destroy();
    await new Promise<void>((resolve) => garbage.close(() => resolve()));
  });
});
