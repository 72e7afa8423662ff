/**
 * Unit tests for request record serialization and emission
 */

import { describe, it, expect, vi } from "vitest";
import { classify } from "../../src/classifier/classify.js";
import { RecordEmitter, recordFields } from "../../src/proxy/record.js";
import type { RequestRecord } from "../../src/proxy/types.js";
import { Logger } from "../../src/utils/logger.js";
import type { LogEntry } from "../../src/utils/log-types.js";
import { elapsedMs, epochMicros, formatTimestamp } from "../../src/utils/time.js";

const baseRecord: RequestRecord = {
  timestamp: 1_714_564_800_000_042,
  method: "GET",
  path: "/src/contrib/digest_0.6.37.tar.gz",
  status: 200,
  latencyMs: 12,
  userAgent: "R (4.4.0 x86_64-pc-linux-gnu)",
  range: undefined,
  etagOut: '"5f3a-1234"',
  contentLength: "1234",
  bytesOut: 1234,
  outcome: "complete",
  error: undefined,
  derived: classify("/src/contrib/digest_0.6.37.tar.gz"),
};

describe("recordFields", () => {
  it("string-encodes numbers and serializes the descriptor", () => {
    expect(recordFields(baseRecord)).toEqual({
      path: "/src/contrib/digest_0.6.37.tar.gz",
      status: "200",
      latency_ms: "12",
      ua: "R (4.4.0 x86_64-pc-linux-gnu)",
      range: "-",
      etag_out: '"5f3a-1234"',
      content_length: "1234",
      derived: '{"artifact_type":"src_tar","package":"digest","version":"0.6.37","r_minor":null,"os":null}',
      method: "GET",
      bytes_out: "1234",
      outcome: "complete",
    });
  });

  it("uses sentinels for absent headers and carries the error", () => {
    const fields = recordFields({
      ...baseRecord,
      status: 502,
      userAgent: undefined,
      etagOut: undefined,
      contentLength: undefined,
      bytesOut: 0,
      outcome: "bad_gateway",
      error: "unreachable: connect ECONNREFUSED 127.0.0.1:1",
    });

    expect(fields.status).toBe("502");
    expect(fields.ua).toBe("-");
    expect(fields.etag_out).toBe("-");
    expect(fields.content_length).toBe("-");
    expect(fields.error).toBe("unreachable: connect ECONNREFUSED 127.0.0.1:1");
  });
});

describe("RecordEmitter", () => {
  it("writes one proxied line stamped with the request start", () => {
    const lines: string[] = [];
    const logger = new Logger({ level: "info" }, { sink: { write: (line: string) => lines.push(line) } });

    new RecordEmitter(logger).emit(baseRecord);

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]) as LogEntry;
    expect(entry.timestamp).toBe("2024-05-01T12:00:00.000042Z");
    expect(entry.level).toBe("INFO");
    expect(Object.keys(entry.fields).slice(0, 9)).toEqual([
      "message",
      "path",
      "status",
      "latency_ms",
      "ua",
      "range",
      "etag_out",
      "content_length",
      "derived",
    ]);
    expect(entry.fields.message).toBe("proxied");
    expect(JSON.parse(String(entry.fields.derived))).toEqual({
      artifact_type: "src_tar",
      package: "digest",
      version: "0.6.37",
      r_minor: null,
      os: null,
    });
  });
});

describe("time helpers", () => {
  it("formats microseconds", () => {
    expect(formatTimestamp(0)).toBe("1970-01-01T00:00:00.000000Z");
    expect(formatTimestamp(1_000_001)).toBe("1970-01-01T00:00:01.000001Z");
  });

  it("reads the system clock at microsecond resolution", () => {
    const before = Date.now();
    const micros = epochMicros();
    const after = Date.now();

    expect(Number.isInteger(micros)).toBe(true);
    expect(micros).toBeGreaterThanOrEqual(before * 1000);
    expect(micros).toBeLessThan((after + 1) * 1000);
  });

  it("follows the system clock when it is adjusted", () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    try {
      vi.setSystemTime(new Date("2030-01-01T00:00:00.000Z"));
      expect(formatTimestamp(epochMicros()).startsWith("2030-01-01T00:00:00.000")).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it("floors elapsed time and never goes negative", () => {
    expect(elapsedMs(100, 112.9)).toBe(12);
    expect(elapsedMs(100, 99)).toBe(0);
  });
});
