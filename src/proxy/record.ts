/**
 * Request records: serialization to log fields and emission
 */

import { serializeDescriptor } from "../classifier/classify.js";
import type { Logger } from "../utils/logger.js";
import type { LogContext } from "../utils/log-types.js";
import { ABSENT } from "./headers.js";
import type { RequestRecord } from "./types.js";

/** Message of every request record line */
export const RECORD_MESSAGE = "proxied";

/**
 * Log fields for a record. Numbers are string-encoded and missing
 * header values become "-"; `derived` is a JSON string.
 */
export function recordFields(record: RequestRecord): LogContext {
  const fields: LogContext = {
    path: record.path,
    status: String(record.status),
    latency_ms: String(record.latencyMs),
    ua: record.userAgent ?? ABSENT,
    range: record.range ?? ABSENT,
    etag_out: record.etagOut ?? ABSENT,
    content_length: record.contentLength ?? ABSENT,
    derived: serializeDescriptor(record.derived),
    method: record.method,
    bytes_out: String(record.bytesOut),
    outcome: record.outcome,
  };
  if (record.error !== undefined) {
    fields.error = record.error;
  }
  return fields;
}

/** Writes one `proxied` line per request, stamped with the request start time */
export class RecordEmitter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  emit(record: RequestRecord): void {
    this.logger.log("info", RECORD_MESSAGE, recordFields(record), record.timestamp);
  }
}
