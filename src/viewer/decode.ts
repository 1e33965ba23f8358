/**
 * Split a flat-file record back into prefix fields and the JSON payload
 */

import { parseJson } from "../record/canonical-json.js";
import { FIELD_DELIMITER, type LogEvent } from "../record/types.js";
import type { ViewerRecord } from "./types.js";

const PREFIX_FIELDS = 8;

function isLogEvent(value: unknown): value is LogEvent {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Throws when the record does not carry eight prefix fields and a JSON object */
export function decodeRecord(record: string): ViewerRecord {
  const line = record.endsWith("\n") ? record.slice(0, -1) : record;
  const fields: string[] = [];
  let start = 0;
  for (let i = 0; i < PREFIX_FIELDS; i++) {
    const end = line.indexOf(FIELD_DELIMITER, start);
    if (end < 0) {
      throw new Error(`record has ${i} prefix fields, expected ${PREFIX_FIELDS}`);
    }
    fields.push(line.slice(start, end));
    start = end + FIELD_DELIMITER.length;
  }

  const event = parseJson(line.slice(start));
  if (!isLogEvent(event)) {
    throw new Error("record payload is not a JSON object");
  }

  const [version, receivedAt, eventTs, id, subId, errorLevel, subLevel, digest] = fields;
  return { version, receivedAt, eventTs, id, subId, errorLevel, subLevel, digest, event };
}
