/**
 * Record normalizer: validates one source-prefixed line and turns it into a
 * hashed, field-prefixed flat-file record
 */

import { createHash } from "node:crypto";
import { isLosslessNumber } from "lossless-json";
import { canonicalJson, parseJson } from "./canonical-json.js";
import { formatEpoch, type Clock } from "./clock.js";
import {
  FIELD_DELIMITER,
  FORMAT_VERSION,
  type ControlFields,
  type JsonValue,
  type LogEvent,
  type NormalizeResult,
} from "./types.js";

const DEFAULT_ID = "____";
const DEFAULT_LEVEL = "_";

/** Characters that would split a prefix field or the record line */
const PREFIX_BREAKER = /[\t\r\n]/;

/** Join a peer address and a raw line into the unit the normalizer takes */
export function sourcePrefixed(ip: string, rawLine: string): string {
  return ip + FIELD_DELIMITER + rawLine;
}

/** Syntactic check only: digits at both ends and exactly three dots */
export function looksLikeIpv4(ip: string): boolean {
  if (!ip) return false;
  const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";
  return isDigit(ip[0]) && isDigit(ip[ip.length - 1]) && ip.split(".").length === 4;
}

function isLogEvent(value: unknown): value is LogEvent {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `%0<width>d` over integer digits: the sign counts toward the width */
function padInteger(digits: string, width: number): string {
  const sign = digits.startsWith("-") ? "-" : "";
  return sign + digits.slice(sign.length).padStart(width - sign.length, "0");
}

/** Render a control value for the record prefix */
function controlText(value: JsonValue | undefined, fallback: string, width: number): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value === "string") return value;
  // Booleans count as 1 and 0
  if (typeof value === "boolean") return padInteger(value ? "1" : "0", width);
  if (typeof value === "number" && Number.isInteger(value)) return padInteger(String(value), width);
  if (isLosslessNumber(value)) return padInteger(value.value, width);
  if (typeof value === "object") return canonicalJson(value);
  return String(value);
}

/** A sender timestamp counts only when it is truthy */
function hasTimestamp(value: JsonValue | undefined): value is JsonValue {
  return !(value === undefined || value === null || value === "" || value === 0 || value === false);
}

function timestampText(value: JsonValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return formatEpoch(value);
  if (isLosslessNumber(value)) return formatEpoch(Number(value.value));
  return controlText(value, "", 0);
}

export function sha1Hex(text: string): string {
  return createHash("sha1").update(Buffer.from(text, "utf-8")).digest("hex");
}

export class Normalizer {
  constructor(private readonly clock: Clock) {}

  /** Validate and reshape `<ip>\t<json object>`; never throws */
  normalize(line: string): NormalizeResult {
    try {
      const cut = line.indexOf(FIELD_DELIMITER);
      if (cut < 0) {
        return { ok: false, reason: "split ip/payload: no delimiter" };
      }
      const ip = line.slice(0, cut);
      const payload = line.slice(cut + FIELD_DELIMITER.length);

      if (!looksLikeIpv4(ip)) {
        return { ok: false, reason: `bad _ip: ${JSON.stringify(ip)}` };
      }
      if (!payload || !payload.startsWith("{") || !payload.endsWith("}")) {
        return { ok: false, reason: `bad json dict: ${JSON.stringify(payload)}` };
      }

      let parsed: unknown;
      try {
        parsed = parseJson(payload);
      } catch (err) {
        return { ok: false, reason: `json parse: ${err instanceof Error ? err.message : String(err)}` };
      }
      if (!isLogEvent(parsed)) {
        return { ok: false, reason: `bad json dict: ${JSON.stringify(payload)}` };
      }

      return this.format(ip, parsed);
    } catch (err) {
      return { ok: false, reason: `normalize: ${err instanceof Error ? err.message : String(err)}` };
    }
  }

  private format(ip: string, event: LogEvent): NormalizeResult {
    event._ip = ip;
    const now = this.clock.refresh();

    let eventTs: string;
    const ts = event._ts;
    if (hasTimestamp(ts)) {
      eventTs = timestampText(ts);
    } else {
      eventTs = now.epochText;
      event._ts = eventTs;
    }

    const fields: ControlFields = {
      receivedAt: now.epochText,
      eventTs,
      id: controlText(event._id, DEFAULT_ID, 4),
      subId: controlText(event._si, DEFAULT_ID, 4),
      errorLevel: controlText(event._el, DEFAULT_LEVEL, 1),
      subLevel: controlText(event._sl, DEFAULT_LEVEL, 1),
    };
    const prefixed: Array<[string, string]> = [
      ["_ts", fields.eventTs],
      ["_id", fields.id],
      ["_si", fields.subId],
      ["_el", fields.errorLevel],
      ["_sl", fields.subLevel],
    ];
    for (const [key, text] of prefixed) {
      if (PREFIX_BREAKER.test(text)) {
        return { ok: false, reason: `bad ${key}: ${JSON.stringify(text)}` };
      }
    }
    // Every control key is present, in its prefix form, in the stored payload
    event._id = fields.id;
    event._si = fields.subId;
    event._el = fields.errorLevel;
    event._sl = fields.subLevel;

    const json = canonicalJson(event);
    const digest = sha1Hex(json);
    const record =
      [
        FORMAT_VERSION,
        fields.receivedAt,
        fields.eventTs,
        fields.id,
        fields.subId,
        fields.errorLevel,
        fields.subLevel,
        digest,
        json,
      ].join(FIELD_DELIMITER) + "\n";

    return { ok: true, record, fields, digest };
  }
}
