/**
 * Canonical JSON: sorted keys, no whitespace, every non-ASCII code unit escaped.
 * Integers beyond the double range keep their exact digits end to end.
 */

import { isInteger, isLosslessNumber, isSafeNumber, LosslessNumber, parse } from "lossless-json";
import type { JsonValue } from "./types.js";

function escapeNonAscii(text: string): string {
  return text.replace(/[\u0080-\uffff]/g, (ch) => "\\u" + ch.charCodeAt(0).toString(16).padStart(4, "0"));
}

/** Unsafe integers stay as their digits; everything else is a plain number */
function parseNumber(text: string): number | LosslessNumber {
  return isInteger(text) && !isSafeNumber(text) ? new LosslessNumber(text) : parseFloat(text);
}

/** Parse JSON text without rounding large integers */
export function parseJson(text: string): unknown {
  return parse(text, null, parseNumber);
}

function serialize(value: JsonValue): string {
  if (Array.isArray(value)) {
    return "[" + value.map(serialize).join(",") + "]";
  }
  if (isLosslessNumber(value)) {
    return value.value;
  }
  if (value !== null && typeof value === "object") {
    const object = value;
    const keys = Object.keys(object).sort();
    return "{" + keys.map((key) => JSON.stringify(key) + ":" + serialize(object[key])).join(",") + "}";
  }
  return JSON.stringify(value);
}

export function canonicalJson(value: JsonValue): string {
  return escapeNonAscii(serialize(value));
}
