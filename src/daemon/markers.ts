/**
 * Lifecycle marker records, built through the normal normalizer path
 */

import { sourcePrefixed, type Normalizer } from "../record/normalizer.js";
import { LOCAL_SOURCE, type NormalizeResult } from "../record/types.js";

export type MarkerPhase = "begins" | "ends";

function two(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock time as YYYY-MM-DDTHH:MM:SS */
export function localIsoTime(at: Date): string {
  return (
    `${at.getFullYear()}-${two(at.getMonth() + 1)}-${two(at.getDate())}` +
    `T${two(at.getHours())}:${two(at.getMinutes())}:${two(at.getSeconds())}`
  );
}

/** Normalize a "main <phase> @ <time>" record attributed to the local sentinel source */
export function markerRecord(normalizer: Normalizer, phase: MarkerPhase, at: Date = new Date()): NormalizeResult {
  const event = {
    _id: "----",
    _si: "----",
    _el: 0,
    _sl: "_",
    _msg: `main ${phase} @ ${localIsoTime(at)}`,
  };
  return normalizer.normalize(sourcePrefixed(LOCAL_SOURCE, JSON.stringify(event)));
}
