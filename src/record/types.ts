/**
 * Record format shared by the normalizer, the writer and the viewer
 */

import type { LosslessNumber } from "lossless-json";

/** Field delimiter in both the inbound source prefix and the flat file */
export const FIELD_DELIMITER = "\t";

/** Flat-file format version tag */
export const FORMAT_VERSION = "1";

/** Source address used for records the daemon writes about itself */
export const LOCAL_SOURCE = "0.0.0.0";

/** JSON-compatible value as parsed from a submission; integers past 2^53 stay lossless */
export type JsonValue =
  | string
  | number
  | LosslessNumber
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Parsed submission; control keys are `_ip`, `_ts`, `_id`, `_si`, `_el`, `_sl` */
export type LogEvent = { [key: string]: JsonValue };

/** The prefix fields carried ahead of the JSON payload */
export interface ControlFields {
  receivedAt: string;
  eventTs: string;
  id: string;
  subId: string;
  errorLevel: string;
  subLevel: string;
}

/** Outcome of normalizing one source-prefixed line */
export type NormalizeResult =
  | { ok: true; record: string; fields: ControlFields; digest: string }
  | { ok: false; reason: string };
