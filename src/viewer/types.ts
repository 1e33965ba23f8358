/**
 * Viewer collaborator: renders one persisted record to the operator console
 */

import type { LogEvent } from "../record/types.js";

/** A flat-file record decoded back into its prefix fields and payload */
export interface ViewerRecord {
  version: string;
  receivedAt: string;
  eventTs: string;
  id: string;
  subId: string;
  errorLevel: string;
  subLevel: string;
  digest: string;
  event: LogEvent;
}

/** Called once per record; may be async, but is only awaited for a bounded time */
export type Viewer = (record: ViewerRecord) => void | Promise<void>;
