/**
 * Drain-then-stop sequence
 */

import type { Normalizer } from "../record/normalizer.js";
import type { RecordQueue } from "../store/queue.js";
import type { RecordWriter } from "../store/writer.js";
import type { LogSink } from "../utils/log-types.js";
import { pollUntil } from "../utils/timing.js";
import { markerRecord } from "./markers.js";

/** Interval between queue-empty checks while draining */
const DRAIN_POLL_MS = 100;

export interface ShutdownParts {
  listener: { close(): Promise<void> };
  normalizer: Normalizer;
  queue: RecordQueue;
  writer: RecordWriter;
  logger: LogSink;
  drainTimeoutMs: number;
  stopTimeoutMs: number;
}

export interface ShutdownReport {
  /** Queue was empty before the writer was told to stop */
  drained: boolean;
  /** Writer acknowledged the stop in time */
  writerStopped: boolean;
  /** Records left in the queue at the end */
  pending: number;
}

/**
 * Stop the listener, enqueue the "ends" marker, wait for the queue to empty,
 * stop the writer, then close any file still open. Timeouts are reported and
 * the sequence carries on.
 */
export async function runShutdown(parts: ShutdownParts): Promise<ShutdownReport> {
  const { queue, writer, logger: log } = parts;

  log.warn("server shutdown");
  await parts.listener.close();

  const marker = markerRecord(parts.normalizer, "ends");
  if (marker.ok) {
    queue.push(marker.record);
  } else {
    log.error(`cannot build ends marker: ${marker.reason}`);
  }

  // A dead writer will never empty the queue; stop waiting on it
  await pollUntil(() => queue.isEmpty() || !writer.isRunning, parts.drainTimeoutMs, DRAIN_POLL_MS);
  const drained = queue.isEmpty();
  if (!drained) {
    log.error("writer did not empty its queue", { pending: queue.size });
  }

  const writerStopped = await writer.stop(parts.stopTimeoutMs);
  if (!writerStopped) {
    const failure = writer.error;
    if (failure) {
      log.error(`writer had already failed: ${failure.message}`);
    } else {
      log.error("writer didn't acknowledge stop request", { durationMs: parts.stopTimeoutMs });
    }
  }

  await writer.close();

  return { drained, writerStopped, pending: queue.size };
}
