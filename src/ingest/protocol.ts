/**
 * Line protocol: one reply per inbound line
 */

import type { StopSignal } from "../daemon/stop-signal.js";
import { sourcePrefixed, type Normalizer } from "../record/normalizer.js";
import type { RecordQueue } from "../store/queue.js";
import type { LogSink } from "../utils/log-types.js";

export const STOP_COMMAND = "!STOP!";
export const OK = "OK";

export interface ProtocolContext {
  normalizer: Normalizer;
  queue: RecordQueue;
  stop: StopSignal;
  logger: LogSink;
}

/** Reduce an IPv4-mapped IPv6 peer address to its IPv4 text */
export function peerIp(remoteAddress: string | undefined): string {
  if (!remoteAddress) return "";
  return remoteAddress.startsWith("::ffff:") ? remoteAddress.slice("::ffff:".length) : remoteAddress;
}

/** Strip the configured prefix for display */
export function shortenAddress(ip: string, prefix: string): string {
  return prefix && ip.startsWith(prefix) && ip.length > prefix.length ? ip.slice(prefix.length) : ip;
}

/**
 * Handle one line from `ip`. Returns the reply (without newline), or null
 * when the line gets none.
 */
export function handleLine(rawLine: string, ip: string, ctx: ProtocolContext): string | null {
  const line = rawLine.trimEnd();
  if (!line) return null;

  if (line === STOP_COMMAND) {
    ctx.logger.warn("stop requested by client");
    ctx.stop.trigger("stop command");
    return OK;
  }

  // Echo probe
  if (line.startsWith("!") && line.endsWith("!")) {
    return `${OK}|${line}`;
  }

  const submission = sourcePrefixed(ip, line);
  const result = ctx.normalizer.normalize(submission);
  if (!result.ok) {
    ctx.logger.error(`E: ${result.reason}`, { line: submission });
    return `E: ${result.reason}`;
  }

  ctx.queue.push(result.record);
  return OK;
}
