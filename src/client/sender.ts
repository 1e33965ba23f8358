/**
 * Load-generating sender: numbered events at a fixed minimum interval
 */

import { formatEpoch } from "../record/clock.js";
import { OK, STOP_COMMAND } from "../ingest/protocol.js";
import type { LogSink } from "../utils/log-types.js";
import { sleep } from "../utils/timing.js";
import { LineClient } from "./line-client.js";

export interface SendOptions {
  host: string;
  port: number;
  srcId: string;
  subId: string;
  errorLevel: string;
  subLevel: string;
  count: number;
  /** Minimum seconds between transmissions */
  rateSeconds: number;
  /** Send !STOP! after the events */
  stop: boolean;
}

export interface SendSummary {
  sent: number;
  accepted: number;
  /** Replies other than OK, in order */
  rejected: string[];
}

/** Build the n-th (1-based) test event */
export function numberedEvent(options: Pick<SendOptions, "srcId" | "subId" | "errorLevel" | "subLevel">, n: number, epoch: number): string {
  return JSON.stringify({
    _id: options.srcId,
    _si: options.subId,
    _el: options.errorLevel,
    _sl: options.subLevel,
    _ts: formatEpoch(epoch),
    _msg: `n${String(n).padStart(3, "0")}`,
    n,
  });
}

export async function sendEvents(options: SendOptions, logger: LogSink): Promise<SendSummary> {
  const client = await LineClient.connect(options.host, options.port);
  const summary: SendSummary = { sent: 0, accepted: 0, rejected: [] };
  try {
    for (let n = 1; n <= options.count; n++) {
      const started = Date.now();
      const reply = await client.send(numberedEvent(options, n, started / 1000));
      summary.sent++;
      if (reply === OK) {
        summary.accepted++;
      } else {
        summary.rejected.push(reply);
        logger.warn(`rejected: ${reply}`, { records: n });
      }
      const remaining = options.rateSeconds * 1000 - (Date.now() - started);
      if (remaining > 0 && n < options.count) {
        await sleep(remaining);
      }
    }

    if (options.stop) {
      const reply = await client.send(STOP_COMMAND);
      logger.info(`stop reply: ${reply}`);
    }
  } finally {
    await client.close();
  }
  logger.info("send complete", { records: summary.sent, accepted: summary.accepted });
  return summary;
}
