/**
 * Daemon: wires clock, normalizer, queue, writer and listener together and
 * owns the lifecycle from start to the end of the shutdown sequence
 */

import type { AddressInfo } from "node:net";
import type { Config } from "../config/types.js";
import { IngestListener } from "../ingest/listener.js";
import { Clock } from "../record/clock.js";
import { Normalizer } from "../record/normalizer.js";
import { RecordQueue } from "../store/queue.js";
import { RecordWriter } from "../store/writer.js";
import type { ChildLogger, Logger } from "../utils/logger.js";
import type { Viewer } from "../viewer/types.js";
import { markerRecord } from "./markers.js";
import { runShutdown, type ShutdownReport } from "./shutdown.js";
import { StopSignal } from "./stop-signal.js";

export interface DaemonOptions {
  config: Config;
  logger: Logger;
  /** Required when `config.viewer.enabled` */
  viewer?: Viewer;
  clock?: Clock;
  /** Writer's bounded queue wait */
  writerPollMs?: number;
  /** Listener's grace period for open connections at shutdown */
  closeGraceMs?: number;
  /** Receives one "." per flush when the viewer is off */
  progress?: (text: string) => void;
}

export class Daemon {
  readonly stop = new StopSignal();
  readonly clock: Clock;
  readonly queue = new RecordQueue();
  readonly normalizer: Normalizer;
  readonly writer: RecordWriter;
  readonly listener: IngestListener;

  private readonly config: Config;
  private readonly log: ChildLogger;
  private shutdownRun: Promise<ShutdownReport> | null = null;

  constructor(options: DaemonOptions) {
    const { config, logger } = options;
    this.config = config;
    this.log = logger.child({ component: "daemon" });

    const viewer = config.viewer.enabled ? options.viewer : undefined;
    if (config.viewer.enabled && !viewer) {
      throw new Error("viewer enabled but no viewer supplied");
    }

    this.clock = options.clock ?? new Clock();
    this.normalizer = new Normalizer(this.clock);

    const progress = options.progress;
    this.writer = new RecordWriter({
      queue: this.queue,
      clock: this.clock,
      pathTemplate: config.storage.pathTemplate,
      identity: config.storage.identity,
      logger: logger.child({ component: "writer" }),
      viewer,
      viewerTimeoutMs: config.viewer.timeoutMs,
      pollMs: options.writerPollMs,
      onFlush: viewer || !progress ? undefined : () => progress("."),
      onFatal: (error) => this.stop.trigger(`writer failed: ${error.message}`),
    });

    this.listener = new IngestListener({
      normalizer: this.normalizer,
      queue: this.queue,
      stop: this.stop,
      logger: logger.child({ component: "listener" }),
      ipPrefix: config.server.ipPrefix,
      closeGraceMs: options.closeGraceMs,
    });
  }

  /** Start the writer, record the "begins" marker and start listening */
  async start(): Promise<AddressInfo> {
    const { server, storage, viewer } = this.config;
    this.log.info("main begins", {
      path: storage.pathTemplate || undefined,
      verbose: viewer.enabled,
      ippfx: server.ipPrefix || undefined,
    });

    this.writer.start();

    const marker = markerRecord(this.normalizer, "begins");
    if (marker.ok) {
      this.queue.push(marker.record);
    } else {
      this.log.error(`cannot build begins marker: ${marker.reason}`);
    }

    try {
      return await this.listener.listen(server.port, server.host);
    } catch (err) {
      this.stop.trigger("listen failed");
      await this.shutdown();
      throw err;
    }
  }

  /** Wait for a stop trigger, then run the shutdown sequence */
  async run(): Promise<ShutdownReport> {
    const reason = await this.stop.wait();
    this.log.warn(`stopping: ${reason}`);
    return this.shutdown();
  }

  /** Run the shutdown sequence once; later calls share the first run */
  shutdown(): Promise<ShutdownReport> {
    this.stop.trigger("shutdown requested");
    if (!this.shutdownRun) {
      this.shutdownRun = runShutdown({
        listener: this.listener,
        normalizer: this.normalizer,
        queue: this.queue,
        writer: this.writer,
        logger: this.log,
        drainTimeoutMs: this.config.shutdown.drainTimeoutSeconds * 1000,
        stopTimeoutMs: this.config.shutdown.stopTimeoutSeconds * 1000,
      }).then((report) => {
        this.log.info("main ends", { pending: report.pending, stopped: report.writerStopped });
        return report;
      });
    }
    return this.shutdownRun;
  }
}
