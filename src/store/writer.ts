/**
 * Persistence writer: the single consumer of the record queue and the only
 * owner of the output file handle
 */

import { mkdir, open, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import type { Clock, ClockSnapshot } from "../record/clock.js";
import { resolvePath } from "../record/path.js";
import { errorCode, errorMessage } from "../utils/errors.js";
import type { LogSink } from "../utils/log-types.js";
import { TimeoutError, withTimeout } from "../utils/timing.js";
import { decodeRecord } from "../viewer/decode.js";
import type { Viewer } from "../viewer/types.js";
import type { RecordQueue } from "./queue.js";

/** Default bounded wait on the queue before re-checking the stop flag */
const DEFAULT_POLL_MS = 1000;

/** Default bound on a single viewer call */
const DEFAULT_VIEWER_TIMEOUT_MS = 2000;

/** The writer could not create, open, write or sync its output file */
export class PersistenceError extends Error {
  constructor(
    message: string,
    readonly path: string | null,
    readonly errorCode?: string,
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}

export interface RecordWriterOptions {
  queue: RecordQueue;
  clock: Clock;
  /** Empty disables persistence; a viewer is then required */
  pathTemplate: string;
  identity: string;
  logger: LogSink;
  viewer?: Viewer;
  viewerTimeoutMs?: number;
  pollMs?: number;
  /** Called after each non-empty fsync with the number of records it covered */
  onFlush?: (count: number) => void;
  /** Called once if the writer dies on an error it cannot recover from */
  onFatal?: (error: Error) => void;
}

export class RecordWriter {
  private readonly queue: RecordQueue;
  private readonly clock: Clock;
  private readonly pathTemplate: string;
  private readonly identity: string;
  private readonly log: LogSink;
  private readonly viewer: Viewer | undefined;
  private readonly viewerTimeoutMs: number;
  private readonly pollMs: number;
  private readonly onFlush: ((count: number) => void) | undefined;
  private readonly onFatal: ((error: Error) => void) | undefined;

  private loop: Promise<void> | null = null;
  private stopRequested = false;
  private stopped = false;
  private failure: Error | null = null;

  // Rotation state
  private currentPath: string | null = null;
  private file: FileHandle | null = null;
  private lastCheck = Number.NEGATIVE_INFINITY;
  private sinceFlush = 0;
  private written = 0;

  constructor(options: RecordWriterOptions) {
    this.queue = options.queue;
    this.clock = options.clock;
    this.pathTemplate = options.pathTemplate;
    this.identity = options.identity;
    this.log = options.logger;
    this.viewer = options.viewer;
    this.viewerTimeoutMs = options.viewerTimeoutMs ?? DEFAULT_VIEWER_TIMEOUT_MS;
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
    this.onFlush = options.onFlush;
    this.onFatal = options.onFatal;
  }

  /** Start the consume loop; a second call is a no-op */
  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  /** True once the loop has exited through a stop request */
  get isStopped(): boolean {
    return this.stopped;
  }

  /** Set when the loop died on an unrecoverable error */
  get error(): Error | null {
    return this.failure;
  }

  /** True while the loop is consuming */
  get isRunning(): boolean {
    return this.loop !== null && !this.stopped && this.failure === null;
  }

  /** Path of the currently open file, if any */
  get openPath(): string | null {
    return this.file ? this.currentPath : null;
  }

  /** Records appended to files since start */
  get recordsWritten(): number {
    return this.written;
  }

  /** Ask the loop to exit at its next check; idempotent */
  requestStop(): void {
    this.stopRequested = true;
    this.queue.wake();
  }

  /**
   * Request a stop and wait up to `timeoutMs` for the loop to acknowledge it.
   * Resolves false if it did not.
   */
  async stop(timeoutMs: number): Promise<boolean> {
    this.requestStop();
    if (!this.loop) return true;
    try {
      await withTimeout(this.loop, timeoutMs, "writer stop");
    } catch (err) {
      if (err instanceof TimeoutError) return false;
      throw err;
    }
    return this.stopped;
  }

  /** Close any open file; safe to call at any time after the loop is done */
  async close(): Promise<void> {
    await this.closeFile();
    this.currentPath = null;
  }

  private async run(): Promise<void> {
    this.log.info("writer begins", { path: this.pathTemplate || undefined });
    try {
      for (;;) {
        if (this.stopRequested) {
          this.log.info("writer stopping", { records: this.written });
          await this.close();
          this.stopped = true;
          return;
        }
        const record = await this.queue.pop(this.pollMs);
        if (record === undefined) continue;
        await this.consume(record);
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.failure = error;
      this.log.error(`writer failed: ${error.message}`, {
        path: this.currentPath ?? undefined,
        errorCode: error instanceof PersistenceError ? error.errorCode : undefined,
        pending: this.queue.size,
      });
      await this.close();
      this.onFatal?.(error);
    } finally {
      this.log.info("writer ends");
    }
  }

  private async consume(record: string): Promise<void> {
    const now = this.clock.refresh();

    if (this.pathTemplate) {
      try {
        await this.persist(record, now);
      } catch (err) {
        // With a viewer the records still reach the operator; retry the file next time
        if (!(err instanceof PersistenceError) || !this.viewer) throw err;
        this.log.error(err.message, { path: err.path ?? undefined, errorCode: err.errorCode });
        await this.close();
      }
    } else if (!this.viewer) {
      throw new Error("no path template and no viewer: records have nowhere to go");
    }

    if (this.viewer) {
      await this.view(this.viewer, record);
    }
  }

  private async persist(record: string, now: ClockSnapshot): Promise<void> {
    // Rotation is evaluated at most once per elapsed second
    if (now.epoch - this.lastCheck >= 1) {
      this.lastCheck = now.epoch;
      await this.flush();
      const target = resolvePath(this.pathTemplate, now, this.identity);
      if (target !== this.currentPath) {
        await this.closeFile();
        this.currentPath = target;
        this.log.debug("rotation target changed", { path: target ?? undefined });
      }
    }

    const file = this.file ?? (await this.openFile());
    const line = record.endsWith("\n") ? record : record + "\n";
    try {
      await file.write(line);
    } catch (err) {
      throw new PersistenceError(`cannot write ${this.currentPath}: ${errorMessage(err)}`, this.currentPath, errorCode(err));
    }
    this.sinceFlush++;
    this.written++;
  }

  private async openFile(): Promise<FileHandle> {
    const path = this.currentPath;
    if (!path) {
      throw new PersistenceError("no output path resolved", null);
    }
    try {
      await mkdir(dirname(path), { recursive: true });
    } catch (err) {
      throw new PersistenceError(`cannot create directory for ${path}: ${errorMessage(err)}`, path, errorCode(err));
    }
    try {
      // Unbuffered appends: each record reaches the OS as soon as it is written
      this.file = await open(path, "a");
    } catch (err) {
      throw new PersistenceError(`cannot open ${path}: ${errorMessage(err)}`, path, errorCode(err));
    }
    this.log.info("opened log file", { path });
    return this.file;
  }

  private async flush(): Promise<void> {
    if (!this.file || this.sinceFlush === 0) return;
    const count = this.sinceFlush;
    try {
      await this.file.sync();
    } catch (err) {
      throw new PersistenceError(`cannot sync ${this.currentPath}: ${errorMessage(err)}`, this.currentPath, errorCode(err));
    }
    this.sinceFlush = 0;
    this.log.debug("flushed", { path: this.currentPath ?? undefined, records: count });
    this.onFlush?.(count);
  }

  private async closeFile(): Promise<void> {
    const file = this.file;
    if (!file) return;
    this.file = null;
    try {
      if (this.sinceFlush > 0) {
        await file.sync();
        this.onFlush?.(this.sinceFlush);
      }
      await file.close();
      this.log.info("closed log file", { path: this.currentPath ?? undefined });
    } catch (err) {
      this.log.error(`error closing ${this.currentPath}: ${errorMessage(err)}`, {
        path: this.currentPath ?? undefined,
        errorCode: errorCode(err),
      });
    } finally {
      this.sinceFlush = 0;
    }
  }

  private async view(viewer: Viewer, record: string): Promise<void> {
    try {
      const decoded = decodeRecord(record);
      await withTimeout(Promise.resolve(viewer(decoded)), this.viewerTimeoutMs, "viewer");
    } catch (err) {
      // Straight to the console: the logger may be what is failing
      console.error(`!! ${record.trimEnd()} !! ${errorMessage(err)} !!`);
    }
  }
}
