/**
 * Ingestion listener: accepts TCP connections and runs the line protocol on each
 */

import { createServer, type AddressInfo, type Server, type Socket } from "node:net";
import { createInterface } from "node:readline";
import type { StopSignal } from "../daemon/stop-signal.js";
import type { Normalizer } from "../record/normalizer.js";
import type { RecordQueue } from "../store/queue.js";
import { errorCode } from "../utils/errors.js";
import type { LogEntry } from "../utils/log-types.js";
import type { ChildLogger } from "../utils/logger.js";
import { pollUntil } from "../utils/timing.js";
import { handleLine, peerIp, shortenAddress } from "./protocol.js";

/** How long close() lets peers finish before destroying their sockets */
const DEFAULT_CLOSE_GRACE_MS = 1000;

export interface IngestListenerOptions {
  normalizer: Normalizer;
  queue: RecordQueue;
  stop: StopSignal;
  logger: ChildLogger;
  ipPrefix?: string;
  closeGraceMs?: number;
}

/** Log level for a socket error, by errno code */
export function connectionFaultLevel(code: string | undefined): LogEntry["level"] {
  switch (code) {
    case "ECONNRESET":
      return "info";
    case "ECONNABORTED":
    case "EPIPE":
      return "warn";
    default:
      return "error";
  }
}

/** Where replies go; a `net.Socket` qualifies */
export interface ReplySink {
  write(text: string): boolean;
  once(event: "drain", listener: () => void): unknown;
}

/** Where lines come from; a readline interface qualifies */
export interface LineSource {
  pause(): unknown;
  resume(): unknown;
}

/**
 * Reply writer for one connection. When the socket buffer is full, line
 * reading pauses until the peer drains it.
 */
export function createReplyWriter(sink: ReplySink, source: LineSource): (reply: string) => void {
  let waiting = false;
  return (reply) => {
    if (sink.write(reply + "\n") || waiting) return;
    waiting = true;
    source.pause();
    sink.once("drain", () => {
      waiting = false;
      source.resume();
    });
  };
}

export class IngestListener {
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();
  private readonly options: IngestListenerOptions;
  private readonly log: ChildLogger;
  private accepting = true;
  private openCount = 0;
  private totalCount = 0;
  private closing: Promise<void> | null = null;

  constructor(options: IngestListenerOptions) {
    this.options = options;
    this.log = options.logger;
    this.server = createServer((socket) => this.handleConnection(socket));
  }

  /** Start listening; resolves with the bound address */
  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        this.server.on("error", (err) => {
          this.log.error(`listener error: ${err.message}`, { errorCode: errorCode(err) });
        });
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("listener has no TCP address"));
          return;
        }
        this.log.info(`listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /** Connections currently open */
  get openConnections(): number {
    return this.openCount;
  }

  /** Connections accepted since start */
  get totalConnections(): number {
    return this.totalCount;
  }

  /**
   * Stop accepting, half-close every open connection, and destroy whatever is
   * still open after the grace period.
   */
  close(graceMs: number = this.options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown(graceMs);
    }
    return this.closing;
  }

  private async shutdown(graceMs: number): Promise<void> {
    this.accepting = false;
    this.log.warn("listener shutdown", { open: this.openCount });
    const closed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });

    for (const socket of this.sockets) {
      socket.end();
    }
    const drained = await pollUntil(() => this.sockets.size === 0, graceMs, 50);
    if (!drained) {
      this.log.warn("destroying lingering connections", { open: this.sockets.size });
      for (const socket of this.sockets) {
        socket.destroy();
      }
    }

    await closed;
    this.log.warn("listener closed", { total: this.totalCount });
  }

  private handleConnection(socket: Socket): void {
    if (!this.accepting) {
      socket.destroy();
      return;
    }

    this.sockets.add(socket);
    this.openCount++;
    this.totalCount++;

    const ip = peerIp(socket.remoteAddress);
    const remote = `${shortenAddress(ip, this.options.ipPrefix ?? "")}:${socket.remotePort ?? "?"}`;
    const log = this.log.child({ remote });
    log.info("connection opened", { open: this.openCount, total: this.totalCount });

    const context = {
      normalizer: this.options.normalizer,
      queue: this.options.queue,
      stop: this.options.stop,
      logger: log,
    };

    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    const reply = createReplyWriter(socket, lines);

    lines.on("line", (line) => {
      if (!this.accepting) {
        log.warn("discarding line received after shutdown", { line });
        return;
      }
      const answer = handleLine(line, ip, context);
      if (answer !== null && socket.writable) {
        reply(answer);
      }
    });

    lines.on("error", (err: Error) => {
      log.debug(`line reader stopped: ${err.message}`);
    });

    socket.on("end", () => {
      log.info("no more rx");
    });

    socket.on("error", (err) => {
      const code = errorCode(err);
      const level = connectionFaultLevel(code);
      log[level](level === "error" ? `client error: ${err.message}` : "client dropped connection", { errorCode: code });
    });

    socket.on("close", () => {
      this.sockets.delete(socket);
      this.openCount--;
      lines.close();
      log.info("connection closed", { open: this.openCount });
    });
  }
}
