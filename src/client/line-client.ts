/**
 * Minimal client for the line protocol: write a line, read the reply line
 */

import { connect, type Socket } from "node:net";
import { createInterface, type Interface } from "node:readline";

interface PendingReply {
  resolve: (reply: string) => void;
  reject: (err: Error) => void;
}

export class LineClient {
  private readonly pending: PendingReply[] = [];
  private readonly lines: Interface;
  private closedError: Error | null = null;

  private constructor(private readonly socket: Socket) {
    this.lines = createInterface({ input: socket, crlfDelay: Infinity });
    this.lines.on("line", (line) => {
      this.pending.shift()?.resolve(line);
    });
    this.lines.on("error", (err: Error) => this.fail(err));
    socket.on("error", (err) => this.fail(err));
    socket.on("close", () => this.fail(new Error("connection closed")));
  }

  /** Open a connection */
  static connect(host: string, port: number): Promise<LineClient> {
    return new Promise((resolve, reject) => {
      const socket = connect({ host, port });
      socket.once("error", reject);
      socket.once("connect", () => {
        socket.off("error", reject);
        resolve(new LineClient(socket));
      });
    });
  }

  /** Write a line without waiting for a reply (empty lines get none) */
  write(line: string): void {
    this.socket.write(line + "\n");
  }

  /** Write a line and resolve with the server's reply */
  send(line: string): Promise<string> {
    if (this.closedError) return Promise.reject(this.closedError);
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
      this.write(line);
    });
  }

  /** End our side and wait for the socket to close */
  close(): Promise<void> {
    if (this.socket.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.end();
    });
  }

  private fail(err: Error): void {
    this.closedError ??= err;
    this.lines.close();
    for (const waiter of this.pending.splice(0)) {
      waiter.reject(err);
    }
  }
}
