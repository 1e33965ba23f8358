/**
 * Structured log entry types for JSONL output
 */

export interface LogEntry {
  ts: string; // ISO 8601 timestamp
  level: "debug" | "info" | "warn" | "error";
  msg: string;
  component?: "listener" | "normalizer" | "writer" | "daemon" | "config" | "cli" | "client";
  remote?: string; // Peer address, shortened by the configured ip prefix
  open?: number; // Open connections after the event
  total?: number; // Connections accepted so far
  path?: string; // Output file path
  records?: number;
  pending?: number; // Records still queued
  durationMs?: number;
  errorCode?: string; // e.g. "ECONNRESET", "EACCES"
  line?: string; // Offending inbound line
  [key: string]: unknown;
}

/** Context fields that can be bound to a child logger */
export type LogContext = Omit<Partial<LogEntry>, "ts" | "level" | "msg">;

/** Anything that takes leveled log calls; both Logger and ChildLogger qualify */
export interface LogSink {
  debug(msg: string, fields?: LogContext): void;
  info(msg: string, fields?: LogContext): void;
  warn(msg: string, fields?: LogContext): void;
  error(msg: string, fields?: LogContext): void;
}
