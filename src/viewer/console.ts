/**
 * Built-in console viewer: one coloured line per record, coloured by `_el`
 */

import chalk from "chalk";
import { stringify } from "lossless-json";
import type { Viewer, ViewerRecord } from "./types.js";

/** Error level digit -> label and colour */
const LEVELS: Record<string, { label: string; paint: (text: string) => string }> = {
  "0": { label: "NULL", paint: (t) => chalk.dim(t) },
  "1": { label: "DEBUG", paint: (t) => chalk.dim.white(t) },
  "2": { label: "INFO", paint: (t) => chalk.cyan(t) },
  "3": { label: "WARN", paint: (t) => chalk.yellow(t) },
  "4": { label: "ERROR", paint: (t) => chalk.red(t) },
  "5": { label: "CRIT", paint: (t) => chalk.bgRed.white(t) },
};

const EXTRA = { label: "EXTRA", paint: (t: string) => chalk.magenta(t) };

/** Format a record for display */
export function formatViewerLine(record: ViewerRecord): string {
  const level = LEVELS[record.errorLevel] ?? EXTRA;
  const received = Number(record.receivedAt);
  const ts = Number.isFinite(received)
    ? chalk.dim.white(new Date(received * 1000).toLocaleTimeString("en-GB", { hour12: false }))
    : chalk.dim.white(record.receivedAt.trim());
  const msg = record.event._msg;
  const text = typeof msg === "string" ? msg : (stringify(msg ?? null) ?? "null");
  const source = chalk.blue(`[${record.event._ip ?? "?"}]`);
  return `${ts} ${level.paint(level.label.padEnd(5))} ${source} ${record.id} ${record.errorLevel} ${record.subLevel} ${text}`;
}

/** Create the console viewer; `write` defaults to stdout */
export function createConsoleViewer(write: (text: string) => void = (text) => process.stdout.write(text)): Viewer {
  return (record) => {
    write(formatViewerLine(record) + "\n");
  };
}
