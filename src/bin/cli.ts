#!/usr/bin/env node
/**
 * CLI entry point for stamplog
 */

import { createRequire } from "node:module";
import { loadConfig, getDefaultConfigPath, DEFAULTS } from "../config/loader.js";
import type { ConfigOverrides } from "../config/types.js";
import { sendEvents, type SendOptions } from "../client/sender.js";
import { Daemon } from "../daemon/daemon.js";
import type { ShutdownReport } from "../daemon/shutdown.js";
import { Logger } from "../utils/logger.js";
import { loadViewer } from "../viewer/loader.js";
import type { Viewer } from "../viewer/types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const HELP_TEXT = `stamplog - line-oriented TCP log ingestion daemon

Usage:
  stamplog [--config=<file>] [--host=<host>] [--port=<port>] [--ippfx=<pfx>]
           [--log-path=<template>] [--viewer=<module>] [-v | --verbose]
  stamplog send [--hp=<host:port>] [--srcid=<id>] [--subid=<id>] [--el=<n>]
                [--sl=<c>] [--count=<n>] [--rate=<seconds>] [--stop]
  stamplog (-h | --help | --version)

Options:
  --config=<file>        YAML config (default ~/.config/stamplog/config.yml)
  --host=<host>          Listen host.
  --port=<port>          Listen port.
  --ippfx=<pfx>          Address prefix stripped in diagnostic output.
  --log-path=<template>  Flat-file path template (~me~ ~y~ ~ym~ ~ymd~ ~h~ ~hm~ ~hms~).
  --viewer=<module>      Viewer module (default: console).
  -v --verbose           Render each record with the viewer instead of dots.
  -h --help              Show this help message.
  --version              Show version.
`;

/** Parsed `--name=value` options and bare flags */
interface ParsedArgs {
  values: Map<string, string>;
  flags: Set<string>;
}

function parseArgs(args: string[]): ParsedArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  for (const arg of args) {
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 2) {
      values.set(arg.slice(2, eq), arg.slice(eq + 1));
    } else {
      flags.add(arg);
    }
  }
  return { values, flags };
}

function intOption(parsed: ParsedArgs, name: string): number | undefined {
  const raw = parsed.values.get(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`--${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function rejectUnknown(parsed: ParsedArgs, values: string[], flags: string[]): void {
  for (const key of parsed.values.keys()) {
    if (!values.includes(key)) throw new Error(`Unknown option: --${key}`);
  }
  for (const flag of parsed.flags) {
    if (!flags.includes(flag)) throw new Error(`Unknown option: ${flag}`);
  }
}

/** Main CLI function */
async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.includes("--help") || rawArgs.includes("-h")) {
    process.stdout.write(HELP_TEXT);
    return;
  }
  if (rawArgs.includes("--version")) {
    process.stdout.write(`${version}\n`);
    return;
  }

  if (rawArgs[0] === "send") {
    await handleSendCommand(rawArgs.slice(1));
    return;
  }

  const parsed = parseArgs(rawArgs);
  rejectUnknown(parsed, ["config", "host", "port", "ippfx", "log-path", "viewer"], ["-v", "--verbose"]);

  const overrides: ConfigOverrides = {
    host: parsed.values.get("host"),
    port: intOption(parsed, "port"),
    ipPrefix: parsed.values.get("ippfx"),
    pathTemplate: parsed.values.get("log-path"),
    viewerModule: parsed.values.get("viewer"),
    verbose: parsed.flags.has("-v") || parsed.flags.has("--verbose"),
  };

  const { config, warnings } = await loadConfig(parsed.values.get("config") ?? getDefaultConfigPath(), overrides);
  const logger = new Logger(config.logging);
  const log = logger.child({ component: "cli" });

  for (const warning of warnings) {
    logger.warn(warning, { component: "config" });
  }

  let viewer: Viewer | undefined;
  if (config.viewer.enabled) {
    viewer = await loadViewer(config.viewer.module);
    log.info(`viewer: ${config.viewer.module}`);
  }

  const daemon = new Daemon({
    config,
    logger,
    viewer,
    progress: (text) => process.stdout.write(text),
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    log.warn(`received ${signal}`);
    daemon.stop.trigger(signal);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  let failed = false;
  let report: ShutdownReport;
  try {
    await daemon.start();
    report = await daemon.run();
  } catch (err) {
    // Unrecovered error in the control loop: still drain and close
    failed = true;
    log.error(`main: ${err instanceof Error ? err.message : String(err)}`);
    report = await daemon.shutdown();
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }

  process.exitCode = !failed && report.drained && report.writerStopped && !daemon.writer.error ? 0 : 1;
}

/** Handle the 'send' subcommand */
async function handleSendCommand(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  rejectUnknown(parsed, ["hp", "srcid", "subid", "el", "sl", "count", "rate"], ["--stop"]);

  const hp = parsed.values.get("hp") ?? `${DEFAULTS.server.host}:${DEFAULTS.server.port}`;
  const colon = hp.lastIndexOf(":");
  const port = Number(hp.slice(colon + 1));
  if (colon <= 0 || !Number.isInteger(port)) {
    throw new Error(`--hp must be host:port, got "${hp}"`);
  }

  const rate = Number(parsed.values.get("rate") ?? "0");
  if (!Number.isFinite(rate) || rate < 0) {
    throw new Error(`--rate must be a non-negative number of seconds`);
  }

  const options: SendOptions = {
    host: hp.slice(0, colon),
    port,
    srcId: parsed.values.get("srcid") ?? "____",
    subId: parsed.values.get("subid") ?? "____",
    errorLevel: parsed.values.get("el") ?? "_",
    subLevel: parsed.values.get("sl") ?? "_",
    count: intOption(parsed, "count") ?? 1,
    rateSeconds: rate,
    stop: parsed.flags.has("--stop"),
  };

  const logger = new Logger({ level: "info" });
  const summary = await sendEvents(options, logger.child({ component: "client" }));
  if (summary.rejected.length > 0) {
    process.exitCode = 1;
  }
}

// Run main function
main().catch((err) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
