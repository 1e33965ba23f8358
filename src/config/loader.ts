/**
 * Configuration loader for stamplog
 * Handles YAML parsing, environment variable expansion, and validation
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { hasTimePlaceholder } from "../record/path.js";
import type {
  Config,
  ConfigOverrides,
  LoadedConfig,
  LoggingConfig,
  RawConfig,
  ServerConfig,
  ShutdownConfig,
  StorageConfig,
  ViewerConfig,
} from "./types.js";

// Valid log levels
const VALID_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

/** Default configuration values */
export const DEFAULTS: Config = {
  server: {
    host: "127.0.0.1",
    port: 12321,
    ipPrefix: "",
  },
  storage: {
    pathTemplate: "",
    identity: "stamplog",
  },
  viewer: {
    enabled: false,
    module: "console",
    timeoutMs: 2000,
  },
  shutdown: {
    drainTimeoutSeconds: 10,
    stopTimeoutSeconds: 10,
  },
  logging: {
    level: "info",
  },
};

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Expand environment variables in a string
 * Supports ${VAR} and ${VAR:-default} syntax
 */
export function expandEnvVars(str: string): string {
  return str.replace(/\$\{([^}:]+)(:-([^}]*))?\}/g, (_match, name: string, _group, defaultValue?: string) => {
    return process.env[name] ?? defaultValue ?? "";
  });
}

/**
 * Get the default configuration file path
 */
export function getDefaultConfigPath(): string {
  const home = process.env.HOME ?? "";
  return join(home, ".config", "stamplog", "config.yml");
}

/**
 * Load configuration from a YAML file, then apply command-line overrides
 */
export async function loadConfig(
  filePath: string = getDefaultConfigPath(),
  overrides: ConfigOverrides = {},
): Promise<LoadedConfig> {
  let raw: RawConfig = {};

  // Load from file if exists
  if (existsSync(filePath)) {
    let parsed: unknown;
    try {
      const content = await readFile(filePath, "utf-8");
      parsed = parseYaml(content);
    } catch (error) {
      throw new Error(`Failed to parse config file at ${filePath}: ${error}`);
    }
    raw = toRawConfig(parsed);
  }

  return mergeAndValidateConfig(raw, overrides);
}

/** Narrow parsed YAML to the sections we read; anything else is ignored */
function toRawConfig(parsed: unknown): RawConfig {
  if (!isRecord(parsed)) return {};
  const section = (key: string): Section | undefined => {
    const value = parsed[key];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) {
      throw new Error(`Invalid config section "${key}": must be a mapping`);
    }
    return value;
  };
  return {
    server: section("server"),
    storage: section("storage"),
    viewer: section("viewer"),
    shutdown: section("shutdown"),
    logging: section("logging"),
  };
}

/**
 * Merge raw config with defaults and overrides, then validate
 */
export function mergeAndValidateConfig(raw: RawConfig, overrides: ConfigOverrides = {}): LoadedConfig {
  const config: Config = {
    server: mergeServerConfig(raw.server, overrides),
    storage: mergeStorageConfig(raw.storage, overrides),
    viewer: mergeViewerConfig(raw.viewer, overrides),
    shutdown: mergeShutdownConfig(raw.shutdown),
    logging: mergeLoggingConfig(raw.logging),
  };

  const warnings = validateConfig(config);

  return { config, warnings };
}

function readString(raw: Section | undefined, key: string, fallback: string): string {
  const value = raw?.[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw new Error(`Invalid ${key}: must be a string.`);
  }
  return expandEnvVars(value);
}

function readNumber(raw: Section | undefined, key: string, fallback: number): number {
  const value = raw?.[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(expandEnvVars(value));
    if (Number.isFinite(parsed)) return parsed;
  }
  if (value === undefined || value === null) return fallback;
  throw new Error(`Invalid ${key}: ${String(value)}. Must be a number.`);
}

function readBoolean(raw: Section | undefined, key: string, fallback: boolean): boolean {
  const value = raw?.[key];
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lowered = expandEnvVars(value).trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(lowered)) return true;
    if (["0", "false", "no", "off", ""].includes(lowered)) return false;
  }
  if (value === undefined || value === null) return fallback;
  throw new Error(`Invalid ${key}: ${String(value)}. Must be a boolean.`);
}

function mergeServerConfig(raw: Section | undefined, overrides: ConfigOverrides): ServerConfig {
  const port = overrides.port ?? readNumber(raw, "port", DEFAULTS.server.port);

  // Validate port is in valid range and is an integer
  if (!Number.isInteger(port)) {
    throw new Error(`Invalid port: ${port}. Must be an integer.`);
  }
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${port}. Must be between 1 and 65535.`);
  }

  const host = overrides.host ?? readString(raw, "host", DEFAULTS.server.host);
  if (host.length === 0) {
    throw new Error(`Invalid host: must be a non-empty string.`);
  }

  return {
    host,
    port,
    ipPrefix: overrides.ipPrefix ?? readString(raw, "ipPrefix", DEFAULTS.server.ipPrefix),
  };
}

function mergeStorageConfig(raw: Section | undefined, overrides: ConfigOverrides): StorageConfig {
  const identity = readString(raw, "identity", DEFAULTS.storage.identity);
  if (identity.length === 0) {
    throw new Error(`Invalid identity: must be a non-empty string.`);
  }
  return {
    pathTemplate: overrides.pathTemplate ?? readString(raw, "pathTemplate", DEFAULTS.storage.pathTemplate),
    identity,
  };
}

function mergeViewerConfig(raw: Section | undefined, overrides: ConfigOverrides): ViewerConfig {
  const module = overrides.viewerModule ?? readString(raw, "module", DEFAULTS.viewer.module);
  if (module.length === 0) {
    throw new Error(`Invalid viewer module: must be a non-empty string.`);
  }

  const timeoutMs = readNumber(raw, "timeoutMs", DEFAULTS.viewer.timeoutMs);
  if (!Number.isInteger(timeoutMs)) {
    throw new Error(`Invalid viewer timeoutMs: ${timeoutMs}. Must be an integer.`);
  }
  if (timeoutMs < 1 || timeoutMs > 60_000) {
    throw new Error(`Invalid viewer timeoutMs: ${timeoutMs}. Must be between 1 and 60000.`);
  }

  return {
    enabled: overrides.verbose || readBoolean(raw, "enabled", DEFAULTS.viewer.enabled),
    module,
    timeoutMs,
  };
}

function mergeShutdownConfig(raw: Section | undefined): ShutdownConfig {
  const bounded = (key: keyof ShutdownConfig): number => {
    const value = readNumber(raw, key, DEFAULTS.shutdown[key]);
    if (value < 0 || value > 300) {
      throw new Error(`Invalid ${key}: ${value}. Must be between 0 and 300.`);
    }
    return value;
  };

  return {
    drainTimeoutSeconds: bounded("drainTimeoutSeconds"),
    stopTimeoutSeconds: bounded("stopTimeoutSeconds"),
  };
}

function isLogLevel(value: string): value is LoggingConfig["level"] {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

function mergeLoggingConfig(raw: Section | undefined): LoggingConfig {
  const level = readString(raw, "level", DEFAULTS.logging.level);

  // Validate log level
  if (!isLogLevel(level)) {
    throw new Error(`Invalid logging level: ${level}. Must be one of: ${VALID_LOG_LEVELS.join(", ")}`);
  }

  const file = readString(raw, "file", "");
  return file ? { level, file } : { level };
}

/**
 * Validate the complete configuration; returns non-fatal warnings
 */
function validateConfig(config: Config): string[] {
  const warnings: string[] = [];

  if (!config.storage.pathTemplate && !config.viewer.enabled) {
    throw new Error("No storage.pathTemplate and viewer disabled: records would have nowhere to go.");
  }

  if (config.storage.pathTemplate && !hasTimePlaceholder(config.storage.pathTemplate)) {
    warnings.push(`storage.pathTemplate "${config.storage.pathTemplate}" has no time placeholder; file never rotates.`);
  }

  return warnings;
}
