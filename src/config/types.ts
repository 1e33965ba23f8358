/**
 * Configuration types for stamplog
 */

/** Listener configuration */
export interface ServerConfig {
  host: string;
  port: number;
  /** Address prefix stripped from peer addresses in diagnostic output only */
  ipPrefix: string;
}

/** Flat-file persistence configuration */
export interface StorageConfig {
  /**
   * Path template with ~me~, ~y~, ~ym~, ~ymd~, ~h~, ~hm~, ~hms~ placeholders.
   * Empty disables persistence (only valid with the viewer enabled).
   */
  pathTemplate: string;
  /** Process identity substituted for ~me~ */
  identity: string;
}

/** Console rendering configuration */
export interface ViewerConfig {
  enabled: boolean;
  /** "console" for the built-in viewer, otherwise a module path or specifier */
  module: string;
  /** Longest the writer waits on a single viewer call */
  timeoutMs: number;
}

/** Drain-then-stop bounds */
export interface ShutdownConfig {
  drainTimeoutSeconds: number;
  stopTimeoutSeconds: number;
}

/** Logging configuration */
export interface LoggingConfig {
  level: "debug" | "info" | "warn" | "error";
  /** Optional JSONL file for the daemon's own diagnostics */
  file?: string;
}

/** Complete configuration structure */
export interface Config {
  server: ServerConfig;
  storage: StorageConfig;
  viewer: ViewerConfig;
  shutdown: ShutdownConfig;
  logging: LoggingConfig;
}

/** Raw parsed YAML structure (before environment variable expansion) */
export interface RawConfig {
  server?: Partial<Record<keyof ServerConfig, unknown>>;
  storage?: Partial<Record<keyof StorageConfig, unknown>>;
  viewer?: Partial<Record<keyof ViewerConfig, unknown>>;
  shutdown?: Partial<Record<keyof ShutdownConfig, unknown>>;
  logging?: Partial<Record<keyof LoggingConfig, unknown>>;
}

/** Values given on the command line; they win over the file */
export interface ConfigOverrides {
  host?: string;
  port?: number;
  ipPrefix?: string;
  pathTemplate?: string;
  viewerModule?: string;
  verbose?: boolean;
}

/** Result of loading configuration */
export interface LoadedConfig {
  config: Config;
  warnings: string[];
}
