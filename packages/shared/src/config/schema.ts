import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ScannerConfigSchema = z.object({
  /**
   * Source directories holding desktop entries, highest precedence first.
   * Defaults to the XDG `applications` directories when omitted.
   */
  directories: z.array(z.string()).optional(),
  /** Locale used to pick localized keys such as `Name[fr]`, e.g. "fr_FR" */
  locale: z.string().optional(),
  /** gitignore-style patterns, relative to each source directory, that are never indexed */
  excludes: z.array(z.string()).default([]),
  watch: z.boolean().default(true),
  watchDebounceMs: z.number().int().min(0).default(150),
  /** Periodic full rescan; 0 disables the timer */
  rescanIntervalMs: z.number().int().min(0).default(0),
  /** Delay before a failed scan task is retried with a full rescan */
  restartDelayMs: z.number().int().min(0).default(1000),
});

export const IndexConfigSchema = z.object({
  /** Persisted entry cache; defaults to `$XDG_CACHE_HOME/swiftlaunch/entries.bin` */
  cachePath: z.string().optional(),
  cacheEnabled: z.boolean().default(true),
});

export const MatcherConfigSchema = z.object({
  topK: z.number().int().min(1).default(50),
  chunkSize: z.number().int().min(1).default(256),
  /** Results scoring below this floor are never returned */
  minScore: z.number().default(1),
  /** How often a pass restarts after the index generation advanced under it */
  maxRestarts: z.number().int().min(0).default(8),
});

export const FanoutConfigSchema = z.object({
  deadlineMs: z.number().int().min(1).default(200),
  maxResults: z.number().int().min(1).default(50),
  /** Each App's best score maps to this value before results are interleaved */
  scoreCeiling: z.number().positive().default(1000),
});

export const LauncherConfigSchema = z.object({
  historyWeight: z.number().min(0).default(0.25),
  /** Launch history file; defaults to `$XDG_STATE_HOME/swiftlaunch/history.json` */
  historyPath: z.string().optional(),
  /** Command prefix for entries with `Terminal=true` */
  terminal: z.array(z.string()).min(1).default(['xterm', '-e']),
  iconTheme: z.string().default('hicolor'),
  iconSize: z.number().int().min(1).default(48),
});

export const AppsConfigSchema = z.object({
  disabled: z.array(z.string()).default([]),
});

export const DaemonConfigSchema = z.object({
  /** Defaults to `$XDG_RUNTIME_DIR/swiftlaunch.sock`, or a per-user path in the temp dir */
  socketPath: z.string().optional(),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  /** When set, structured events are appended to this JSON-lines file */
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scanner: ScannerConfigSchema.default({}),
  index: IndexConfigSchema.default({}),
  matcher: MatcherConfigSchema.default({}),
  fanout: FanoutConfigSchema.default({}),
  launcher: LauncherConfigSchema.default({}),
  apps: AppsConfigSchema.default({}),
  daemon: DaemonConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type MatcherConfig = z.infer<typeof MatcherConfigSchema>;
export type FanoutConfig = z.infer<typeof FanoutConfigSchema>;
export type LauncherConfig = z.infer<typeof LauncherConfigSchema>;
export type AppsConfig = z.infer<typeof AppsConfigSchema>;
export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Recursively optional version of a config shape, used for CLI flag overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends Array<infer U>
    ? Array<U>
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};
