import type { LauncherEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Whether a message at `level` passes a logger configured with `minLevel`.
 */
export function isLevelEnabled(level: Exclude<LogLevel, 'silent'>, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Interface for logging throughout the launcher.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventMeta(), type: 'IndexUpdated', payload: { ... } });
 *
 * // Standard logging
 * logger.info('Scan finished');
 * logger.error(new Error('Failed'), 'Launch failed');
 *
 * // Create a child logger with additional context
 * const scanLogger = logger.child({ component: 'scanner' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured launcher event.
   */
  log(event: LauncherEvent): MaybePromise<void>;

  /**
   * High-signal event with a human-readable summary.
   */
  trace(event: LauncherEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, disabled unless verbose) */
  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
