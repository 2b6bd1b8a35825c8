/**
 * Error codes used throughout the launcher.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ParseError'
  | 'ScanError'
  | 'IndexError'
  | 'MatchTimeout'
  | 'CacheVersionMismatch'
  | 'ActionLaunchFailure'
  | 'RegistryError'
  | 'DaemonBindError'
  | 'IpcError'
  | 'UnknownError';

/**
 * Options for constructing a LauncherError.
 */
export interface LauncherErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all launcher errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new LauncherError('ScanError', 'Directory is unreadable', {
 *   cause: originalError,
 *   details: { directory: '/usr/share/applications' }
 * });
 * ```
 */
export class LauncherError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;

  constructor(code: ErrorCode, message: string, options: LauncherErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a descriptor file cannot be parsed.
 * The scanner skips the file and keeps going.
 */
export class ParseError extends LauncherError {
  /** Path of the descriptor that failed to parse */
  public readonly sourcePath: string;

  constructor(sourcePath: string, message: string, options: LauncherErrorOptions = {}) {
    super('ParseError', `${sourcePath}: ${message}`, options);
    this.sourcePath = sourcePath;
  }
}

/**
 * Error thrown when a source directory cannot be read.
 */
export class ScanError extends LauncherError {
  public readonly directory: string;

  constructor(directory: string, message: string, options: LauncherErrorOptions = {}) {
    super('ScanError', `${directory}: ${message}`, options);
    this.directory = directory;
  }
}

/**
 * Error thrown when an index mutation or snapshot access is invalid.
 */
export class IndexError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super('IndexError', message, options);
  }
}

/**
 * Raised when an App misses the fan-out deadline of a query round.
 */
export class MatchTimeoutError extends LauncherError {
  public readonly appId: string;
  public readonly deadlineMs: number;

  constructor(appId: string, deadlineMs: number, options: LauncherErrorOptions = {}) {
    super('MatchTimeout', `App "${appId}" exceeded the ${deadlineMs}ms round deadline`, options);
    this.appId = appId;
    this.deadlineMs = deadlineMs;
  }
}

/**
 * Raised when the persisted entry cache was written with another schema version.
 * Recoverable: the cache is discarded and a full rescan runs.
 */
export class CacheVersionMismatchError extends LauncherError {
  public readonly found: number;
  public readonly expected: number;

  constructor(found: number, expected: number, options: LauncherErrorOptions = {}) {
    super(
      'CacheVersionMismatch',
      `Unsupported cache schema version: found ${found}, expected ${expected}.`,
      options,
    );
    this.found = found;
    this.expected = expected;
  }
}

/**
 * Error thrown when an action could not be launched.
 */
export class ActionLaunchError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super('ActionLaunchFailure', message, options);
  }
}

/**
 * Error thrown when an App cannot be registered.
 */
export class RegistryError extends LauncherError {
  /** Id of the App that failed */
  public readonly appId: string;

  constructor(appId: string, message: string, options: LauncherErrorOptions = {}) {
    super('RegistryError', `App "${appId}": ${message}`, options);
    this.appId = appId;
  }
}

/**
 * Error thrown when the daemon cannot bind its IPC socket. Fatal for the daemon.
 */
export class DaemonBindError extends LauncherError {
  public readonly socketPath: string;

  constructor(socketPath: string, message: string, options: LauncherErrorOptions = {}) {
    super('DaemonBindError', message, options);
    this.socketPath = socketPath;
  }
}

/**
 * Error thrown for malformed IPC traffic or a lost daemon connection.
 */
export class IpcError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super('IpcError', message, options);
  }
}

/**
 * Normalizes any thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}
