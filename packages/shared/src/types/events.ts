/**
 * Base interface for all launcher events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted after a full scan of every source directory */
export interface ScanCompleted extends BaseEvent {
  type: 'ScanCompleted';
  payload: {
    directories: number;
    entries: number;
    /** Descriptors reused from the persisted cache without re-parsing */
    reused: number;
    skipped: number;
    durationMs: number;
  };
}

/** Emitted when a descriptor could not be parsed and was skipped */
export interface EntrySkipped extends BaseEvent {
  type: 'EntrySkipped';
  payload: {
    sourcePath: string;
    reason: string;
  };
}

/** Emitted when a source directory could not be read */
export interface DirectorySkipped extends BaseEvent {
  type: 'DirectorySkipped';
  payload: {
    directory: string;
    reason: string;
  };
}

/** Emitted whenever the index accepts a mutation */
export interface IndexUpdated extends BaseEvent {
  type: 'IndexUpdated';
  payload: {
    generation: number;
    added: number;
    updated: number;
    removed: number;
  };
}

/** Emitted when a queued scan task throws and the scanner is restarted */
export interface ScanTaskFailed extends BaseEvent {
  type: 'ScanTaskFailed';
  payload: {
    task: string;
    error: string;
    restartInMs: number;
  };
}

/** Emitted when the persisted entry cache is thrown away */
export interface CacheDiscarded extends BaseEvent {
  type: 'CacheDiscarded';
  payload: {
    cachePath: string;
    reason: string;
  };
}

/** Emitted when a query round delivered results to its session */
export interface QueryCompleted extends BaseEvent {
  type: 'QueryCompleted';
  payload: {
    sessionId: string;
    token: number;
    query: string;
    resultCount: number;
    respondingApps: string[];
    durationMs: number;
  };
}

/** Emitted when a query round was superseded before delivery */
export interface QueryCancelled extends BaseEvent {
  type: 'QueryCancelled';
  payload: {
    sessionId: string;
    token: number;
    query: string;
  };
}

/** Emitted when an App misses the round deadline or fails during a round */
export interface AppRoundDropped extends BaseEvent {
  type: 'AppRoundDropped';
  payload: {
    sessionId: string;
    appId: string;
    reason: 'timeout' | 'error';
    error?: string;
  };
}

/** Emitted after an action was handed to the process-spawn collaborator */
export interface ActionLaunched extends BaseEvent {
  type: 'ActionLaunched';
  payload: {
    appId: string;
    entryId: string;
    actionId: string;
    pid?: number;
  };
}

/** Emitted when an action could not be launched */
export interface ActionFailed extends BaseEvent {
  type: 'ActionFailed';
  payload: {
    appId: string;
    entryId: string;
    actionId: string;
    reason: string;
  };
}

/** Emitted when an App could not be constructed or was rejected at startup */
export interface AppExcluded extends BaseEvent {
  type: 'AppExcluded';
  payload: {
    appId: string;
    reason: string;
  };
}

/**
 * Union type of all launcher events.
 */
export type LauncherEvent =
  | ScanCompleted
  | EntrySkipped
  | DirectorySkipped
  | IndexUpdated
  | ScanTaskFailed
  | CacheDiscarded
  | QueryCompleted
  | QueryCancelled
  | AppRoundDropped
  | ActionLaunched
  | ActionFailed
  | AppExcluded;

export type LauncherEventType = LauncherEvent['type'];

/** Current schema version stamped on emitted events */
export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event; spread it into the event literal.
 *
 * @example
 * ```typescript
 * bus.emit({ ...eventMeta(), type: 'IndexUpdated', payload: { generation, added, updated, removed } });
 * ```
 */
export function eventMeta(now: Date = new Date()): Pick<BaseEvent, 'schemaVersion' | 'timestamp'> {
  return { schemaVersion: EVENT_SCHEMA_VERSION, timestamp: now.toISOString() };
}

/**
 * Interface for publishing launcher events.
 * Implementations can write to logs, forward to clients, etc.
 */
export interface EventBus {
  /**
   * Emit an event to all registered listeners.
   * @param event - The event to emit
   */
  emit(event: LauncherEvent): Promise<void> | void;
}
