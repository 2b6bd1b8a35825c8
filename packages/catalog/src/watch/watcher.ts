import { watch as fsWatch } from 'node:fs';
import path from 'node:path';
import { toError, type Logger } from '@swiftlaunch/shared';
import type { FileChange } from '../scanner/types';

export interface WatchHandle {
  close(): void;
}

/**
 * Starts watching one directory. `onEvent` receives paths relative to it.
 */
export type WatchFn = (
  directory: string,
  onEvent: (kind: FileChange['kind'], relativePath: string) => void,
  onError: (error: Error) => void,
) => WatchHandle;

export const nodeWatch: WatchFn = (directory, onEvent, onError) => {
  const watcher = fsWatch(directory, { recursive: true }, (eventType, filename) => {
    if (filename) {
      onEvent(eventType === 'rename' ? 'renamed' : 'modified', filename);
    }
  });
  watcher.on('error', onError);
  return watcher;
};

export interface DirectoryWatcherOptions {
  debounceMs: number;
  logger: Logger;
  watch?: WatchFn;
}

/**
 * Collects change notifications for a set of source directories and hands
 * them over in debounced batches. A batch holds each changed path once,
 * with the latest kind seen.
 */
export class DirectoryWatcher {
  private readonly watchFn: WatchFn;
  private readonly handles: WatchHandle[] = [];
  private pending = new Map<string, FileChange['kind']>();
  private timer: NodeJS.Timeout | null = null;
  private delivering: Promise<void> = Promise.resolve();

  constructor(private readonly options: DirectoryWatcherOptions) {
    this.watchFn = options.watch ?? nodeWatch;
  }

  /**
   * Watches every directory that can be watched; the others are logged and
   * left to the periodic rescan.
   * @returns the directories actually being watched
   */
  start(directories: string[], onBatch: (changes: FileChange[]) => Promise<void> | void): string[] {
    const watched: string[] = [];
    for (const directory of directories) {
      try {
        const handle = this.watchFn(
          directory,
          (kind, relativePath) => this.record(path.join(directory, relativePath), kind, onBatch),
          (error) => {
            void this.options.logger.warn(`Watching ${directory} failed: ${error.message}`);
          },
        );
        this.handles.push(handle);
        watched.push(directory);
      } catch (err) {
        void this.options.logger.warn(`Cannot watch ${directory}: ${toError(err).message}`);
      }
    }
    return watched;
  }

  /** Delivers whatever is pending right away. */
  flush(onBatch: (changes: FileChange[]) => Promise<void> | void): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.size === 0) return this.delivering;

    const changes = [...this.pending].map(([changedPath, kind]) => ({ path: changedPath, kind }));
    this.pending = new Map();
    this.delivering = this.delivering
      .then(() => onBatch(changes))
      .catch((err: unknown) => {
        void this.options.logger.error(toError(err), 'Applying watched changes failed');
      });
    return this.delivering;
  }

  async close(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    for (const handle of this.handles.splice(0)) {
      handle.close();
    }
    this.pending.clear();
    await this.delivering;
  }

  private record(
    changedPath: string,
    kind: FileChange['kind'],
    onBatch: (changes: FileChange[]) => Promise<void> | void,
  ): void {
    this.pending.set(changedPath, kind);
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.flush(onBatch);
    }, this.options.debounceMs);
  }
}
