import path from 'node:path';
import { objectHash } from 'ohash';
import {
  CacheVersionMismatchError,
  SerialQueue,
  eventMeta,
  toError,
  type EventBus,
  type Logger,
} from '@swiftlaunch/shared';
import type { Entry } from '../entry';
import type { EntryScanner } from '../scanner';
import type { FileChange, IndexedSource, ScanRecord } from '../scanner/types';
import { EntryCache, loadEntryCache, saveEntryCache } from './cache';
import type { DeltaOp, IndexStore, IndexUpdate } from './store';

export interface CatalogIndexerOptions {
  store: IndexStore;
  scanner: EntryScanner;
  /** Source directories, highest precedence first */
  directories: string[];
  logger: Logger;
  eventBus: EventBus;
  /** Persisted entry cache; no cache when omitted */
  cachePath?: string;
  restartDelayMs?: number;
  /** Periodic full rescan; 0 disables it */
  rescanIntervalMs?: number;
}

export interface ScanSummary extends IndexUpdate {
  entries: number;
  reused: number;
  skipped: number;
  durationMs: number;
}

export interface ChangeSummary extends IndexUpdate {
  paths: number;
  skipped: number;
}

export interface IndexerStatus {
  generation: number;
  entries: number;
  directories: string[];
  pendingTasks: number;
  lastScan: ScanSummary | null;
  restartPending: boolean;
}

/**
 * Keeps an IndexStore in step with the source directories.
 *
 * All index writes go through one serial task queue. A task that throws is
 * logged, reported as `ScanTaskFailed`, and followed by a full rescan after
 * `restartDelayMs`; the daemon keeps running either way.
 */
export class CatalogIndexer {
  private readonly queue = new SerialQueue();
  private readonly cache = new EntryCache();
  private readonly logger: Logger;
  private readonly restartDelayMs: number;
  private restartTimer: NodeJS.Timeout | null = null;
  private rescanTimer: NodeJS.Timeout | null = null;
  private lastScan: ScanSummary | null = null;
  private stopped = false;

  constructor(private readonly options: CatalogIndexerOptions) {
    this.logger = options.logger.child({ component: 'indexer' });
    this.restartDelayMs = options.restartDelayMs ?? 1000;
  }

  /** Loads the persisted cache, runs the first full scan and arms the rescan timer. */
  async start(): Promise<ScanSummary | null> {
    this.stopped = false;
    await this.loadCache();
    const summary = await this.rescan();

    const interval = this.options.rescanIntervalMs ?? 0;
    if (interval > 0) {
      this.rescanTimer = setInterval(() => {
        void this.rescan();
      }, interval);
      this.rescanTimer.unref();
    }
    return summary;
  }

  /** Queues a full rescan. Resolves to null when the task failed. */
  rescan(): Promise<ScanSummary | null> {
    return this.supervise('full-scan', () => this.fullScan());
  }

  /** Queues an incremental rescan of the changed paths. Resolves to null when the task failed. */
  applyChanges(changes: FileChange[]): Promise<ChangeSummary | null> {
    return this.supervise('apply-changes', () => this.incremental(changes));
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.restartTimer) clearTimeout(this.restartTimer);
    if (this.rescanTimer) clearInterval(this.rescanTimer);
    this.restartTimer = null;
    this.rescanTimer = null;
    await this.queue.drain();
  }

  status(): IndexerStatus {
    return {
      generation: this.options.store.generation,
      entries: this.options.store.size,
      directories: this.options.directories,
      pendingTasks: this.queue.size,
      lastScan: this.lastScan,
      restartPending: this.restartTimer !== null,
    };
  }

  private supervise<T>(task: string, run: () => Promise<T>): Promise<T | null> {
    return this.queue.run(run).catch(async (err: unknown) => {
      const error = toError(err);
      await this.logger.error(error, `Scan task ${task} failed; full rescan in ${this.restartDelayMs}ms`);
      await this.options.eventBus.emit({
        ...eventMeta(),
        type: 'ScanTaskFailed',
        payload: { task, error: error.message, restartInMs: this.restartDelayMs },
      });
      this.scheduleRestart();
      return null;
    });
  }

  private scheduleRestart(): void {
    if (this.stopped || this.restartTimer) return;
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      void this.rescan();
    }, this.restartDelayMs);
    this.restartTimer.unref();
  }

  private async fullScan(): Promise<ScanSummary> {
    const started = Date.now();
    const { scanner, directories } = this.options;
    const next = new Map<string, Entry>();
    const seen = new EntryCache();
    let reused = 0;
    let skipped = 0;

    for await (const record of scanner.scan(directories, this.cache)) {
      switch (record.kind) {
        case 'entry':
          next.set(record.entry.id, record.entry);
          seen.set({
            sourcePath: record.entry.sourcePath,
            mtimeMs: record.entry.mtimeMs,
            outcome: { kind: 'entry', entry: record.entry },
          });
          if (record.reused) reused += 1;
          break;
        case 'hidden':
          seen.set({
            sourcePath: record.sourcePath,
            mtimeMs: record.mtimeMs,
            outcome: { kind: 'hidden', id: record.id, reason: record.reason },
          });
          if (record.reused) reused += 1;
          break;
        case 'invalid':
        case 'unreadable':
          skipped += record.kind === 'invalid' ? 1 : 0;
          await this.report(record);
          break;
        case 'vacant':
          break;
      }
    }

    const delta: DeltaOp[] = [];
    for (const [id, entry] of next) {
      const current = this.options.store.lookup(id);
      if (!current) {
        delta.push({ kind: 'add', entry });
      } else if (objectHash(current) !== objectHash(entry)) {
        delta.push({ kind: 'update', entry });
      }
    }
    const snapshot = this.options.store.snapshot();
    try {
      for (const entry of snapshot.entries) {
        if (!next.has(entry.id)) delta.push({ kind: 'remove', id: entry.id });
      }
    } finally {
      snapshot.release();
    }

    const update = await this.applyDelta(delta);

    this.cache.clear();
    for (const record of seen.list()) this.cache.set(record);
    await this.persistCache();

    const summary: ScanSummary = {
      ...update,
      entries: next.size,
      reused,
      skipped,
      durationMs: Date.now() - started,
    };
    this.lastScan = summary;
    await this.options.eventBus.emit({
      ...eventMeta(),
      type: 'ScanCompleted',
      payload: {
        directories: directories.length,
        entries: summary.entries,
        reused,
        skipped,
        durationMs: summary.durationMs,
      },
    });
    await this.logger.info(
      `Indexed ${summary.entries} entries (${reused} from cache, ${skipped} skipped) at generation ${summary.generation}`,
    );
    return summary;
  }

  private async incremental(changes: FileChange[]): Promise<ChangeSummary> {
    const { scanner, directories, store } = this.options;
    const paths = [...new Set(changes.map((change) => change.path))];
    for (const record of this.cache.list()) {
      if (paths.some((changed) => isAtOrBelow(changed, record.sourcePath))) this.cache.delete(record.sourcePath);
    }

    const snapshot = store.snapshot();
    let indexed: IndexedSource[];
    try {
      indexed = snapshot.entries.map(({ id, sourcePath }) => ({ id, sourcePath }));
    } finally {
      snapshot.release();
    }

    const delta: DeltaOp[] = [];
    let skipped = 0;

    for await (const record of scanner.scanPaths(directories, paths, this.cache, indexed)) {
      switch (record.kind) {
        case 'entry': {
          const { entry } = record;
          this.cache.set({ sourcePath: entry.sourcePath, mtimeMs: entry.mtimeMs, outcome: { kind: 'entry', entry } });
          const current = store.lookup(entry.id);
          if (!current) {
            delta.push({ kind: 'add', entry });
          } else if (objectHash(current) !== objectHash(entry)) {
            delta.push({ kind: 'update', entry });
          }
          break;
        }
        case 'hidden':
          this.cache.set({
            sourcePath: record.sourcePath,
            mtimeMs: record.mtimeMs,
            outcome: { kind: 'hidden', id: record.id, reason: record.reason },
          });
          if (store.lookup(record.id)) delta.push({ kind: 'remove', id: record.id });
          break;
        case 'vacant':
          if (store.lookup(record.id)) delta.push({ kind: 'remove', id: record.id });
          break;
        case 'invalid':
        case 'unreadable':
          skipped += record.kind === 'invalid' ? 1 : 0;
          await this.report(record);
          break;
      }
    }

    const update = await this.applyDelta(delta);
    return { ...update, paths: paths.length, skipped };
  }

  private async applyDelta(delta: DeltaOp[]): Promise<IndexUpdate> {
    const { store } = this.options;
    if (delta.length === 0) {
      return { generation: store.generation, added: 0, updated: 0, removed: 0 };
    }
    const generation = store.apply(delta);
    const update: IndexUpdate = {
      generation,
      added: delta.filter((op) => op.kind === 'add').length,
      updated: delta.filter((op) => op.kind === 'update').length,
      removed: delta.filter((op) => op.kind === 'remove').length,
    };
    await this.options.eventBus.emit({ ...eventMeta(), type: 'IndexUpdated', payload: update });
    await this.logger.debug(
      `Generation ${generation}: +${update.added} ~${update.updated} -${update.removed}`,
    );
    return update;
  }

  private async report(record: Extract<ScanRecord, { kind: 'invalid' | 'unreadable' }>): Promise<void> {
    if (record.kind === 'invalid') {
      await this.logger.warn(`Skipping ${record.error.message}`);
      await this.options.eventBus.emit({
        ...eventMeta(),
        type: 'EntrySkipped',
        payload: { sourcePath: record.sourcePath, reason: record.error.message },
      });
      return;
    }
    await this.logger.warn(`Skipping directory ${record.error.message}`);
    await this.options.eventBus.emit({
      ...eventMeta(),
      type: 'DirectorySkipped',
      payload: { directory: record.directory, reason: record.error.message },
    });
  }

  private async loadCache(): Promise<void> {
    const { cachePath, scanner, directories } = this.options;
    if (!cachePath) return;
    try {
      const file = await loadEntryCache(cachePath);
      if (!file) return;
      if (file.fingerprint !== scanner.fingerprint(directories)) {
        await this.discardCache(cachePath, 'scan settings changed');
        return;
      }
      for (const record of file.records) this.cache.set(record);
      await this.logger.debug(`Loaded ${file.records.length} cached descriptors from ${cachePath}`);
    } catch (err) {
      if (!(err instanceof CacheVersionMismatchError)) {
        await this.logger.warn(`Entry cache unusable: ${toError(err).message}`);
      }
      await this.discardCache(cachePath, toError(err).message);
    }
  }

  private async discardCache(cachePath: string, reason: string): Promise<void> {
    this.cache.clear();
    await this.logger.info(`Discarding entry cache ${cachePath}: ${reason}`);
    await this.options.eventBus.emit({
      ...eventMeta(),
      type: 'CacheDiscarded',
      payload: { cachePath, reason },
    });
  }

  private async persistCache(): Promise<void> {
    const { cachePath, scanner, directories } = this.options;
    if (!cachePath) return;
    try {
      await saveEntryCache(cachePath, {
        fingerprint: scanner.fingerprint(directories),
        writtenAt: Date.now(),
        records: this.cache.list(),
      });
    } catch (err) {
      await this.logger.warn(`Could not write entry cache ${cachePath}: ${toError(err).message}`);
    }
  }
}

function isAtOrBelow(changed: string, sourcePath: string): boolean {
  const relativePath = path.relative(changed, sourcePath);
  if (relativePath === '') return true;
  return relativePath !== '..' && !relativePath.startsWith('..' + path.sep) && !path.isAbsolute(relativePath);
}
