import {
  ConsoleLogger,
  EventHub,
  JsonlLogger,
  type Config,
  type Logger,
  type LoggingConfig,
} from '@swiftlaunch/shared';
import {
  CatalogIndexer,
  DirectoryWatcher,
  EntryScanner,
  FuzzyMatcher,
  IconResolver,
  IndexStore,
  type IndexerStatus,
  type ScanSummary,
  type WatchFn,
} from '@swiftlaunch/catalog';
import type { AppExport } from '@swiftlaunch/app-sdk';
import type { ResolvedPaths } from './config/loader';
import { ActionExecutor, type SpawnFn } from './exec/executor';
import { LaunchHistory } from './launcher/history';
import { launcherAppExport } from './launcher/launcher-app';
import { MaxScoreNormalizer } from './query/normalize';
import { SessionManager } from './query/session-manager';
import { AppRegistry } from './registry';

const EMPTY_QUERY_LIMIT = 20;

export interface LauncherDaemonOptions {
  config: Config;
  paths: ResolvedPaths;
  logger: Logger;
  eventBus?: EventHub;
  /** Apps registered after the built-in launcher App */
  apps?: AppExport[];
  spawn?: SpawnFn;
  watch?: WatchFn;
}

export interface DaemonStatus {
  uptimeMs: number;
  index: IndexerStatus;
  apps: string[];
  sessions: number;
  watched: string[];
}

/** Console logging, plus a JSON-lines event log when `logging.file` is set. */
export function createLogger(logging: LoggingConfig): Logger {
  if (logging.file) {
    return new JsonlLogger(logging.file, {}, logging.level);
  }
  return new ConsoleLogger(logging.level);
}

/**
 * Owns the process-wide pieces: the index and its indexer, the watcher, the
 * App registry and the open sessions. Everything is handed to its users
 * explicitly; nothing here is a module-level singleton.
 */
export class LauncherDaemon {
  readonly eventBus: EventHub;
  readonly store: IndexStore;
  readonly indexer: CatalogIndexer;
  readonly registry: AppRegistry;
  readonly sessions: SessionManager;
  private readonly watcher: DirectoryWatcher | null;
  private watched: string[] = [];
  private startedAt: number | null = null;

  private constructor(
    private readonly options: LauncherDaemonOptions,
    parts: {
      eventBus: EventHub;
      store: IndexStore;
      indexer: CatalogIndexer;
      registry: AppRegistry;
      watcher: DirectoryWatcher | null;
    },
  ) {
    this.eventBus = parts.eventBus;
    this.registry = parts.registry;
    this.store = parts.store;
    this.indexer = parts.indexer;
    this.watcher = parts.watcher;
    this.sessions = new SessionManager({
      registry: parts.registry,
      normalizer: new MaxScoreNormalizer(options.config.fanout.scoreCeiling),
      deadlineMs: options.config.fanout.deadlineMs,
      maxResults: options.config.fanout.maxResults,
      logger: options.logger.child({ component: 'session' }),
      eventBus: parts.eventBus,
    });
  }

  static async create(options: LauncherDaemonOptions): Promise<LauncherDaemon> {
    const { config, paths, logger } = options;
    const eventBus = options.eventBus ?? new EventHub(logger);
    const store = new IndexStore();

    const iconResolver = new IconResolver({
      dataDirs: paths.iconDataDirs,
      theme: config.launcher.iconTheme,
      size: config.launcher.iconSize,
    });
    const scanner = new EntryScanner({
      excludes: config.scanner.excludes,
      locale: config.scanner.locale,
      iconResolver,
    });
    const indexer = new CatalogIndexer({
      store,
      scanner,
      directories: paths.directories,
      logger,
      eventBus,
      cachePath: paths.cachePath ?? undefined,
      restartDelayMs: config.scanner.restartDelayMs,
      rescanIntervalMs: config.scanner.rescanIntervalMs,
    });

    const history = await LaunchHistory.load(paths.historyPath, logger);
    const launcher = launcherAppExport({
      store,
      matcher: new FuzzyMatcher(config.matcher),
      history,
      executor: new ActionExecutor({
        terminal: config.launcher.terminal,
        logger: logger.child({ component: 'executor' }),
        spawn: options.spawn,
      }),
      historyWeight: config.launcher.historyWeight,
      emptyQueryLimit: EMPTY_QUERY_LIMIT,
    });
    const registry = await AppRegistry.load([launcher, ...(options.apps ?? [])], {
      logger,
      eventBus,
      disabled: config.apps.disabled,
    });

    const watcher = config.scanner.watch
      ? new DirectoryWatcher({ debounceMs: config.scanner.watchDebounceMs, logger, watch: options.watch })
      : null;

    return new LauncherDaemon(options, { eventBus, store, indexer, registry, watcher });
  }

  /**
   * Starts watching, then runs the first scan. Watching starts first so no
   * change made during the scan goes unnoticed.
   */
  async start(): Promise<ScanSummary | null> {
    this.startedAt = Date.now();
    if (this.watcher) {
      this.watched = this.watcher.start(this.options.paths.directories, async (changes) => {
        await this.indexer.applyChanges(changes);
      });
    }
    const summary = await this.indexer.start();
    await this.options.logger.info(
      `Daemon ready: ${this.store.size} entries, apps ${this.registry.apps.map((app) => app.id).join(', ')}`,
    );
    return summary;
  }

  rescan(): Promise<ScanSummary | null> {
    return this.indexer.rescan();
  }

  status(): DaemonStatus {
    return {
      uptimeMs: this.startedAt === null ? 0 : Date.now() - this.startedAt,
      index: this.indexer.status(),
      apps: this.registry.apps.map((app) => app.id),
      sessions: this.sessions.size,
      watched: [...this.watched],
    };
  }

  async stop(): Promise<void> {
    this.sessions.closeAll();
    if (this.watcher) {
      await this.watcher.close();
    }
    await this.indexer.stop();
    await this.registry.shutdown();
    this.watched = [];
    this.startedAt = null;
  }
}
