import { RegistryError, eventMeta, type EventBus, type Logger } from '@swiftlaunch/shared';
import { safeLoadApp, type App, type AppConfig, type AppExport } from '@swiftlaunch/app-sdk';

export { RegistryError } from '@swiftlaunch/shared';

export interface AppRegistryOptions {
  logger: Logger;
  eventBus: EventBus;
  /** App ids that are never constructed */
  disabled?: string[];
  /** Per-App configuration, keyed by App id */
  config?: Record<string, AppConfig>;
}

/** Apps a query is dispatched to, and the query they receive. */
export interface QueryRoute {
  apps: App[];
  query: string;
  /** Set when an App claimed the query through its exclusive prefix */
  owner: string | null;
}

/**
 * The fixed set of Apps, built once at startup.
 *
 * An App that fails to load is logged, reported as `AppExcluded` and left
 * out; the daemon starts without it.
 *
 * @example
 * ```typescript
 * const registry = await AppRegistry.load([launcherAppExport(deps), calculator], { logger, eventBus });
 * const { apps, query } = registry.route('=1+2');
 * ```
 */
export class AppRegistry {
  private readonly byId: Map<string, App>;

  private constructor(private readonly ordered: App[]) {
    this.byId = new Map(ordered.map((app) => [app.id, app]));
  }

  static async load(exports: AppExport[], options: AppRegistryOptions): Promise<AppRegistry> {
    const logger = options.logger.child({ component: 'registry' });
    const disabled = new Set(options.disabled ?? []);
    const apps: App[] = [];

    const exclude = async (appId: string, reason: string) => {
      await logger.warn(`Excluding app ${appId}: ${reason}`);
      await options.eventBus.emit({ ...eventMeta(), type: 'AppExcluded', payload: { appId, reason } });
    };

    for (const appExport of exports) {
      const manifestId = appExport.manifest.id;
      if (disabled.has(manifestId)) {
        await logger.info(`App ${manifestId} is disabled`);
        continue;
      }
      const result = await safeLoadApp(appExport, {
        logger: options.logger.child({ app: manifestId }),
        config: options.config?.[manifestId] ?? {},
      });
      if (!result.success) {
        await exclude(result.appId, result.error);
        continue;
      }
      const { app } = result;
      if (apps.some((existing) => existing.id === app.id)) {
        await exclude(app.id, new RegistryError(app.id, 'already registered').message);
        continue;
      }
      const clash = apps.find(
        (existing) => app.exclusivePrefix !== undefined && existing.exclusivePrefix === app.exclusivePrefix,
      );
      if (clash) {
        const reason = `prefix "${app.exclusivePrefix}" is already claimed by "${clash.id}"`;
        await exclude(app.id, new RegistryError(app.id, reason).message);
        continue;
      }
      apps.push(app);
      await logger.debug(`Registered app ${app.id}`);
    }

    return new AppRegistry(apps);
  }

  /** Registered Apps in registration order. */
  get apps(): readonly App[] {
    return this.ordered;
  }

  get(id: string): App | undefined {
    return this.byId.get(id);
  }

  searchApps(): App[] {
    return this.ordered.filter((app) => app.search !== undefined);
  }

  /**
   * A query starting with an App's exclusive prefix goes to that App alone,
   * prefix stripped; anything else goes to every search App.
   */
  route(query: string): QueryRoute {
    for (const app of this.ordered) {
      const prefix = app.exclusivePrefix;
      if (prefix && app.search && query.startsWith(prefix)) {
        return { apps: [app], query: query.slice(prefix.length), owner: app.id };
      }
    }
    return { apps: this.searchApps(), query, owner: null };
  }

  async shutdown(): Promise<void> {
    for (const app of this.ordered) {
      await app.shutdown?.();
    }
  }
}
