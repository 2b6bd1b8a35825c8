import { toError } from '@swiftlaunch/shared';
import {
  findAction,
  type Entry,
  type FuzzyMatcher,
  type IndexStore,
  type MatchResult,
} from '@swiftlaunch/catalog';
import {
  SDK_VERSION,
  type ActionContext,
  type ActionOutcome,
  type App,
  type AppExport,
  type Candidate,
  type SearchContext,
} from '@swiftlaunch/app-sdk';
import type { ActionExecutor } from '../exec/executor';
import type { LaunchHistory } from './history';

export const LAUNCHER_APP_ID = 'launcher';

export interface LauncherAppOptions {
  store: IndexStore;
  matcher: FuzzyMatcher;
  history: LaunchHistory;
  executor: ActionExecutor;
  /** Multiplier applied to an entry's launch history before it is added to its score */
  historyWeight: number;
  /** Results listed for an empty query */
  emptyQueryLimit: number;
}

function toCandidate(entry: Entry, score: number, positions: readonly number[]): Candidate {
  const candidate: Candidate = {
    id: entry.id,
    title: entry.name,
    score,
    // positions index into the search text, which starts with the name
    positions: positions.filter((p) => p < entry.name.length),
    actions: entry.actions.map((action) => ({ id: action.id, label: action.label })),
  };
  const subtitle = entry.genericName ?? entry.description;
  if (subtitle !== undefined) candidate.subtitle = subtitle;
  if (entry.iconPath !== undefined) candidate.iconPath = entry.iconPath;
  return candidate;
}

function byName(a: Entry, b: Entry): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * The built-in App over the desktop-entry index: fuzzy search biased by
 * launch history, and launching of entry actions.
 */
export class LauncherApp implements App {
  readonly id = LAUNCHER_APP_ID;
  readonly search = { list: (query: string, ctx: SearchContext) => this.list(query, ctx) };
  readonly action = {
    act: (candidate: Candidate, actionId: string, ctx: ActionContext) => this.act(candidate, actionId, ctx),
  };

  constructor(private readonly options: LauncherAppOptions) {}

  private bias(entry: Entry): number {
    return this.options.historyWeight * this.options.history.bias(entry.id);
  }

  async list(query: string, ctx: SearchContext): Promise<Candidate[]> {
    if (query.trim() === '') {
      return this.listByHistory();
    }

    const outcome = await this.options.matcher.matchLatest(this.options.store, query.trim(), {
      token: ctx.token,
      bias: (entry) => this.bias(entry),
    });
    if (outcome.status === 'cancelled') {
      return [];
    }
    return outcome.results.map((result: MatchResult) => toCandidate(result.entry, result.score, result.positions));
  }

  private listByHistory(): Candidate[] {
    const snapshot = this.options.store.snapshot();
    try {
      return [...snapshot.entries]
        .sort((a, b) => this.bias(b) - this.bias(a) || byName(a, b))
        .slice(0, this.options.emptyQueryLimit)
        .map((entry) => toCandidate(entry, this.bias(entry), []));
    } finally {
      snapshot.release();
    }
  }

  async act(candidate: Candidate, actionId: string, ctx: ActionContext): Promise<ActionOutcome> {
    const entry = this.options.store.lookup(candidate.id);
    if (!entry) {
      return { status: 'failed', reason: `Entry "${candidate.id}" is no longer indexed` };
    }
    const action = findAction(entry, actionId);
    if (!action) {
      return { status: 'failed', reason: `Entry "${entry.id}" has no action "${actionId}"` };
    }

    const outcome = await this.options.executor.launch(entry, action);
    if (outcome.status === 'launched') {
      this.options.history.record(entry.id);
      try {
        await this.options.history.save();
      } catch (err) {
        await ctx.logger.warn(`Could not save launch history: ${toError(err).message}`);
      }
    }
    return outcome;
  }
}

export function launcherAppExport(options: LauncherAppOptions): AppExport<LauncherApp> {
  return {
    manifest: {
      id: LAUNCHER_APP_ID,
      sdkVersion: { minVersion: SDK_VERSION },
      capabilities: ['search', 'action'],
    },
    createApp: () => new LauncherApp(options),
  };
}
