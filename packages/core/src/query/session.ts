import {
  ActionLaunchError,
  CancellationSource,
  eventMeta,
  toError,
  type CancellationToken,
  type EventBus,
  type Logger,
} from '@swiftlaunch/shared';
import type { ActionOutcome } from '@swiftlaunch/app-sdk';
import type { AppRegistry } from '../registry';
import { fanOut, mergeAnswers, type MergedResult } from './fanout';
import type { ScoreNormalizer } from './normalize';

export type SessionStatus = 'idle' | 'pending' | 'completed' | 'cancelled';

/**
 * What the UI reads each frame. Results are replaced as a whole when a
 * round commits, so a view never holds a partly merged list.
 */
export interface SessionView {
  sessionId: string;
  status: SessionStatus;
  /** Latest query issued */
  query: string;
  /** Token generation of the latest query */
  token: number;
  /** Query the results belong to */
  resultsQuery: string | null;
  /**
   * Last committed list. While `status` is `pending` it may still belong to
   * an earlier query; compare `resultsQuery` with `query` before showing it.
   */
  results: readonly MergedResult[];
  selection: number;
  /** App that claimed the results through its prefix */
  owner: string | null;
  /** Last action failure, cleared by the next successful launch or new results */
  error: string | null;
}

export interface QueryCoordinatorOptions {
  sessionId: string;
  registry: AppRegistry;
  normalizer: ScoreNormalizer;
  deadlineMs: number;
  maxResults: number;
  logger: Logger;
  eventBus: EventBus;
}

/**
 * Per-session query state machine.
 *
 * Every input issues a new token and cancels the previous one; there is no
 * debounce. A round only commits while its token is still the session's
 * live token, so an older round can never overwrite a newer one.
 */
export class QueryCoordinator {
  private readonly source = new CancellationSource();
  private readonly logger: Logger;
  private state: SessionView;
  private closed = false;

  constructor(private readonly options: QueryCoordinatorOptions) {
    this.logger = options.logger.child({ session: options.sessionId });
    this.state = {
      sessionId: options.sessionId,
      status: 'idle',
      query: '',
      token: 0,
      resultsQuery: null,
      results: [],
      selection: 0,
      owner: null,
      error: null,
    };
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  view(): SessionView {
    return this.state;
  }

  /**
   * Issues `query` as a new round. Resolves once the round completed or was
   * cancelled, with the session view at that moment.
   */
  async input(query: string): Promise<SessionView> {
    if (this.closed) {
      return this.state;
    }
    const token = this.source.next();
    this.state = { ...this.state, status: 'pending', query, token: token.generation };

    const started = Date.now();
    const route = this.options.registry.route(query);
    const round = await fanOut(route.apps, route.query, {
      sessionId: this.options.sessionId,
      token,
      deadlineMs: this.options.deadlineMs,
      logger: this.logger,
    });

    if (round.status === 'completed') {
      for (const drop of round.dropped) {
        await this.logger.warn(`App ${drop.appId} dropped from round ${token.generation}: ${drop.error.message}`);
        await this.options.eventBus.emit({
          ...eventMeta(),
          type: 'AppRoundDropped',
          payload: {
            sessionId: this.options.sessionId,
            appId: drop.appId,
            reason: drop.reason,
            ...(drop.reason === 'error' ? { error: drop.error.message } : {}),
          },
        });
      }
    }

    if (round.status === 'cancelled' || !this.source.isCurrent(token)) {
      await this.reportCancelled(token, query);
      return this.state;
    }

    const results = mergeAnswers(round.answers, this.options.normalizer, this.options.maxResults);
    this.state = {
      ...this.state,
      status: 'completed',
      resultsQuery: query,
      results,
      selection: 0,
      owner: route.owner,
      error: null,
    };
    await this.options.eventBus.emit({
      ...eventMeta(),
      type: 'QueryCompleted',
      payload: {
        sessionId: this.options.sessionId,
        token: token.generation,
        query,
        resultCount: results.length,
        respondingApps: round.answers.map((answer) => answer.appId),
        durationMs: Date.now() - started,
      },
    });
    return this.state;
  }

  /** Cancels the pending round, if any, without issuing another. */
  cancel(): SessionView {
    if (this.state.status === 'pending') {
      this.source.cancel();
      this.state = { ...this.state, status: 'cancelled' };
    }
    return this.state;
  }

  /** Moves the selection cursor, clamped to the result list. */
  moveSelection(delta: number): SessionView {
    const last = Math.max(this.state.results.length - 1, 0);
    const selection = Math.min(Math.max(this.state.selection + delta, 0), last);
    this.state = { ...this.state, selection };
    return this.state;
  }

  /**
   * Runs an action on the selected result. Failures never throw; they are
   * recorded in the session view and returned.
   */
  async activate(actionId?: string): Promise<ActionOutcome> {
    const selected = this.state.results[this.state.selection];
    if (!selected) {
      return this.fail(null, null, actionId ?? 'default', 'Nothing is selected');
    }
    const { appId, candidate } = selected;
    const chosen = actionId ?? candidate.actions[0]?.id ?? 'default';
    const app = this.options.registry.get(appId);
    if (!app?.action) {
      return this.fail(appId, candidate.id, chosen, `App "${appId}" cannot run actions`);
    }

    let outcome: ActionOutcome;
    try {
      outcome = await app.action.act(candidate, chosen, { sessionId: this.options.sessionId, logger: this.logger });
    } catch (err) {
      outcome = { status: 'failed', reason: toError(err).message };
    }

    if (outcome.status === 'failed') {
      return this.fail(appId, candidate.id, chosen, outcome.reason);
    }
    this.state = { ...this.state, error: null };
    await this.options.eventBus.emit({
      ...eventMeta(),
      type: 'ActionLaunched',
      payload: { appId, entryId: candidate.id, actionId: chosen, pid: outcome.pid },
    });
    return outcome;
  }

  close(): void {
    this.closed = true;
    this.cancel();
  }

  private async fail(
    appId: string | null,
    entryId: string | null,
    actionId: string,
    reason: string,
  ): Promise<ActionOutcome> {
    this.state = { ...this.state, error: reason };
    await this.logger.error(new ActionLaunchError(reason), 'Action failed');
    if (appId && entryId) {
      await this.options.eventBus.emit({
        ...eventMeta(),
        type: 'ActionFailed',
        payload: { appId, entryId, actionId, reason },
      });
    }
    return { status: 'failed', reason };
  }

  private async reportCancelled(token: CancellationToken, query: string): Promise<void> {
    await this.logger.debug(`Round ${token.generation} for "${query}" cancelled`);
    await this.options.eventBus.emit({
      ...eventMeta(),
      type: 'QueryCancelled',
      payload: { sessionId: this.options.sessionId, token: token.generation, query },
    });
  }
}
