import { MatchTimeoutError, toError, type CancellationToken, type Logger } from '@swiftlaunch/shared';
import type { App, Candidate } from '@swiftlaunch/app-sdk';
import type { ScoreNormalizer } from './normalize';

export interface FanoutOptions {
  sessionId: string;
  token: CancellationToken;
  deadlineMs: number;
  logger: Logger;
}

export interface AppAnswer {
  appId: string;
  candidates: Candidate[];
  durationMs: number;
}

export interface DroppedApp {
  appId: string;
  reason: 'timeout' | 'error';
  error: Error;
}

export type FanoutRound =
  | { status: 'completed'; answers: AppAnswer[]; dropped: DroppedApp[] }
  | { status: 'cancelled' };

/** One row of a merged round. `score` is on the shared scale. */
export interface MergedResult {
  appId: string;
  candidate: Candidate;
  score: number;
}

type Settled = { kind: 'answer'; candidates: Candidate[] } | { kind: 'error'; error: Error };

/**
 * Sends `query` to every App at once and waits until each has answered or
 * the round deadline passed, whichever is first. Answers arriving after the
 * deadline are discarded; the App is only dropped from this round.
 * Cancelling the token ends the wait early with a cancelled round.
 */
export async function fanOut(apps: readonly App[], query: string, options: FanoutOptions): Promise<FanoutRound> {
  const { token, deadlineMs } = options;
  if (token.isCancelled()) {
    return { status: 'cancelled' };
  }

  let deadlineTimer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'timeout'>((resolve) => {
    deadlineTimer = setTimeout(() => resolve('timeout'), deadlineMs);
  });
  let stopListening: () => void = () => {};
  const cancelled = new Promise<'cancelled'>((resolve) => {
    stopListening = token.onCancel(() => resolve('cancelled'));
  });

  const started = Date.now();
  const tasks = apps.map(async (app) => {
    const search = app.search;
    const settled: Promise<Settled> = search
      ? Promise.resolve()
          .then(() => search.list(query, { sessionId: options.sessionId, token, logger: options.logger }))
          .then(
            (candidates): Settled => ({ kind: 'answer', candidates }),
            (err: unknown): Settled => ({ kind: 'error', error: toError(err) }),
          )
      : Promise.resolve<Settled>({ kind: 'answer', candidates: [] });
    const outcome = await Promise.race([settled, deadline]);
    return { app, outcome, durationMs: Date.now() - started };
  });

  try {
    const all = await Promise.race([Promise.all(tasks), cancelled]);
    if (all === 'cancelled') {
      return { status: 'cancelled' };
    }

    const answers: AppAnswer[] = [];
    const dropped: DroppedApp[] = [];
    for (const { app, outcome, durationMs } of all) {
      if (outcome === 'timeout') {
        dropped.push({ appId: app.id, reason: 'timeout', error: new MatchTimeoutError(app.id, deadlineMs) });
      } else if (outcome.kind === 'error') {
        dropped.push({ appId: app.id, reason: 'error', error: outcome.error });
      } else {
        answers.push({ appId: app.id, candidates: outcome.candidates, durationMs });
      }
    }
    return { status: 'completed', answers, dropped };
  } finally {
    clearTimeout(deadlineTimer);
    stopListening();
  }
}

/**
 * Normalizes each App's scores and interleaves the answers into one list:
 * shared score descending, then App order, then the App's own order.
 */
export function mergeAnswers(
  answers: readonly AppAnswer[],
  normalizer: ScoreNormalizer,
  maxResults: number,
): MergedResult[] {
  const rows: { row: MergedResult; appIndex: number; rank: number }[] = [];
  answers.forEach((answer, appIndex) => {
    const scores = normalizer.normalize(answer.candidates.map((candidate) => candidate.score));
    answer.candidates.forEach((candidate, rank) => {
      rows.push({ row: { appId: answer.appId, candidate, score: scores[rank] }, appIndex, rank });
    });
  });

  rows.sort((a, b) => b.row.score - a.row.score || a.appIndex - b.appIndex || a.rank - b.rank);
  return rows.slice(0, maxResults).map(({ row }) => row);
}
