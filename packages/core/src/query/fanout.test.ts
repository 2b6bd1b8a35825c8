import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CancellationSource, ConsoleLogger, MatchTimeoutError } from '@swiftlaunch/shared';
import type { App, Candidate } from '@swiftlaunch/app-sdk';
import { fanOut, mergeAnswers } from './fanout';
import { MaxScoreNormalizer } from './normalize';

function candidate(id: string, score: number): Candidate {
  return { id, title: id, score, positions: [], actions: [] };
}

function delayedApp(id: string, delayMs: number, candidates: Candidate[]): App {
  return {
    id,
    search: {
      list: () => new Promise<Candidate[]>((resolve) => setTimeout(() => resolve(candidates), delayMs)),
    },
  };
}

describe('fanOut', () => {
  const logger = new ConsoleLogger('silent');

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('merges only the apps that answer before the deadline', async () => {
    const token = new CancellationSource().next();
    const fast = delayedApp('fast', 5, [candidate('a1', 10)]);
    const slow = delayedApp('slow', 500, [candidate('b1', 99)]);

    const pending = fanOut([fast, slow], 'fi', { sessionId: 's1', token, deadlineMs: 200, logger });
    await vi.advanceTimersByTimeAsync(200);
    const round = await pending;

    expect(round.status).toBe('completed');
    if (round.status !== 'completed') return;
    expect(round.answers.map((answer) => [answer.appId, answer.candidates])).toEqual([['fast', [candidate('a1', 10)]]]);
    expect(round.dropped).toHaveLength(1);
    expect(round.dropped[0].appId).toBe('slow');
    expect(round.dropped[0].reason).toBe('timeout');
    expect(round.dropped[0].error).toBeInstanceOf(MatchTimeoutError);
    expect(round.dropped[0].error.message).toBe('App "slow" exceeded the 200ms round deadline');
    await vi.advanceTimersByTimeAsync(300);
  });

  it('drops an app that fails without failing the round', async () => {
    const token = new CancellationSource().next();
    const broken: App = {
      id: 'broken',
      search: {
        list: () => {
          throw new Error('no network');
        },
      },
    };

    const pending = fanOut([broken, delayedApp('ok', 0, [candidate('x', 1)])], 'q', {
      sessionId: 's1',
      token,
      deadlineMs: 200,
      logger,
    });
    await vi.advanceTimersByTimeAsync(1);
    const round = await pending;

    expect(round.status === 'completed' && round.dropped.map((d) => [d.appId, d.reason, d.error.message])).toEqual([
      ['broken', 'error', 'no network'],
    ]);
    expect(round.status === 'completed' && round.answers.map((a) => a.appId)).toEqual(['ok']);
  });

  it('stops waiting as soon as the token is cancelled', async () => {
    const source = new CancellationSource();
    const token = source.next();

    const pending = fanOut([delayedApp('slow', 100, [candidate('a', 1)])], 'q', {
      sessionId: 's1',
      token,
      deadlineMs: 200,
      logger,
    });
    source.next();

    expect(await pending).toEqual({ status: 'cancelled' });
    expect(vi.getTimerCount()).toBe(1);
    await vi.advanceTimersByTimeAsync(100);
  });
});

describe('mergeAnswers', () => {
  it('interleaves apps on the shared scale', () => {
    const merged = mergeAnswers(
      [
        { appId: 'launcher', candidates: [candidate('files', 48), candidate('firefox', 24)], durationMs: 1 },
        { appId: 'calc', candidates: [candidate('sum', 3)], durationMs: 1 },
      ],
      new MaxScoreNormalizer(1000),
      10,
    );

    expect(merged.map((row) => [row.appId, row.candidate.id, row.score])).toEqual([
      ['launcher', 'files', 1000],
      ['calc', 'sum', 1000],
      ['launcher', 'firefox', 500],
    ]);
  });

  it('keeps at most maxResults rows', () => {
    const merged = mergeAnswers(
      [{ appId: 'launcher', candidates: [candidate('a', 3), candidate('b', 2), candidate('c', 1)], durationMs: 1 }],
      new MaxScoreNormalizer(),
      2,
    );

    expect(merged.map((row) => row.candidate.id)).toEqual(['a', 'b']);
  });
});
