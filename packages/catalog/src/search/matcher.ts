import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { LRUCache, NEVER_CANCELLED, type CancellationToken } from '@swiftlaunch/shared';
import type { Entry } from '../entry';
import type { Snapshot } from '../indexing/store';
import { countBoundaries, foldCase, fuzzyScore, isSubsequence, upperBound } from './score';
import { TopK } from './top-k';

export interface MatchResult {
  entry: Entry;
  score: number;
  /** Matched character indices into `entry.searchText` */
  positions: number[];
}

export interface MatcherOptions {
  topK: number;
  chunkSize: number;
  /** Results scoring below this are dropped */
  minScore: number;
  /** Restarts allowed when the index moves on mid-pass; the last pass then finishes on its snapshot */
  maxRestarts: number;
}

export interface MatchRequest {
  token?: CancellationToken;
  /** Added to each entry's score; must not depend on the query */
  bias?: (entry: Entry) => number;
  /** Overrides `topK` for this request */
  limit?: number;
}

export type MatchOutcome =
  | { status: 'completed'; generation: number; results: MatchResult[]; restarts: number }
  | { status: 'cancelled' };

type PassOutcome =
  | { status: 'completed'; generation: number; results: MatchResult[] }
  | { status: 'cancelled' }
  | { status: 'stale' };

/** Anything that hands out snapshots and reports its current generation. */
export interface SnapshotSource {
  readonly generation: number;
  snapshot(): Snapshot;
}

interface Prepared {
  folded: string;
  boundaries: number;
}

const DEFAULT_OPTIONS: MatcherOptions = { topK: 50, chunkSize: 256, minScore: 1, maxRestarts: 8 };

/**
 * Ranking order: score descending, then shorter search text, then name,
 * then id, so equal inputs always give equal output.
 */
export function compareResults(a: MatchResult, b: MatchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  const lengthDiff = a.entry.searchText.length - b.entry.searchText.length;
  if (lengthDiff !== 0) return lengthDiff;
  if (a.entry.name !== b.entry.name) return a.entry.name < b.entry.name ? -1 : 1;
  if (a.entry.id !== b.entry.id) return a.entry.id < b.entry.id ? -1 : 1;
  return 0;
}

/**
 * Ranks snapshot entries against a query.
 *
 * A pass walks the snapshot in chunks of `chunkSize` entries and yields to
 * the event loop between chunks; that is where cancellation and index
 * generation changes are noticed. Only the best `topK` results are kept, and
 * an entry whose best possible score cannot reach the current worst kept
 * result is not scored at all.
 */
export class FuzzyMatcher {
  private readonly options: MatcherOptions;
  private readonly prepared = new WeakMap<Entry, Prepared>();
  /** Per snapshot: query -> entries the query is a subsequence of */
  private readonly candidates = new WeakMap<readonly Entry[], LRUCache<string, readonly Entry[]>>();

  constructor(options: Partial<MatcherOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Lazily yields every match of `query` in the snapshot, in id order and
   * unranked. Iterating again starts over.
   */
  *scan(snapshot: Snapshot, query: string): Generator<MatchResult> {
    for (const entry of snapshot.entries) {
      const scored = fuzzyScore(query, entry.searchText);
      if (scored && scored.score >= this.options.minScore) {
        yield { entry, score: scored.score, positions: scored.positions };
      }
    }
  }

  /** One ranked pass over a snapshot the caller holds. */
  async match(snapshot: Snapshot, query: string, request: MatchRequest = {}): Promise<MatchOutcome> {
    const outcome = await this.pass(snapshot, query, request, () => false);
    return outcome.status === 'completed' ? { ...outcome, restarts: 0 } : { status: 'cancelled' };
  }

  /**
   * Ranked pass against the newest generation of `source`. When the
   * generation advances while the pass is running, the pass is dropped and
   * started over on a fresh snapshot, at most `maxRestarts` times.
   */
  async matchLatest(source: SnapshotSource, query: string, request: MatchRequest = {}): Promise<MatchOutcome> {
    let restarts = 0;
    for (;;) {
      const snapshot = source.snapshot();
      try {
        const mayRestart = restarts < this.options.maxRestarts;
        const outcome = await this.pass(
          snapshot,
          query,
          request,
          () => mayRestart && source.generation !== snapshot.generation,
        );
        if (outcome.status === 'stale') {
          restarts += 1;
          continue;
        }
        return outcome.status === 'completed' ? { ...outcome, restarts } : outcome;
      } finally {
        snapshot.release();
      }
    }
  }

  private async pass(
    snapshot: Snapshot,
    query: string,
    request: MatchRequest,
    isStale: () => boolean,
  ): Promise<PassOutcome> {
    const token = request.token ?? NEVER_CANCELLED;
    if (token.isCancelled()) return { status: 'cancelled' };
    if (query.length === 0) {
      return { status: 'completed', generation: snapshot.generation, results: [] };
    }

    const foldedQuery = foldCase(query);
    const pool = this.candidatePool(snapshot, query);
    const matched: Entry[] = [];
    const top = new TopK<MatchResult>(request.limit ?? this.options.topK, compareResults);
    const { chunkSize, minScore } = this.options;

    for (let start = 0; start < pool.length; start += chunkSize) {
      if (start > 0) {
        await yieldToEventLoop();
        if (token.isCancelled()) return { status: 'cancelled' };
        if (isStale()) return { status: 'stale' };
      }

      const end = Math.min(start + chunkSize, pool.length);
      for (let i = start; i < end; i++) {
        const entry = pool[i];
        const prepared = this.prepare(entry);
        if (!isSubsequence(foldedQuery, prepared.folded)) continue;
        matched.push(entry);

        const bias = request.bias ? request.bias(entry) : 0;
        const worst = top.threshold();
        if (worst && upperBound(query.length, prepared.boundaries) + bias < worst.score) continue;

        const scored = fuzzyScore(query, entry.searchText);
        if (!scored) continue;
        const score = scored.score + bias;
        if (score < minScore) continue;
        top.offer({ entry, score, positions: scored.positions });
      }
    }

    if (token.isCancelled()) return { status: 'cancelled' };
    if (isStale()) return { status: 'stale' };

    this.rememberCandidates(snapshot, query, matched);
    return { status: 'completed', generation: snapshot.generation, results: top.sorted() };
  }

  /**
   * Entries worth looking at: if an earlier query on this snapshot was a
   * prefix of this one, only its matches can match now.
   */
  private candidatePool(snapshot: Snapshot, query: string): readonly Entry[] {
    const all = snapshot.entries;
    const remembered = this.candidates.get(all);
    if (remembered) {
      for (let length = query.length; length > 0; length--) {
        const hit = remembered.get(query.slice(0, length));
        if (hit) return hit;
      }
    }
    return all;
  }

  private rememberCandidates(snapshot: Snapshot, query: string, matched: Entry[]): void {
    const all = snapshot.entries;
    let remembered = this.candidates.get(all);
    if (!remembered) {
      remembered = new LRUCache(16);
      this.candidates.set(all, remembered);
    }
    remembered.set(query, matched);
  }

  private prepare(entry: Entry): Prepared {
    let prepared = this.prepared.get(entry);
    if (!prepared) {
      prepared = { folded: foldCase(entry.searchText), boundaries: countBoundaries(entry.searchText) };
      this.prepared.set(entry, prepared);
    }
    return prepared;
  }
}
