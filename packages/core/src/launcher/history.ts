import fs from 'fs/promises';
import { z } from 'zod';
import { atomicWrite, toError, type Logger } from '@swiftlaunch/shared';

const HISTORY_VERSION = 1;

const HistoryFileSchema = z.object({
  version: z.literal(HISTORY_VERSION),
  scores: z.record(z.number().int().min(0)),
});

const BUMP_ALPHA = 0.5;
const BUMP_INCREMENT = 100;
const DECAY_ALPHA = 0.1;

/** Exponential moving average towards 100. */
export function bumpHistoryValue(value: number): number {
  return Math.trunc(BUMP_ALPHA * BUMP_INCREMENT + (1 - BUMP_ALPHA) * value);
}

/** Exponential moving average towards 0. */
export function decayHistoryValue(value: number): number {
  return Math.trunc((1 - DECAY_ALPHA) * value);
}

/**
 * Per-entry launch bias. Launching an entry bumps its score and decays
 * every other one; entries decayed to zero are forgotten.
 */
export class LaunchHistory {
  private readonly scores: Map<string, number>;

  constructor(
    private readonly filePath: string | null = null,
    scores: Iterable<[string, number]> = [],
  ) {
    this.scores = new Map(scores);
  }

  /**
   * Reads the history file. A missing file gives an empty history; an
   * unreadable or malformed one is logged and also gives an empty history.
   */
  static async load(filePath: string, logger: Logger): Promise<LaunchHistory> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return new LaunchHistory(filePath);
      }
      await logger.warn(`Ignoring launch history ${filePath}: ${toError(err).message}`);
      return new LaunchHistory(filePath);
    }

    try {
      const parsed = HistoryFileSchema.parse(JSON.parse(raw));
      return new LaunchHistory(filePath, Object.entries(parsed.scores));
    } catch (err) {
      await logger.warn(`Ignoring launch history ${filePath}: ${toError(err).message}`);
      return new LaunchHistory(filePath);
    }
  }

  bias(id: string): number {
    return this.scores.get(id) ?? 0;
  }

  record(id: string): void {
    for (const [other, value] of this.scores) {
      if (other === id) continue;
      const decayed = decayHistoryValue(value);
      if (decayed === 0) {
        this.scores.delete(other);
      } else {
        this.scores.set(other, decayed);
      }
    }
    this.scores.set(id, bumpHistoryValue(this.bias(id)));
  }

  /** Scores sorted by id. */
  entries(): [string, number][] {
    return [...this.scores].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  async save(): Promise<void> {
    if (!this.filePath) return;
    const body = { version: HISTORY_VERSION, scores: Object.fromEntries(this.entries()) };
    await atomicWrite(this.filePath, JSON.stringify(body, null, 2));
  }
}
