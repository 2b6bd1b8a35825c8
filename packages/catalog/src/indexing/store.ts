import { EventEmitter } from 'node:events';
import { IndexError } from '@swiftlaunch/shared';
import { freezeEntry, type Entry } from '../entry';

export type DeltaOp =
  | { kind: 'add'; entry: Entry }
  | { kind: 'update'; entry: Entry }
  | { kind: 'remove'; id: string };

export type IndexDelta = readonly DeltaOp[];

export interface IndexUpdate {
  generation: number;
  added: number;
  updated: number;
  removed: number;
}

/**
 * Immutable view of the index at one generation. Holders must call
 * `release()` once done; a superseded generation is freed when its last
 * snapshot is released.
 */
export interface Snapshot {
  readonly generation: number;
  readonly size: number;
  /** Entries ordered by id */
  readonly entries: readonly Entry[];
  get(id: string): Entry | undefined;
  readonly released: boolean;
  release(): void;
}

interface GenerationState {
  generation: number;
  byId: ReadonlyMap<string, Entry>;
  ordered: readonly Entry[] | null;
  refs: number;
}

class SnapshotHandle implements Snapshot {
  private isReleased = false;

  constructor(
    private readonly state: GenerationState,
    private readonly onRelease: (state: GenerationState) => void,
  ) {}

  get generation(): number {
    return this.state.generation;
  }

  get size(): number {
    this.assertLive();
    return this.state.byId.size;
  }

  get entries(): readonly Entry[] {
    this.assertLive();
    if (!this.state.ordered) {
      const ordered = [...this.state.byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
      this.state.ordered = Object.freeze(ordered);
    }
    return this.state.ordered;
  }

  get(id: string): Entry | undefined {
    this.assertLive();
    return this.state.byId.get(id);
  }

  get released(): boolean {
    return this.isReleased;
  }

  release(): void {
    if (this.isReleased) return;
    this.isReleased = true;
    this.onRelease(this.state);
  }

  private assertLive(): void {
    if (this.isReleased) {
      throw new IndexError(`Snapshot of generation ${this.state.generation} was already released`);
    }
  }
}

/**
 * Versioned, copy-on-write entry index.
 *
 * Deltas are applied by a single writer; each accepted delta builds a new
 * map and bumps the generation by exactly one. Readers take snapshots that
 * keep seeing their own generation no matter what the writer does next.
 *
 * Emits `updated` with an {@link IndexUpdate} after every accepted delta.
 */
export class IndexStore extends EventEmitter {
  private current: GenerationState = { generation: 0, byId: new Map(), ordered: null, refs: 0 };
  /** Superseded generations still referenced by a snapshot */
  private readonly retained = new Map<number, GenerationState>();

  get generation(): number {
    return this.current.generation;
  }

  get size(): number {
    return this.current.byId.size;
  }

  lookup(id: string): Entry | undefined {
    return this.current.byId.get(id);
  }

  snapshot(): Snapshot {
    const state = this.current;
    state.refs += 1;
    return new SnapshotHandle(state, (released) => this.releaseState(released));
  }

  /**
   * Applies a delta atomically: the whole batch is validated first and either
   * becomes the next generation or is rejected with an IndexError, leaving
   * the index untouched. An empty delta is not a mutation and keeps the
   * current generation.
   */
  apply(delta: IndexDelta): number {
    if (delta.length === 0) {
      return this.current.generation;
    }

    const base = this.current.byId;
    const seen = new Set<string>();
    for (const op of delta) {
      const id = op.kind === 'remove' ? op.id : op.entry.id;
      if (seen.has(id)) {
        throw new IndexError(`Delta touches entry "${id}" more than once`);
      }
      seen.add(id);
      if (op.kind === 'add' && base.has(id)) {
        throw new IndexError(`Cannot add entry "${id}": id already indexed`);
      }
      if (op.kind !== 'add' && !base.has(id)) {
        throw new IndexError(`Cannot ${op.kind} entry "${id}": not indexed`);
      }
    }

    const next = new Map(base);
    const update: IndexUpdate = { generation: this.current.generation + 1, added: 0, updated: 0, removed: 0 };
    for (const op of delta) {
      switch (op.kind) {
        case 'add':
          next.set(op.entry.id, freezeEntry(op.entry));
          update.added += 1;
          break;
        case 'update':
          next.set(op.entry.id, freezeEntry(op.entry));
          update.updated += 1;
          break;
        case 'remove':
          next.delete(op.id);
          update.removed += 1;
          break;
      }
    }

    const previous = this.current;
    this.current = { generation: update.generation, byId: next, ordered: null, refs: 0 };
    if (previous.refs > 0) {
      this.retained.set(previous.generation, previous);
    }

    this.emit('updated', update);
    return update.generation;
  }

  onUpdate(listener: (update: IndexUpdate) => void): () => void {
    this.on('updated', listener);
    return () => {
      this.off('updated', listener);
    };
  }

  /** Generations kept alive by unreleased snapshots, oldest first. */
  retainedGenerations(): number[] {
    return [...this.retained.keys()].sort((a, b) => a - b);
  }

  private releaseState(state: GenerationState): void {
    state.refs -= 1;
    if (state.refs === 0 && state !== this.current) {
      this.retained.delete(state.generation);
      // Drop the entry references so a leaked handle does not pin them
      state.byId = new Map();
      state.ordered = null;
    }
  }
}
