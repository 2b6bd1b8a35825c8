/**
 * Cooperative cancellation.
 *
 * A token is never forcibly interrupted: the work holding it checks
 * `isCancelled()` at its own suspension points (between matcher chunks,
 * before committing a fan-out round) and stops there.
 */
export interface CancellationToken {
  /** Monotonic marker assigned by the issuing source */
  readonly generation: number;
  isCancelled(): boolean;
  /**
   * Runs `listener` once when the token is cancelled (immediately if it already is).
   * Returns a function that removes the listener.
   */
  onCancel(listener: () => void): () => void;
}

class SourceToken implements CancellationToken {
  private cancelled = false;
  private listeners = new Set<() => void>();

  constructor(readonly generation: number) {}

  isCancelled(): boolean {
    return this.cancelled;
  }

  onCancel(listener: () => void): () => void {
    if (this.cancelled) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }
}

/**
 * Issues tokens with strictly increasing generations. Issuing a new token
 * cancels the previous one, so at most one token per source is live.
 */
export class CancellationSource {
  private generation = 0;
  private current: SourceToken | null = null;

  /** Cancels the live token (if any) and returns a fresh one. */
  next(): CancellationToken {
    this.current?.cancel();
    this.generation += 1;
    this.current = new SourceToken(this.generation);
    return this.current;
  }

  /** Cancels the live token without issuing another. */
  cancel(): void {
    this.current?.cancel();
  }

  /** True when `token` is the live, uncancelled token of this source. */
  isCurrent(token: CancellationToken): boolean {
    return this.current === token && !token.isCancelled();
  }

  get currentGeneration(): number {
    return this.generation;
  }
}

/** A token that is never cancelled. */
export const NEVER_CANCELLED: CancellationToken = {
  generation: 0,
  isCancelled: () => false,
  onCancel: () => () => {},
};
