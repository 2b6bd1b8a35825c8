import type { EventBus, LauncherEvent, LauncherEventType } from '../types/events';
import type { Logger } from '../logger/types';
import { toError } from '../errors';

export type EventListener = (event: LauncherEvent) => void;

/**
 * In-process event bus. Every event goes to the logger first, then to
 * subscribers in registration order. A throwing subscriber is reported to
 * the logger and does not stop delivery to the others.
 */
export class EventHub implements EventBus {
  private readonly listeners = new Set<{ types?: Set<LauncherEventType>; fn: EventListener }>();

  constructor(private readonly logger: Logger) {}

  async emit(event: LauncherEvent): Promise<void> {
    await this.logger.log(event);
    for (const listener of [...this.listeners]) {
      if (listener.types && !listener.types.has(event.type)) continue;
      try {
        listener.fn(event);
      } catch (err) {
        await this.logger.error(toError(err), `Listener for ${event.type} failed`);
      }
    }
  }

  /**
   * Subscribe to events, optionally filtered by type.
   * @returns a function that removes the subscription
   */
  subscribe(fn: EventListener, types?: LauncherEventType[]): () => void {
    const listener = { fn, types: types ? new Set(types) : undefined };
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

/** Bus that drops everything; for commands that do not report events. */
export const NOOP_EVENT_BUS: EventBus = { emit: () => undefined };
