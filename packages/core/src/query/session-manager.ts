import { randomUUID } from 'crypto';
import { UsageError } from '@swiftlaunch/shared';
import { QueryCoordinator, type QueryCoordinatorOptions } from './session';

export type SessionDefaults = Omit<QueryCoordinatorOptions, 'sessionId'>;

/**
 * Sessions by id. A session lives from `open` until `close`.
 */
export class SessionManager {
  private readonly sessions = new Map<string, QueryCoordinator>();

  constructor(private readonly defaults: SessionDefaults) {}

  open(sessionId: string = randomUUID()): QueryCoordinator {
    if (this.sessions.has(sessionId)) {
      throw new UsageError(`Session ${sessionId} is already open`);
    }
    const session = new QueryCoordinator({ ...this.defaults, sessionId });
    this.sessions.set(sessionId, session);
    return session;
  }

  get(sessionId: string): QueryCoordinator {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new UsageError(`Unknown session ${sessionId}`);
    }
    return session;
  }

  close(sessionId: string): void {
    this.get(sessionId).close();
    this.sessions.delete(sessionId);
  }

  closeAll(): void {
    for (const session of this.sessions.values()) {
      session.close();
    }
    this.sessions.clear();
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
