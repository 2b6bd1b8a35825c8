import type { Logger } from '@swiftlaunch/shared';
import type { LauncherDaemon } from '@swiftlaunch/core';
import { PROTOCOL_VERSION, type Request } from './protocol';

/** Per-connection bookkeeping: sessions opened over the connection are closed with it. */
export interface ConnectionState {
  readonly id: number;
  readonly sessions: Set<string>;
}

export interface HandlerReply {
  result: unknown;
  /** The connection ends once this reply is written */
  endConnection: boolean;
}

function reply(result: unknown): HandlerReply {
  return { result, endConnection: false };
}

/**
 * Maps protocol requests onto a LauncherDaemon. Errors thrown here, such as
 * a UsageError for an unknown session, become error responses.
 */
export class RequestHandler {
  private readonly logger: Logger;

  constructor(
    private readonly daemon: LauncherDaemon,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ipc' });
  }

  async handle(request: Request, connection: ConnectionState): Promise<HandlerReply> {
    const { sessions } = this.daemon;
    switch (request.type) {
      case 'ping':
        return reply({ pong: true, protocol: PROTOCOL_VERSION, pid: process.pid });
      case 'open': {
        const session = sessions.open(request.sessionId);
        connection.sessions.add(session.sessionId);
        await this.logger.debug(`Connection ${connection.id} opened session ${session.sessionId}`);
        return reply(session.view());
      }
      case 'input':
        return reply(await sessions.get(request.sessionId).input(request.query));
      case 'move':
        return reply(sessions.get(request.sessionId).moveSelection(request.delta));
      case 'activate': {
        const session = sessions.get(request.sessionId);
        const outcome = await session.activate(request.actionId);
        return reply({ outcome, view: session.view() });
      }
      case 'view':
        return reply(sessions.get(request.sessionId).view());
      case 'close':
        sessions.close(request.sessionId);
        connection.sessions.delete(request.sessionId);
        return reply({ closed: true });
      case 'status':
        return reply(this.daemon.status());
      case 'rescan':
        return reply(await this.daemon.rescan());
      case 'goodbye':
        return { result: { bye: true }, endConnection: true };
    }
  }

  /** Closes whatever the connection left open. */
  async release(connection: ConnectionState): Promise<void> {
    for (const sessionId of connection.sessions) {
      if (this.daemon.sessions.ids().includes(sessionId)) {
        this.daemon.sessions.close(sessionId);
      }
    }
    if (connection.sessions.size > 0) {
      await this.logger.debug(`Connection ${connection.id} closed ${connection.sessions.size} session(s)`);
    }
    connection.sessions.clear();
  }
}
