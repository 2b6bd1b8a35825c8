import net from 'node:net';
import { chmod, unlink } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { DaemonBindError, ensureDir, toError, type Logger } from '@swiftlaunch/shared';
import type { ConnectionState, RequestHandler } from './handler';
import { encodeMessage, parseRequest, toErrorBody, type Response } from './protocol';

export interface IpcServerOptions {
  socketPath: string;
  handler: RequestHandler;
  logger: Logger;
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/** Resolves true when something accepts connections on `socketPath`. */
function probe(socketPath: string): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect(socketPath);
    socket.once('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.once('error', () => {
      socket.destroy();
      resolve(false);
    });
  });
}

/**
 * Unix-socket server speaking the line protocol. Requests on one connection
 * are handled concurrently; responses carry the request id and may come
 * back out of order.
 */
export class IpcServer {
  private readonly server: net.Server;
  private readonly logger: Logger;
  private readonly sockets = new Set<net.Socket>();
  private nextConnectionId = 1;
  private listening = false;

  constructor(private readonly options: IpcServerOptions) {
    this.logger = options.logger.child({ component: 'ipc-server' });
    this.server = net.createServer((socket) => this.accept(socket));
  }

  get socketPath(): string {
    return this.options.socketPath;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  /**
   * Binds the socket. A socket file nobody answers on is left over from a
   * crashed daemon and is replaced; a live daemon on it is a DaemonBindError.
   */
  async listen(): Promise<void> {
    const { socketPath } = this.options;
    await ensureDir(socketPath);
    try {
      await this.bind();
    } catch (err) {
      if (errorCode(err) !== 'EADDRINUSE') {
        throw new DaemonBindError(socketPath, `Cannot listen on ${socketPath}: ${toError(err).message}`, {
          cause: err,
        });
      }
      if (await probe(socketPath)) {
        throw new DaemonBindError(socketPath, `Another daemon is already listening on ${socketPath}`);
      }
      await this.logger.warn(`Removing stale socket ${socketPath}`);
      await unlink(socketPath);
      try {
        await this.bind();
      } catch (retryErr) {
        throw new DaemonBindError(socketPath, `Cannot listen on ${socketPath}: ${toError(retryErr).message}`, {
          cause: retryErr,
        });
      }
    }
    this.listening = true;

    try {
      await chmod(socketPath, 0o600);
    } catch (err) {
      await this.logger.warn(`Cannot restrict permissions of ${socketPath}: ${toError(err).message}`);
    }
    await this.logger.info(`Listening on ${socketPath}`);
  }

  async close(): Promise<void> {
    if (!this.listening) return;
    this.listening = false;
    for (const socket of this.sockets) {
      socket.destroy();
    }
    // net.Server removes its own socket file when it closes
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private bind(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server.removeListener('listening', onListening);
        reject(err);
      };
      const onListening = () => {
        this.server.removeListener('error', onError);
        resolve();
      };
      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(this.options.socketPath);
    });
  }

  private accept(socket: net.Socket): void {
    const connection: ConnectionState = { id: this.nextConnectionId++, sessions: new Set() };
    this.sockets.add(socket);
    socket.setEncoding('utf8');

    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    lines.on('line', (line) => {
      if (line.trim() === '') return;
      void this.dispatch(socket, connection, line);
    });

    socket.on('error', (err) => {
      void this.logger.debug(`Connection ${connection.id} failed: ${err.message}`);
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
      lines.close();
      this.options.handler.release(connection).catch((err: unknown) => {
        void this.logger.error(toError(err), `Releasing connection ${connection.id} failed`);
      });
    });
  }

  private async dispatch(socket: net.Socket, connection: ConnectionState, line: string): Promise<void> {
    const parsed = parseRequest(line);
    if (!parsed.success) {
      await this.logger.warn(`Connection ${connection.id}: ${parsed.error.message}`);
      this.write(socket, { id: parsed.id, ok: false, error: toErrorBody(parsed.error) });
      return;
    }

    const { request } = parsed;
    try {
      const answer = await this.options.handler.handle(request, connection);
      this.write(socket, { id: request.id, ok: true, result: answer.result });
      if (answer.endConnection) {
        socket.end();
      }
    } catch (err) {
      const error = toError(err);
      await this.logger.debug(`Request ${request.type} on connection ${connection.id} failed: ${error.message}`);
      this.write(socket, { id: request.id, ok: false, error: toErrorBody(error) });
    }
  }

  private write(socket: net.Socket, response: Response): void {
    if (socket.writable) {
      socket.write(encodeMessage(response));
    }
  }
}
