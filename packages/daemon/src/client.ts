import net from 'node:net';
import { createInterface } from 'node:readline';
import type { z } from 'zod';
import { IpcError, toError, type LauncherError } from '@swiftlaunch/shared';
import {
  ActivateResultSchema,
  CloseResultSchema,
  GoodbyeResultSchema,
  PingResultSchema,
  RescanResultSchema,
  ResponseSchema,
  SessionViewSchema,
  StatusResultSchema,
  encodeMessage,
  fromErrorBody,
  type RequestBody,
} from './protocol';

export interface IpcClientOptions {
  /** Per-request timeout. Default: 5000 */
  timeoutMs?: number;
}

interface Pending {
  type: string;
  resolve: (result: unknown) => void;
  reject: (error: LauncherError) => void;
  timer: NodeJS.Timeout;
}

/**
 * Client side of the daemon socket. One client holds one connection;
 * sessions it opens live as long as the connection does.
 */
export class IpcClient {
  private readonly pending = new Map<number, Pending>();
  private nextId = 1;
  private closedWith: LauncherError | null = null;

  private constructor(
    private readonly socket: net.Socket,
    private readonly timeoutMs: number,
  ) {
    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    lines.on('line', (line) => this.receive(line));
    socket.on('error', (err) => this.failAll(new IpcError(`Daemon connection failed: ${err.message}`, { cause: err })));
    socket.on('close', () => {
      lines.close();
      this.failAll(new IpcError('Connection to daemon closed'));
    });
  }

  static connect(socketPath: string, options: IpcClientOptions = {}): Promise<IpcClient> {
    return new Promise((resolve, reject) => {
      const socket = net.connect(socketPath);
      socket.setEncoding('utf8');
      const onError = (err: Error) => {
        socket.destroy();
        reject(new IpcError(`No daemon is listening on ${socketPath}: ${err.message}`, { cause: err }));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.removeListener('error', onError);
        resolve(new IpcClient(socket, options.timeoutMs ?? 5000));
      });
    });
  }

  ping() {
    return this.call({ type: 'ping' }, PingResultSchema);
  }

  open(sessionId?: string) {
    return this.call(sessionId === undefined ? { type: 'open' } : { type: 'open', sessionId }, SessionViewSchema);
  }

  input(sessionId: string, query: string) {
    return this.call({ type: 'input', sessionId, query }, SessionViewSchema);
  }

  move(sessionId: string, delta: number) {
    return this.call({ type: 'move', sessionId, delta }, SessionViewSchema);
  }

  activate(sessionId: string, actionId?: string) {
    const body: RequestBody =
      actionId === undefined ? { type: 'activate', sessionId } : { type: 'activate', sessionId, actionId };
    return this.call(body, ActivateResultSchema);
  }

  view(sessionId: string) {
    return this.call({ type: 'view', sessionId }, SessionViewSchema);
  }

  close(sessionId: string) {
    return this.call({ type: 'close', sessionId }, CloseResultSchema);
  }

  status() {
    return this.call({ type: 'status' }, StatusResultSchema);
  }

  rescan() {
    return this.call({ type: 'rescan' }, RescanResultSchema);
  }

  /** Says goodbye; the daemon closes the connection after answering. */
  async goodbye(): Promise<void> {
    await this.call({ type: 'goodbye' }, GoodbyeResultSchema);
    this.socket.end();
  }

  /** Closes the connection without a goodbye. */
  end(): void {
    this.socket.end();
  }

  private call<S extends z.ZodTypeAny>(body: RequestBody, schema: S): Promise<z.infer<S>> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new IpcError(`Daemon did not answer "${body.type}" within ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      this.pending.set(id, { type: body.type, resolve, reject, timer });
      this.socket.write(encodeMessage({ ...body, id }));
    }).then((result) => {
      const parsed = schema.safeParse(result);
      if (!parsed.success) {
        throw new IpcError(`Unexpected "${body.type}" result from daemon: ${parsed.error.issues[0]?.message}`);
      }
      return parsed.data;
    });
  }

  private receive(line: string): void {
    if (line.trim() === '') return;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      this.abort(new IpcError(`Daemon sent invalid JSON: ${toError(err).message}`, { cause: err }));
      return;
    }
    const parsed = ResponseSchema.safeParse(raw);
    if (!parsed.success) {
      this.abort(new IpcError('Daemon sent a malformed response'));
      return;
    }

    const response = parsed.data;
    if (response.id === null) {
      // Only a request the daemon could not read gets no id; ours always have one
      this.abort(fromErrorBody(response.error));
      return;
    }
    const waiting = this.pending.get(response.id);
    if (!waiting) return;
    this.pending.delete(response.id);
    clearTimeout(waiting.timer);
    if (response.ok) {
      waiting.resolve(response.result);
    } else {
      waiting.reject(fromErrorBody(response.error));
    }
  }

  private abort(error: LauncherError): void {
    this.failAll(error);
    this.socket.destroy();
  }

  private failAll(error: LauncherError): void {
    if (!this.closedWith) {
      this.closedWith = error;
    }
    for (const [id, waiting] of this.pending) {
      clearTimeout(waiting.timer);
      waiting.reject(error);
      this.pending.delete(id);
    }
  }
}
