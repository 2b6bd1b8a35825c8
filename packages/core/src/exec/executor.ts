import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { toError, type Logger } from '@swiftlaunch/shared';
import type { ActionOutcome } from '@swiftlaunch/app-sdk';
import type { Entry, EntryAction } from '@swiftlaunch/catalog';
import { expandExec } from './template';

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface ActionExecutorOptions {
  /** Command prefix for entries that run in a terminal */
  terminal: string[];
  logger: Logger;
  spawn?: SpawnFn;
  env?: NodeJS.ProcessEnv;
}

/**
 * Starts the process behind an entry action. The child is detached and
 * unreferenced; its lifetime is not tracked after a successful spawn.
 */
export class ActionExecutor {
  private readonly spawnFn: SpawnFn;

  constructor(private readonly options: ActionExecutorOptions) {
    this.spawnFn = options.spawn ?? spawn;
  }

  /** Full argv for an action, terminal prefix included. */
  commandFor(entry: Entry, action: EntryAction, args: readonly string[] = []): string[] {
    const argv = expandExec(action.exec, {
      args,
      name: entry.name,
      icon: entry.icon,
      sourcePath: entry.sourcePath,
    });
    return entry.terminal ? [...this.options.terminal, ...argv] : argv;
  }

  async launch(entry: Entry, action: EntryAction, args: readonly string[] = []): Promise<ActionOutcome> {
    let argv: string[];
    try {
      argv = this.commandFor(entry, action, args);
    } catch (err) {
      return { status: 'failed', reason: toError(err).message };
    }
    const [command, ...rest] = argv;

    await this.options.logger.debug(`Launching ${entry.id}/${action.id}: ${argv.join(' ')}`);

    return new Promise<ActionOutcome>((resolve) => {
      let child: ChildProcess;
      try {
        child = this.spawnFn(command, rest, {
          detached: true,
          stdio: 'ignore',
          env: this.options.env ?? process.env,
        });
      } catch (err) {
        resolve({ status: 'failed', reason: `Cannot start ${command}: ${toError(err).message}` });
        return;
      }
      child.once('error', (err) => {
        resolve({ status: 'failed', reason: `Cannot start ${command}: ${err.message}` });
      });
      child.once('spawn', () => {
        child.unref();
        resolve({ status: 'launched', pid: child.pid });
      });
    });
  }
}
