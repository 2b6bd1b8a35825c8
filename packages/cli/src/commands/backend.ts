import { ConsoleLogger } from '@swiftlaunch/shared';
import { LauncherDaemon } from '@swiftlaunch/core';
import { IpcClient } from '@swiftlaunch/daemon';
import type { ActionOutcome } from '@swiftlaunch/app-sdk';
import type { ViewLike } from '../output';
import type { CliContext } from '../types';
import type { Settings } from './settings';

/** One session, served by a running daemon or by an in-process pipeline. */
export interface SessionBackend {
  input(query: string): Promise<ViewLike>;
  move(delta: number): Promise<ViewLike>;
  activate(actionId?: string): Promise<{ outcome: ActionOutcome; view: ViewLike }>;
  close(): Promise<void>;
}

export async function connectBackend(settings: Settings): Promise<SessionBackend> {
  const client = await IpcClient.connect(settings.paths.socketPath);
  const { sessionId } = await client.open();
  return {
    input: (query) => client.input(sessionId, query),
    move: (delta) => client.move(sessionId, delta),
    activate: (actionId) => client.activate(sessionId, actionId),
    close: () => client.goodbye(),
  };
}

/**
 * Runs scan, index and apps inside the CLI process, without watching or
 * periodic rescans. Logging stays at warn unless --verbose.
 */
export async function standaloneBackend(settings: Settings, context: CliContext): Promise<SessionBackend> {
  const { config } = settings;
  const daemon = await LauncherDaemon.create({
    config: { ...config, scanner: { ...config.scanner, watch: false, rescanIntervalMs: 0 } },
    paths: settings.paths,
    logger: new ConsoleLogger(settings.verbose ? 'debug' : 'warn'),
    spawn: context.spawn,
  });
  await daemon.start();
  const session = daemon.sessions.open();
  return {
    input: (query) => session.input(query),
    move: async (delta) => session.moveSelection(delta),
    activate: async (actionId) => {
      const outcome = await session.activate(actionId);
      return { outcome, view: session.view() };
    },
    close: () => daemon.stop(),
  };
}

export function openBackend(settings: Settings, context: CliContext, standalone: boolean): Promise<SessionBackend> {
  return standalone ? standaloneBackend(settings, context) : connectBackend(settings);
}
