import type { Command } from 'commander';
import { IpcClient } from '@swiftlaunch/daemon';
import { OutputRenderer } from '../output';
import type { CliContext } from '../types';
import { loadSettings } from './settings';

export function registerPingCommand(program: Command, context: CliContext): void {
  program
    .command('ping')
    .description('Check that the daemon is running')
    .action(async (_options: Record<string, never>, command: Command) => {
      const settings = loadSettings(command, context);
      const client = await IpcClient.connect(settings.paths.socketPath);
      try {
        new OutputRenderer(settings.json).pong(await client.ping());
      } finally {
        await client.goodbye();
      }
    });
}
