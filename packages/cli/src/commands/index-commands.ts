import type { Command } from 'commander';
import { IpcClient } from '@swiftlaunch/daemon';
import { OutputRenderer } from '../output';
import type { CliContext } from '../types';
import { loadSettings } from './settings';

export function registerIndexCommand(program: Command, context: CliContext): void {
  const indexCommand = program.command('index').description('Inspect the application index of the daemon');

  indexCommand
    .command('status')
    .description('Show index generation, entry count and watched directories')
    .action(async (_options: Record<string, never>, command: Command) => {
      const settings = loadSettings(command, context);
      const client = await IpcClient.connect(settings.paths.socketPath);
      try {
        new OutputRenderer(settings.json).status(await client.status());
      } finally {
        await client.goodbye();
      }
    });

  indexCommand
    .command('rescan')
    .description('Rescan every source directory now')
    .action(async (_options: Record<string, never>, command: Command) => {
      const settings = loadSettings(command, context);
      const client = await IpcClient.connect(settings.paths.socketPath, { timeoutMs: 60_000 });
      try {
        new OutputRenderer(settings.json).rescan(await client.rescan());
      } finally {
        await client.goodbye();
      }
    });
}
