import type { Command } from 'commander';
import { createLogger } from '@swiftlaunch/core';
import { startDaemonService } from '@swiftlaunch/daemon';
import type { CliContext } from '../types';
import { loadSettings } from './settings';

function shutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function registerDaemonCommand(program: Command, context: CliContext): void {
  program
    .command('daemon')
    .description('Run the launcher daemon in the foreground until SIGINT or SIGTERM')
    .action(async (_options: Record<string, never>, command: Command) => {
      const settings = loadSettings(command, context);
      const logger = createLogger(settings.config.logging);
      const service = await startDaemonService({ config: settings.config, paths: settings.paths, logger });

      const signal = await shutdownSignal();
      await logger.info(`Received ${signal}, shutting down`);
      await service.stop();
    });
}
