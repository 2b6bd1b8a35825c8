import os from 'os';
import { Command, CommanderError } from 'commander';
import pc from 'picocolors';
import { LauncherError } from '@swiftlaunch/shared';
import { version } from '../package.json';
import { registerDaemonCommand } from './commands/daemon';
import { registerIndexCommand } from './commands/index-commands';
import { registerPingCommand } from './commands/ping';
import { registerQueryCommands } from './commands/query';
import type { CliContext, GlobalOptions } from './types';

export const name = '@swiftlaunch/cli';

export type { CliContext } from './types';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('swiftlaunch')
    .description('Application launcher daemon and client')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--socket <path>', 'Daemon socket path')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerDaemonCommand(program, context);
  registerPingCommand(program, context);
  registerQueryCommands(program, context);
  registerIndexCommand(program, context);

  return program;
}

/** Exit code for an error: 2 when the user can fix the invocation or config, 1 otherwise. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof LauncherError) {
    return error.code === 'ConfigError' || error.code === 'UsageError' ? 2 : 1;
  }
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : 2;
  }
  return 1;
}

function reportError(error: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    const body =
      error instanceof LauncherError
        ? { code: error.code, message: error.message, details: error.details }
        : { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) };
    console.log(JSON.stringify({ error: body }));
    return;
  }

  console.error(`${pc.red('✖ Error:')} ${(error instanceof Error && error.message) || String(error)}`);
  if (error instanceof LauncherError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (opts.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  }
}

/**
 * Runs one command line (without the node and script arguments).
 * @returns the process exit code
 */
export async function runCli(
  args: string[],
  context: CliContext = { env: process.env, home: os.homedir() },
): Promise<number> {
  const program = createProgram(context);
  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed its message
      return exitCodeFor(e);
    }
    reportError(e, program.opts<GlobalOptions>());
    return exitCodeFor(e);
  }
}
