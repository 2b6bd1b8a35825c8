import type { Command } from 'commander';
import { ActionLaunchError, UsageError } from '@swiftlaunch/shared';
import { OutputRenderer } from '../output';
import type { CliContext } from '../types';
import { openBackend, type SessionBackend } from './backend';
import { loadSettings } from './settings';

interface QueryOptions {
  standalone?: boolean;
}

interface LaunchOptions extends QueryOptions {
  select: string;
  action?: string;
}

async function withBackend<T>(backend: SessionBackend, fn: (backend: SessionBackend) => Promise<T>): Promise<T> {
  try {
    return await fn(backend);
  } finally {
    await backend.close();
  }
}

function parseRank(value: string): number {
  const rank = Number(value);
  if (!Number.isInteger(rank) || rank < 1) {
    throw new UsageError(`--select expects a rank of 1 or more, got "${value}"`);
  }
  return rank;
}

export function registerQueryCommands(program: Command, context: CliContext): void {
  program
    .command('query')
    .description('Rank applications and app results for a query')
    .argument('<text...>', 'Query text')
    .option('--standalone', 'Run the search in this process instead of asking the daemon')
    .action(async (text: string[], options: QueryOptions, command: Command) => {
      const settings = loadSettings(command, context);
      const backend = await openBackend(settings, context, options.standalone === true);
      const view = await withBackend(backend, (b) => b.input(text.join(' ')));
      new OutputRenderer(settings.json).results(view);
    });

  program
    .command('launch')
    .description('Launch a result of a query')
    .argument('<text...>', 'Query text')
    .option('--select <rank>', 'Rank of the result to launch', '1')
    .option('--action <id>', 'Action to run instead of the default one')
    .option('--standalone', 'Run the search in this process instead of asking the daemon')
    .action(async (text: string[], options: LaunchOptions, command: Command) => {
      const rank = parseRank(options.select);
      const settings = loadSettings(command, context);
      const backend = await openBackend(settings, context, options.standalone === true);

      const { outcome, view } = await withBackend(backend, async (b) => {
        const searched = await b.input(text.join(' '));
        if (searched.results.length < rank) {
          throw new UsageError(`Only ${searched.results.length} result(s) for "${searched.query}"`);
        }
        await b.move(rank - 1);
        return b.activate(options.action);
      });

      const selected = view.results[view.selection];
      if (outcome.status === 'failed') {
        throw new ActionLaunchError(outcome.reason, {
          details: selected ? { app: selected.appId, id: selected.candidate.id } : undefined,
        });
      }
      if (selected) {
        new OutputRenderer(settings.json).launched(selected, outcome.pid);
      }
    });
}
