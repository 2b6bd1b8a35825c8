import type { Command } from 'commander';
import { ConfigLoader, type ResolvedPaths } from '@swiftlaunch/core';
import type { Config, DeepPartial } from '@swiftlaunch/shared';
import type { CliContext, GlobalOptions } from '../types';

export interface Settings {
  config: Config;
  paths: ResolvedPaths;
  json: boolean;
  verbose: boolean;
}

/** The root program of a (sub)command. */
export function rootOf(command: Command): Command {
  let program = command;
  while (program.parent) {
    program = program.parent;
  }
  return program;
}

/** Loads the layered config, with global flags applied last. */
export function loadSettings(command: Command, context: CliContext): Settings {
  const globalOpts = rootOf(command).opts<GlobalOptions>();

  const flags: DeepPartial<Config> = {};
  if (globalOpts.socket) {
    flags.daemon = { socketPath: globalOpts.socket };
  }
  if (globalOpts.verbose) {
    flags.logging = { level: 'debug' };
  }

  const config = ConfigLoader.load({
    configPath: globalOpts.config,
    flags,
    env: context.env,
    home: context.home,
  });
  return {
    config,
    paths: ConfigLoader.resolvePaths(config, context.env, context.home),
    json: globalOpts.json === true,
    verbose: globalOpts.verbose === true,
  };
}
