import type { SpawnFn } from '@swiftlaunch/core';
import type { Env } from '@swiftlaunch/shared';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  socket?: string;
  verbose?: boolean;
}

/** Process surroundings of one CLI run. */
export interface CliContext {
  env: Env;
  home: string;
  /** Replaces process spawning for standalone launches */
  spawn?: SpawnFn;
}
