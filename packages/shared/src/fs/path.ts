import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins path segments and normalizes the result to forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

export type Env = Record<string, string | undefined>;

function absoluteOr(value: string | undefined, fallback: string): string {
  // XDG base directories must be absolute; relative values are ignored.
  return value && path.isAbsolute(value) ? value : fallback;
}

function pathList(value: string | undefined, fallback: string[]): string[] {
  const dirs = (value ?? '').split(':').filter((dir) => dir.length > 0 && path.isAbsolute(dir));
  return dirs.length > 0 ? dirs : fallback;
}

/**
 * XDG base directories resolved from an environment.
 */
export interface BaseDirectories {
  dataHome: string;
  dataDirs: string[];
  configHome: string;
  cacheHome: string;
  stateHome: string;
  runtimeDir?: string;
}

export function resolveBaseDirectories(
  env: Env = process.env,
  home: string = os.homedir(),
): BaseDirectories {
  const runtimeDir = env.XDG_RUNTIME_DIR;
  return {
    dataHome: absoluteOr(env.XDG_DATA_HOME, path.join(home, '.local', 'share')),
    dataDirs: pathList(env.XDG_DATA_DIRS, ['/usr/local/share', '/usr/share']),
    configHome: absoluteOr(env.XDG_CONFIG_HOME, path.join(home, '.config')),
    cacheHome: absoluteOr(env.XDG_CACHE_HOME, path.join(home, '.cache')),
    stateHome: absoluteOr(env.XDG_STATE_HOME, path.join(home, '.local', 'state')),
    runtimeDir: runtimeDir && path.isAbsolute(runtimeDir) ? runtimeDir : undefined,
  };
}

/**
 * The `applications` directories in lookup order: data home first, then every data dir.
 * Earlier directories shadow later ones when desktop-file ids collide.
 */
export function applicationDirectories(dirs: BaseDirectories): string[] {
  const all = [dirs.dataHome, ...dirs.dataDirs].map((dir) => path.join(dir, 'applications'));
  return [...new Set(all)];
}
