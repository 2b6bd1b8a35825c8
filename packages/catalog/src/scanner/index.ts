import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { objectHash } from 'ohash';
import { ParseError, ScanError, toError } from '@swiftlaunch/shared';
import { freezeEntry, type Entry } from '../entry';
import type { IconResolver } from '../icons/resolver';
import { desktopFileId, parseDesktopFile, toDesktopOutcome } from './desktop-entry';
import type { IndexedSource, OutcomeCache, ScanOptions, ScanRecord } from './types';

export * from './types';
export * from './desktop-entry';

type Fs = Pick<typeof nodeFs, 'readdir' | 'stat' | 'readFile'>;
type Ignore = ReturnType<typeof ignore>;

const DESCRIPTOR_EXT = '.desktop';

export interface EntryScannerOptions extends ScanOptions {
  fs?: Fs;
  iconResolver?: IconResolver;
}

interface Listing {
  files: string[];
  unreadable: ScanError[];
}

/**
 * Discovers desktop entries below a list of source directories.
 *
 * Directories are given highest precedence first: when two files map to the
 * same desktop-file id, the one in the earlier directory wins and the later
 * one is never parsed.
 */
export class EntryScanner {
  private readonly fs: Fs;
  private readonly ig: Ignore;
  private readonly excludes: string[];
  private readonly locale?: string;
  private readonly iconResolver?: IconResolver;

  constructor(options: EntryScannerOptions = {}) {
    this.fs = options.fs ?? nodeFs;
    this.excludes = options.excludes ?? [];
    this.ig = ignore().add(this.excludes);
    this.locale = options.locale;
    this.iconResolver = options.iconResolver;
  }

  /**
   * Fingerprint of everything besides file contents that shapes an entry.
   * Cached outcomes recorded under a different fingerprint are not reusable.
   */
  fingerprint(directories: string[]): string {
    return objectHash({
      directories,
      excludes: this.excludes,
      locale: this.locale ?? null,
      icons: this.iconResolver?.settings() ?? null,
    });
  }

  /**
   * Full scan. Each call walks the directories again; the sequence is
   * produced lazily as the consumer iterates.
   */
  async *scan(directories: string[], cache?: OutcomeCache): AsyncGenerator<ScanRecord> {
    const claimed = new Set<string>();

    for (const directory of directories) {
      let listing: Listing;
      try {
        listing = await this.list(directory);
      } catch (err) {
        yield {
          kind: 'unreadable',
          directory,
          error: new ScanError(directory, toError(err).message, { cause: err }),
        };
        continue;
      }
      for (const error of listing.unreadable) {
        yield { kind: 'unreadable', directory: error.directory, error };
      }

      for (const relativePath of listing.files) {
        const id = desktopFileId(relativePath);
        if (claimed.has(id)) continue;
        const record = await this.load(path.join(directory, relativePath), id, cache);
        if (!record) continue;
        if (record.kind !== 'invalid') claimed.add(id);
        yield record;
      }
    }
  }

  /**
   * Incremental scan of changed paths. Every desktop-file id touched by
   * `paths` is resolved again across all directories, so removing a file
   * reveals one it used to shadow. Ids no file claims any more come back
   * as `vacant`.
   *
   * A changed path that is not a descriptor is taken as a directory moved
   * in or out: the `indexed` entries below it are resolved again and, when
   * it exists now, the descriptors inside it are picked up.
   */
  async *scanPaths(
    directories: string[],
    paths: Iterable<string>,
    cache?: OutcomeCache,
    indexed: Iterable<IndexedSource> = [],
  ): AsyncGenerator<ScanRecord> {
    const touched = new Map<string, string[]>();
    const touch = (relativePath: string) => {
      const id = desktopFileId(relativePath);
      const candidates = touched.get(id) ?? [id];
      if (!candidates.includes(relativePath)) candidates.unshift(relativePath);
      touched.set(id, candidates);
    };
    const sources = [...indexed];

    for (const changed of paths) {
      const located = this.locate(directories, changed);
      if (located === null) continue;
      if (changed.endsWith(DESCRIPTOR_EXT)) {
        if (located !== '' && !this.ig.ignores(toPosix(located))) touch(located);
        continue;
      }
      if (located !== '' && this.ig.ignores(toPosix(located) + '/')) continue;

      for (const source of sources) {
        if (!isWithin(changed, source.sourcePath)) continue;
        const relativePath = this.locate(directories, source.sourcePath);
        if (relativePath) touch(relativePath);
      }

      let isDirectory: boolean;
      try {
        isDirectory = (await this.fs.stat(changed)).isDirectory();
      } catch {
        isDirectory = false;
      }
      if (!isDirectory) continue;
      try {
        const listing = await this.list(changed, located);
        for (const error of listing.unreadable) {
          yield { kind: 'unreadable', directory: error.directory, error };
        }
        for (const relativePath of listing.files) touch(relativePath);
      } catch (err) {
        yield {
          kind: 'unreadable',
          directory: changed,
          error: new ScanError(changed, toError(err).message, { cause: err }),
        };
      }
    }

    for (const [id, candidates] of touched) {
      let claimed = false;
      for (const directory of directories) {
        for (const relativePath of candidates) {
          if (this.ig.ignores(toPosix(relativePath))) continue;
          const record = await this.load(path.join(directory, relativePath), id, cache);
          if (!record) continue;
          yield record;
          if (record.kind !== 'invalid') {
            claimed = true;
            break;
          }
        }
        if (claimed) break;
      }
      if (!claimed) {
        yield { kind: 'vacant', id };
      }
    }
  }

  /** Path of `file` relative to the first directory containing it; `''` for a directory itself. */
  private locate(directories: string[], file: string): string | null {
    for (const directory of directories) {
      const relativePath = path.relative(directory, file);
      if (relativePath === '' || isWithin(directory, file)) return relativePath;
    }
    return null;
  }

  /** Walks `root`; returned paths are prefixed with `relativeRoot`. */
  private async list(root: string, relativeRoot = ''): Promise<Listing> {
    const files: string[] = [];
    const unreadable: ScanError[] = [];

    const walk = async (dir: string, relativeDir: string) => {
      const entries = await this.fs.readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
        if (entry.isDirectory()) {
          if (this.ig.ignores(toPosix(relativePath) + '/')) continue;
          try {
            await walk(path.join(dir, entry.name), relativePath);
          } catch (err) {
            const subdir = path.join(dir, entry.name);
            unreadable.push(new ScanError(subdir, toError(err).message, { cause: err }));
          }
        } else if (
          (entry.isFile() || entry.isSymbolicLink()) &&
          entry.name.endsWith(DESCRIPTOR_EXT) &&
          !this.ig.ignores(toPosix(relativePath))
        ) {
          files.push(relativePath);
        }
      }
    };

    await walk(root, relativeRoot);
    return { files, unreadable };
  }

  /**
   * Reads one descriptor. Returns null when the file is gone or is not a
   * regular file.
   */
  private async load(
    sourcePath: string,
    id: string,
    cache: OutcomeCache | undefined,
  ): Promise<ScanRecord | null> {
    let mtimeMs: number;
    try {
      const stats = await this.fs.stat(sourcePath);
      if (!stats.isFile()) return null;
      mtimeMs = stats.mtimeMs;
    } catch {
      return null;
    }

    const cached = cache?.get(sourcePath, mtimeMs);
    if (cached?.kind === 'entry' && cached.entry.id === id) {
      return { kind: 'entry', entry: await this.withIcon(cached.entry), reused: true };
    }
    if (cached?.kind === 'hidden' && cached.id === id) {
      return { kind: 'hidden', id, sourcePath, mtimeMs, reason: cached.reason, reused: true };
    }

    try {
      const content = await this.fs.readFile(sourcePath, 'utf-8');
      const outcome = toDesktopOutcome(parseDesktopFile(content, sourcePath), {
        id,
        sourcePath,
        mtimeMs,
        locale: this.locale,
      });
      if (outcome.kind === 'hidden') {
        return { kind: 'hidden', id, sourcePath, mtimeMs, reason: outcome.reason, reused: false };
      }
      return { kind: 'entry', entry: await this.withIcon(outcome.entry), reused: false };
    } catch (err) {
      const error =
        err instanceof ParseError
          ? err
          : new ParseError(sourcePath, toError(err).message, { cause: err });
      return { kind: 'invalid', id, sourcePath, error };
    }
  }

  /**
   * Frozen copy of `entry` with its icon resolved against the current icon
   * directories. Cached entries go through here too, so icons installed or
   * removed since the cache was written are picked up.
   */
  private async withIcon(entry: Entry): Promise<Entry> {
    const iconPath = entry.icon && this.iconResolver ? await this.iconResolver.resolve(entry.icon) : null;
    if (Object.isFrozen(entry) && (iconPath ?? undefined) === entry.iconPath) return entry;
    return freezeEntry({ ...entry, iconPath: iconPath ?? undefined });
  }
}

/** True when `file` lies strictly below `dir`. */
function isWithin(dir: string, file: string): boolean {
  const relativePath = path.relative(dir, file);
  return (
    relativePath !== '' &&
    relativePath !== '..' &&
    !relativePath.startsWith('..' + path.sep) &&
    !path.isAbsolute(relativePath)
  );
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
