import type { ParseError, ScanError } from '@swiftlaunch/shared';
import type { Entry } from '../entry';

/** Parse outcome worth remembering across restarts. */
export type CachedOutcome =
  | { kind: 'entry'; entry: Entry }
  | { kind: 'hidden'; id: string; reason: string };

/**
 * Lookup into previously parsed descriptors, keyed by (source path, modification time).
 */
export interface OutcomeCache {
  get(sourcePath: string, mtimeMs: number): CachedOutcome | undefined;
}

export interface ScanOptions {
  /** gitignore-style patterns relative to each source directory */
  excludes?: string[];
  locale?: string;
}

/**
 * One item of a scan. Diagnostics are part of the sequence so the caller
 * decides how to report them; the scan itself never stops on them.
 */
export type ScanRecord =
  | { kind: 'entry'; entry: Entry; reused: boolean }
  | { kind: 'hidden'; id: string; sourcePath: string; mtimeMs: number; reason: string; reused: boolean }
  /** No file claims the id any more (incremental scans only) */
  | { kind: 'vacant'; id: string }
  | { kind: 'invalid'; id: string; sourcePath: string; error: ParseError }
  | { kind: 'unreadable'; directory: string; error: ScanError };

export interface FileChange {
  path: string;
  kind: 'modified' | 'renamed';
}

/** Where an indexed entry came from. */
export interface IndexedSource {
  id: string;
  sourcePath: string;
}
