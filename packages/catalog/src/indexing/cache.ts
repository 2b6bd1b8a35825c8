import fs from 'node:fs/promises';
import { z } from 'zod';
import { CacheVersionMismatchError, IndexError, atomicWrite, toError } from '@swiftlaunch/shared';
import { freezeEntry } from '../entry';
import type { CachedOutcome, OutcomeCache } from '../scanner/types';

export const CACHE_SCHEMA_VERSION = 1;

const MAGIC = Buffer.from('SWLC', 'ascii');
// magic + uint16 version + uint32 payload length
const HEADER_BYTES = MAGIC.length + 2 + 4;

const EntrySchema = z.object({
  id: z.string(),
  sourcePath: z.string(),
  mtimeMs: z.number(),
  name: z.string(),
  genericName: z.string().optional(),
  description: z.string().optional(),
  categories: z.array(z.string()),
  keywords: z.array(z.string()),
  actions: z.array(z.object({ id: z.string(), label: z.string(), exec: z.string() })).min(1),
  icon: z.string().optional(),
  iconPath: z.string().optional(),
  terminal: z.boolean(),
  searchText: z.string(),
});

const CacheRecordSchema = z.object({
  sourcePath: z.string(),
  mtimeMs: z.number(),
  outcome: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('entry'), entry: EntrySchema }),
    z.object({ kind: z.literal('hidden'), id: z.string(), reason: z.string() }),
  ]),
});

const PayloadSchema = z.object({
  fingerprint: z.string(),
  writtenAt: z.number(),
  records: z.array(CacheRecordSchema),
});

export interface CacheRecord {
  sourcePath: string;
  mtimeMs: number;
  outcome: CachedOutcome;
}

export interface EntryCacheFile {
  schemaVersion: number;
  /** Scan settings the records were produced under */
  fingerprint: string;
  writtenAt: number;
  records: CacheRecord[];
}

export function encodeEntryCache(file: Omit<EntryCacheFile, 'schemaVersion'>): Buffer {
  const payload = Buffer.from(
    JSON.stringify({ fingerprint: file.fingerprint, writtenAt: file.writtenAt, records: file.records }),
    'utf-8',
  );
  const header = Buffer.alloc(HEADER_BYTES);
  MAGIC.copy(header, 0);
  header.writeUInt16BE(CACHE_SCHEMA_VERSION, MAGIC.length);
  header.writeUInt32BE(payload.length, MAGIC.length + 2);
  return Buffer.concat([header, payload]);
}

/**
 * Decodes a cache blob.
 * Throws CacheVersionMismatchError for another schema version and
 * IndexError when the blob is damaged.
 */
export function decodeEntryCache(data: Uint8Array): EntryCacheFile {
  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (buf.length < HEADER_BYTES || !buf.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new IndexError('Entry cache is corrupted: bad header');
  }
  const schemaVersion = buf.readUInt16BE(MAGIC.length);
  if (schemaVersion !== CACHE_SCHEMA_VERSION) {
    throw new CacheVersionMismatchError(schemaVersion, CACHE_SCHEMA_VERSION);
  }
  const length = buf.readUInt32BE(MAGIC.length + 2);
  if (buf.length !== HEADER_BYTES + length) {
    throw new IndexError(
      `Entry cache is corrupted: expected ${length} payload bytes, found ${buf.length - HEADER_BYTES}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(buf.subarray(HEADER_BYTES).toString('utf-8'));
  } catch (error) {
    throw new IndexError(`Entry cache is corrupted: ${toError(error).message}`, { cause: error });
  }
  const result = PayloadSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new IndexError(`Entry cache is corrupted: ${issue.path.join('.')}: ${issue.message}`);
  }

  return {
    schemaVersion,
    fingerprint: result.data.fingerprint,
    writtenAt: result.data.writtenAt,
    records: result.data.records.map((record): CacheRecord => ({
      sourcePath: record.sourcePath,
      mtimeMs: record.mtimeMs,
      outcome:
        record.outcome.kind === 'entry'
          ? { kind: 'entry', entry: freezeEntry(record.outcome.entry) }
          : record.outcome,
    })),
  };
}

export async function loadEntryCache(cachePath: string): Promise<EntryCacheFile | null> {
  let data: Buffer;
  try {
    data = await fs.readFile(cachePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new IndexError(`Cannot read entry cache ${cachePath}`, { cause: error });
  }
  return decodeEntryCache(data);
}

export async function saveEntryCache(
  cachePath: string,
  file: Omit<EntryCacheFile, 'schemaVersion'>,
): Promise<void> {
  await atomicWrite(cachePath, encodeEntryCache(file));
}

/**
 * In-memory view of cached parse outcomes, keyed by source path.
 * A record only matches when the file's modification time is unchanged.
 */
export class EntryCache implements OutcomeCache {
  private readonly records = new Map<string, CacheRecord>();

  constructor(records: Iterable<CacheRecord> = []) {
    for (const record of records) {
      this.records.set(record.sourcePath, record);
    }
  }

  get(sourcePath: string, mtimeMs: number): CachedOutcome | undefined {
    const record = this.records.get(sourcePath);
    return record && record.mtimeMs === mtimeMs ? record.outcome : undefined;
  }

  set(record: CacheRecord): void {
    this.records.set(record.sourcePath, record);
  }

  delete(sourcePath: string): void {
    this.records.delete(sourcePath);
  }

  clear(): void {
    this.records.clear();
  }

  /** Records ordered by source path */
  list(): CacheRecord[] {
    return [...this.records.values()].sort((a, b) =>
      a.sourcePath < b.sourcePath ? -1 : a.sourcePath > b.sourcePath ? 1 : 0,
    );
  }

  get size(): number {
    return this.records.size;
  }
}
