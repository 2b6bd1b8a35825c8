import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { CacheVersionMismatchError, IndexError } from '@swiftlaunch/shared';
import {
  CACHE_SCHEMA_VERSION,
  EntryCache,
  decodeEntryCache,
  encodeEntryCache,
  loadEntryCache,
  saveEntryCache,
  type CacheRecord,
} from './cache';
import { makeEntry } from '../__fixtures__/entries';

const records: CacheRecord[] = [
  {
    sourcePath: '/apps/files.desktop',
    mtimeMs: 1700000000123.5,
    outcome: {
      kind: 'entry',
      entry: makeEntry('files.desktop', 'Files', { icon: 'files', iconPath: '/icons/files.svg' }),
    },
  },
  {
    sourcePath: '/apps/daemon.desktop',
    mtimeMs: 42,
    outcome: { kind: 'hidden', id: 'daemon.desktop', reason: 'NoDisplay' },
  },
];

describe('entry cache blob', () => {
  it('starts with the magic and schema version', () => {
    const blob = encodeEntryCache({ fingerprint: 'fp', writtenAt: 1, records: [] });
    expect(blob.subarray(0, 4).toString('ascii')).toBe('SWLC');
    expect(blob.readUInt16BE(4)).toBe(CACHE_SCHEMA_VERSION);
    expect(blob.readUInt32BE(6)).toBe(blob.length - 10);
  });

  it('decodes what it encodes', () => {
    const decoded = decodeEntryCache(encodeEntryCache({ fingerprint: 'fp', writtenAt: 7, records }));

    expect(decoded).toEqual({ schemaVersion: 1, fingerprint: 'fp', writtenAt: 7, records });
    const first = decoded.records[0].outcome;
    expect(first.kind === 'entry' && Object.isFrozen(first.entry)).toBe(true);
  });

  it('reports another schema version as a mismatch', () => {
    const blob = encodeEntryCache({ fingerprint: 'fp', writtenAt: 7, records });
    blob.writeUInt16BE(9, 4);

    expect(() => decodeEntryCache(blob)).toThrow(CacheVersionMismatchError);
    expect(() => decodeEntryCache(blob)).toThrow('Unsupported cache schema version: found 9, expected 1.');
  });

  it('rejects damaged blobs', () => {
    const blob = encodeEntryCache({ fingerprint: 'fp', writtenAt: 7, records });

    expect(() => decodeEntryCache(Buffer.from('nope'))).toThrow('Entry cache is corrupted: bad header');
    expect(() => decodeEntryCache(blob.subarray(0, blob.length - 3))).toThrow(IndexError);

    const wrongShape = encodeEntryCache({ fingerprint: 'fp', writtenAt: 7, records: [] });
    const payload = Buffer.from(JSON.stringify({ fingerprint: 'fp', writtenAt: 'yesterday', records: [] }));
    const header = Buffer.from(wrongShape.subarray(0, 10));
    header.writeUInt32BE(payload.length, 6);
    expect(() => decodeEntryCache(Buffer.concat([header, payload]))).toThrow(
      'Entry cache is corrupted: writtenAt: Expected number, received string',
    );
  });
});

describe('loadEntryCache / saveEntryCache', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'swiftlaunch-cache-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns null when there is no cache yet', async () => {
    expect(await loadEntryCache(path.join(tmpDir, 'entries.bin'))).toBeNull();
  });

  it('persists into nested directories', async () => {
    const cachePath = path.join(tmpDir, 'nested', 'entries.bin');
    await saveEntryCache(cachePath, { fingerprint: 'fp', writtenAt: 3, records });

    const loaded = await loadEntryCache(cachePath);
    expect(loaded?.records).toEqual(records);
    expect(await fs.readdir(path.dirname(cachePath))).toEqual(['entries.bin']);
  });
});

describe('EntryCache', () => {
  it('matches only on an unchanged modification time', () => {
    const cache = new EntryCache(records);

    expect(cache.get('/apps/daemon.desktop', 42)).toEqual(records[1].outcome);
    expect(cache.get('/apps/daemon.desktop', 43)).toBeUndefined();
    expect(cache.get('/apps/other.desktop', 42)).toBeUndefined();
  });

  it('lists records by source path', () => {
    const cache = new EntryCache(records);
    cache.delete('/apps/files.desktop');
    cache.set({ sourcePath: '/apps/a.desktop', mtimeMs: 1, outcome: { kind: 'hidden', id: 'a.desktop', reason: 'Hidden' } });

    expect(cache.list().map((r) => r.sourcePath)).toEqual(['/apps/a.desktop', '/apps/daemon.desktop']);
    expect(cache.size).toBe(2);
  });
});
