import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { QueryCancelled } from '../types/events';

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  const event: QueryCancelled = {
    schemaVersion: 1,
    timestamp: '2023-01-01T00:00:00Z',
    type: 'QueryCancelled',
    payload: { sessionId: 's-1', token: 4, query: 'fir' },
  };

  it('appends events to the file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'swiftlaunch-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    const later = { ...event, timestamp: '2023-01-01T00:00:01Z' };
    await logger.log(event);
    await logger.trace(later, 'ignored message');

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(event);
    expect(JSON.parse(lines[1])).toEqual(later);
  });

  it('reports write failures on stderr instead of throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new JsonlLogger(path.join(os.tmpdir(), 'missing-dir-for-jsonl', 'x', 'events.jsonl'));

    await expect(logger.log(event)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('prefixes console messages with child bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = new JsonlLogger('/unused.jsonl').child({ session: 's-1' });
    logger.info('opened');
    logger.debug('hidden at info level');

    expect(infoSpy).toHaveBeenCalledWith('[session=s-1] opened');
    expect(debugSpy).not.toHaveBeenCalled();
  });
});
