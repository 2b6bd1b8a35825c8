import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { ConsoleLogger } from '@swiftlaunch/shared';
import { DirectoryWatcher, type WatchFn } from './watcher';
import type { FileChange } from '../scanner/types';

type Emit = (kind: FileChange['kind'], relativePath: string) => void;

function fakeWatch() {
  const emitters = new Map<string, Emit>();
  const errorHandlers = new Map<string, (error: Error) => void>();
  const closed: string[] = [];
  const watch: WatchFn = (directory, onEvent, onError) => {
    if (directory.includes('missing')) {
      throw new Error('ENOENT: no such file or directory');
    }
    emitters.set(directory, onEvent);
    errorHandlers.set(directory, onError);
    return { close: () => closed.push(directory) };
  };
  return { watch, emitters, errorHandlers, closed };
}

describe('DirectoryWatcher', () => {
  const logger = new ConsoleLogger('silent');

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('delivers one debounced batch per burst of changes', async () => {
    const fake = fakeWatch();
    const batches: FileChange[][] = [];
    const watcher = new DirectoryWatcher({ debounceMs: 100, logger, watch: fake.watch });
    watcher.start(['/apps'], (changes) => {
      batches.push(changes);
    });
    const emit = fake.emitters.get('/apps');

    emit?.('modified', 'files.desktop');
    await vi.advanceTimersByTimeAsync(60);
    emit?.('renamed', 'firefox.desktop');
    emit?.('renamed', 'files.desktop');
    await vi.advanceTimersByTimeAsync(60);
    expect(batches).toEqual([]);

    await vi.advanceTimersByTimeAsync(50);
    expect(batches).toEqual([
      [
        { path: path.join('/apps', 'files.desktop'), kind: 'renamed' },
        { path: path.join('/apps', 'firefox.desktop'), kind: 'renamed' },
      ],
    ]);
    await watcher.close();
  });

  it('skips directories that cannot be watched', () => {
    const fake = fakeWatch();
    const warn = vi.spyOn(logger, 'warn');
    const watcher = new DirectoryWatcher({ debounceMs: 10, logger, watch: fake.watch });

    const watched = watcher.start(['/missing', '/apps'], () => undefined);

    expect(watched).toEqual(['/apps']);
    expect(warn).toHaveBeenCalledWith('Cannot watch /missing: ENOENT: no such file or directory');
    warn.mockRestore();
  });

  it('logs a failing batch and keeps delivering later ones', async () => {
    const fake = fakeWatch();
    const error = vi.spyOn(logger, 'error');
    const seen: string[] = [];
    const watcher = new DirectoryWatcher({ debounceMs: 10, logger, watch: fake.watch });
    let calls = 0;
    watcher.start(['/apps'], async (changes) => {
      calls += 1;
      if (calls === 1) throw new Error('index busy');
      seen.push(...changes.map((c) => path.basename(c.path)));
    });
    const emit = fake.emitters.get('/apps');

    emit?.('modified', 'a.desktop');
    await vi.advanceTimersByTimeAsync(10);
    emit?.('modified', 'b.desktop');
    await vi.advanceTimersByTimeAsync(10);

    expect(seen).toEqual(['b.desktop']);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][1]).toBe('Applying watched changes failed');
    error.mockRestore();
    await watcher.close();
  });

  it('flushes on demand and closes every handle', async () => {
    const fake = fakeWatch();
    const batches: FileChange[][] = [];
    const watcher = new DirectoryWatcher({ debounceMs: 1000, logger, watch: fake.watch });
    const onBatch = (changes: FileChange[]) => {
      batches.push(changes);
    };
    watcher.start(['/a', '/b'], onBatch);

    fake.emitters.get('/b')?.('modified', 'x.desktop');
    await watcher.flush(onBatch);
    await watcher.close();

    expect(batches).toEqual([[{ path: path.join('/b', 'x.desktop'), kind: 'modified' }]]);
    expect(fake.closed).toEqual(['/a', '/b']);
  });

  it('reports watch errors as warnings', () => {
    const fake = fakeWatch();
    const warn = vi.spyOn(logger, 'warn');
    const watcher = new DirectoryWatcher({ debounceMs: 10, logger, watch: fake.watch });
    watcher.start(['/apps'], () => undefined);

    fake.errorHandlers.get('/apps')?.(new Error('EMFILE'));

    expect(warn).toHaveBeenCalledWith('Watching /apps failed: EMFILE');
    warn.mockRestore();
  });
});
