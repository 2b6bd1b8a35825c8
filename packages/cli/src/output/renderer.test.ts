import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OutputRenderer } from './renderer';

const files = { appId: 'launcher', candidate: { id: 'files.desktop', title: 'Files' }, score: 1000 };

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(): string {
    expect(logSpy).toHaveBeenCalledTimes(1);
    return String(logSpy.mock.calls[0][0]);
  }

  it('says so when a query has no results', () => {
    new OutputRenderer(false).results({ sessionId: 's', query: 'zz', selection: 0, error: null, results: [] });

    expect(printed()).toContain('No results for "zz".');
  });

  it('reports a launch with its pid', () => {
    new OutputRenderer(false).launched(files, 99);

    expect(printed()).toContain('Launched Files (pid 99)');
  });

  it('reports a rescan summary', () => {
    new OutputRenderer(false).rescan({
      generation: 3,
      added: 1,
      updated: 2,
      removed: 0,
      entries: 40,
      reused: 37,
      skipped: 1,
      durationMs: 12,
    });

    expect(printed()).toContain('Indexed 40 entries at generation 3 (+1 ~2 -0, 1 skipped)');
  });

  it('wraps a failed rescan in JSON mode', () => {
    new OutputRenderer(true).rescan(null);

    expect(JSON.parse(printed())).toEqual({ rescan: null });
  });

  it('lists index status as a metric table', () => {
    new OutputRenderer(false).status({
      uptimeMs: 61_400,
      index: {
        generation: 2,
        entries: 4,
        directories: ['/usr/share/applications'],
        pendingTasks: 0,
        lastScan: null,
        restartPending: false,
      },
      apps: ['launcher', 'calc'],
      sessions: 1,
      watched: [],
    });

    const table = printed();
    expect(table).toContain('/usr/share/applications');
    expect(table).toContain('launcher, calc');
    expect(table).toContain('61s');
  });
});
