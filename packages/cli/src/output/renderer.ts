import pc from 'picocolors';
import { printTable } from './table';

export interface ResultRow {
  appId: string;
  candidate: { id: string; title: string; subtitle?: string };
  score: number;
}

/** The parts of a session view the CLI shows; daemon and standalone views both fit. */
export interface ViewLike {
  sessionId: string;
  query: string;
  selection: number;
  error: string | null;
  results: readonly ResultRow[];
}

export interface ScanLike {
  generation: number;
  added: number;
  updated: number;
  removed: number;
  entries: number;
  reused: number;
  skipped: number;
  durationMs: number;
}

export interface StatusLike {
  uptimeMs: number;
  index: {
    generation: number;
    entries: number;
    directories: readonly string[];
    pendingTasks: number;
    lastScan: ScanLike | null;
    restartPending: boolean;
  };
  apps: readonly string[];
  sessions: number;
  watched: readonly string[];
}

export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  results(view: ViewLike): void {
    if (this.isJson) {
      this.json({
        query: view.query,
        results: view.results.map((row, index) => ({
          rank: index + 1,
          app: row.appId,
          id: row.candidate.id,
          title: row.candidate.title,
          subtitle: row.candidate.subtitle,
          score: Math.round(row.score),
        })),
      });
      return;
    }

    if (view.results.length === 0) {
      console.log(pc.yellow(`No results for "${view.query}".`));
      return;
    }
    printTable(
      view.results.map((row, index) => ({
        rank: index + 1,
        title: row.candidate.title,
        app: row.appId,
        score: Math.round(row.score),
      })),
      { head: ['#', 'Title', 'App', 'Score'], colAligns: ['right', 'left', 'left', 'right'] },
    );
  }

  launched(row: ResultRow, pid: number | undefined): void {
    if (this.isJson) {
      this.json({ launched: { app: row.appId, id: row.candidate.id, title: row.candidate.title, pid } });
      return;
    }
    const suffix = pid === undefined ? '' : ` (pid ${pid})`;
    console.log(`${pc.green('✔')} Launched ${row.candidate.title}${suffix}`);
  }

  pong(result: { protocol: number; pid: number }): void {
    if (this.isJson) {
      this.json(result);
      return;
    }
    console.log(`${pc.green('✔')} Daemon is running (pid ${result.pid}, protocol ${result.protocol})`);
  }

  status(status: StatusLike): void {
    if (this.isJson) {
      this.json(status);
      return;
    }
    const { index } = status;
    printTable(
      [
        { key: 'Generation', value: index.generation },
        { key: 'Entries', value: index.entries },
        { key: 'Directories', value: index.directories.join('\n') || '-' },
        { key: 'Watched', value: status.watched.join('\n') || '-' },
        { key: 'Apps', value: status.apps.join(', ') || '-' },
        { key: 'Sessions', value: status.sessions },
        { key: 'Pending tasks', value: index.pendingTasks },
        { key: 'Uptime', value: `${Math.round(status.uptimeMs / 1000)}s` },
      ],
      { head: ['Metric', 'Value'], colAligns: ['right', 'left'] },
    );
    if (index.restartPending) {
      console.log(pc.yellow('A failed scan task is waiting to be retried.'));
    }
  }

  rescan(summary: ScanLike | null): void {
    if (this.isJson) {
      this.json({ rescan: summary });
      return;
    }
    if (!summary) {
      console.log(pc.yellow('Rescan failed; the daemon retries it after a delay.'));
      return;
    }
    console.log(
      `${pc.green('✔')} Indexed ${summary.entries} entries at generation ${summary.generation} ` +
        `(+${summary.added} ~${summary.updated} -${summary.removed}, ${summary.skipped} skipped)`,
    );
  }

  private json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}
