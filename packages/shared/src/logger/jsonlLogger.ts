import * as fs from 'fs/promises';
import type { LauncherEvent } from '../types/events';
import { prefixMessage } from './consoleLogger';
import { isLevelEnabled, type Logger, type LogLevel } from './types';

/**
 * Appends structured events to a JSON-lines file; plain messages go to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly level: LogLevel;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, level: LogLevel = 'info') {
    this.filePath = filePath;
    this.bindings = bindings;
    this.level = level;
  }

  async log(event: LauncherEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // The daemon keeps running when its event log is unwritable.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: LauncherEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    if (isLevelEnabled('debug', this.level)) {
      console.debug(prefixMessage(this.bindings, message));
    }
  }

  info(message: string): void {
    if (isLevelEnabled('info', this.level)) {
      console.info(prefixMessage(this.bindings, message));
    }
  }

  warn(message: string): void {
    if (isLevelEnabled('warn', this.level)) {
      console.warn(prefixMessage(this.bindings, message));
    }
  }

  error(error: Error, message?: string): void {
    if (!isLevelEnabled('error', this.level)) {
      return;
    }
    if (message) {
      console.error(prefixMessage(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.level);
  }
}
