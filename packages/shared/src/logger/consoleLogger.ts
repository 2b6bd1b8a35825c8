import type { LauncherEvent } from '../types/events';
import { isLevelEnabled, type Logger, type LogLevel } from './types';

export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  log(event: LauncherEvent): void {
    if (isLevelEnabled('debug', this.level)) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: LauncherEvent, message: string): void {
    if (isLevelEnabled('info', this.level)) {
      console.log(message, JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (isLevelEnabled('debug', this.level)) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (isLevelEnabled('info', this.level)) {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (isLevelEnabled('warn', this.level)) {
      console.warn(message);
    }
  }

  error(error: Error, message?: string): void {
    if (!isLevelEnabled('error', this.level)) {
      return;
    }
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: LauncherEvent) {
    return this.base.log(event);
  }

  trace(event: LauncherEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    return prefixMessage(this.bindings, message);
  }
}

export function prefixMessage(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
