import type { Logger } from './types';

export type LogLevel = 'debug' | 'info';

export class ConsoleLogger implements Logger {
  constructor(private scope?: string, private level: LogLevel = 'info') {}

  info(message: string, ...args: unknown[]): void {
    console.log(this.format('INFO', message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.format('WARN', message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.format('ERROR', message), ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level !== 'debug') return;
    console.debug(this.format('DEBUG', message), ...args);
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.scope ? `${this.scope}:${scope}` : scope, this.level);
  }

  private format(tag: string, message: string): string {
    return this.scope ? `[${tag}] [${this.scope}] ${message}` : `[${tag}] ${message}`;
  }
}

export function parseLogLevel(value: string | undefined): LogLevel {
  return value?.trim().toLowerCase() === 'debug' ? 'debug' : 'info';
}
