import { Logger } from '../../src/common/logger';

/**
 * Lightweight spy logger for capturing logs during testing
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntry {
  level: LogLevel;
  message: string;
  args: unknown[];
  timestamp: number;
}

export class SpyLogger implements Logger {
  private logs: LogEntry[] = [];

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    this.logs.push({ level, message, args, timestamp: Date.now() });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(entry => entry.level === level) : this.logs.slice();
  }

  getMessages(level?: LogLevel): string[] {
    return this.getLogs(level).map(entry => entry.message);
  }

  clear(): void {
    this.logs = [];
  }
}
