/**
 * LogService Implementation
 *
 * Two output modes:
 * - Development: human-readable output with module prefix
 * - Production: one JSON object per line
 *
 * Usage:
 *   const log = createLogService({ level: config.debug ? 'debug' : 'info' });
 *   log.child('Agent').info('Logged in', { userId: '1001' });
 *   // Dev:  [Agent] Logged in { userId: '1001' }
 *   // Prod: {"level":"info","ts":"...","module":"Agent","msg":"Logged in","userId":"1001"}
 */

import type { ILogService, LogLevel } from './log-service.js';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Telegram identifiers are bigints; JSON.stringify rejects them otherwise. */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

export class LogService implements ILogService {
  private readonly levelName: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.levelName = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? process.env.NODE_ENV === 'production';
  }

  get level(): LogLevel {
    return this.levelName;
  }

  debug(message: string, data?: unknown): void {
    if (this.enabled('debug')) this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    if (this.enabled('info')) this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    if (this.enabled('warn')) this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.levelName,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[this.levelName] <= LOG_LEVELS[level];
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    const fn = level === 'error'
      ? console.error
      : level === 'warn'
        ? console.warn
        : level === 'debug'
          ? console.debug
          : console.log;

    if (this.json) {
      const record = data && typeof data === 'object' && !Array.isArray(data) && !(data instanceof Error)
        ? data
        : data !== undefined ? { data } : {};
      fn(JSON.stringify({
        level,
        ts: new Date().toISOString(),
        ...(this.module ? { module: this.module } : {}),
        msg: message,
        ...record,
      }, jsonReplacer));
      return;
    }

    const prefix = this.module ? `[${this.module}] ` : '';
    if (data !== undefined) {
      fn(`${prefix}${message}`, data);
    } else {
      fn(`${prefix}${message}`);
    }
  }
}

/**
 * Create a new LogService instance.
 */
export function createLogService(options?: LogServiceOptions): LogService {
  return new LogService(options);
}
