/**
 * ILogService - Structured Logging Interface
 *
 * Every module logs through a scoped child of one root logger:
 *
 *   const log = getLog('Router');
 *   log.info('Ignoring message from unauthorized user', { senderId: '42' });
 *   // Output: [Router] Ignoring message from unauthorized user { senderId: '42' }
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
