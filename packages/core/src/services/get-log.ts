/**
 * Logging Utility
 *
 * Scoped loggers for any module. The CLI installs the root logger once at
 * start-up; until then (and in tests) loggers fall back to the console.
 * Loggers are usually created at module load, before start-up ran, so each
 * one resolves the root logger when it writes rather than when it is created.
 *
 * Usage:
 *   import { getLog } from '@docdrop/core';
 *   const log = getLog('Orchestrator');
 *   log.info('Saved document', { path: '/downloads/report.pdf' });
 */

import type { ILogService, LogLevel } from './log-service.js';

let rootLogger: ILogService | null = null;
const scopedLoggers = new Map<string, ILogService>();

const CONSOLE_METHODS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function createScopedLogger(module: string): ILogService {
  let bound: { root: ILogService; logger: ILogService } | null = null;

  const resolve = (): ILogService | null => {
    if (!rootLogger) return null;
    if (bound?.root !== rootLogger) {
      bound = { root: rootLogger, logger: rootLogger.child(module) };
    }
    return bound.logger;
  };

  const write = (level: LogLevel, msg: string, data?: unknown): void => {
    const target = resolve();
    if (target) {
      target[level](msg, data);
    } else if (data) {
      CONSOLE_METHODS[level](`[${module}]`, msg, data);
    } else {
      CONSOLE_METHODS[level](`[${module}]`, msg);
    }
  };

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data),
    child: (sub) => getLog(`${module}:${sub}`),
  };
}

/**
 * Install the root logger. Every scoped logger writes through its child.
 */
export function configureLogging(logger: ILogService): void {
  rootLogger = logger;
}

/**
 * Remove the root logger (for testing).
 */
export function resetLogging(): void {
  rootLogger = null;
}

export function hasRootLogger(): boolean {
  return rootLogger !== null;
}

/**
 * Get a scoped logger for a module. Loggers are cached by module name.
 */
export function getLog(module: string): ILogService {
  let logger = scopedLoggers.get(module);
  if (!logger) {
    logger = createScopedLogger(module);
    scopedLoggers.set(module, logger);
  }
  return logger;
}
