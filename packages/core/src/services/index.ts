/**
 * Services exports
 */

// Logging
export type { ILogService, LogLevel } from './log-service.js';
export { LogService, createLogService, type LogServiceOptions } from './log-service-impl.js';
export { getLog, configureLogging, resetLogging, hasRootLogger } from './get-log.js';
