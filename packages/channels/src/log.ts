/**
 * Logging utility, re-exported from @docdrop/core
 *
 * Usage:
 *   import { getLog } from './log.js';
 *   const log = getLog('Router');
 */

export { getLog } from '@docdrop/core';
