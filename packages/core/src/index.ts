/**
 * @docdrop/core
 *
 * Transport-free building blocks of the document agent.
 * Uses only Node.js built-in modules.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Defaults
export * from './config/defaults.js';

// Logging
export * from './services/index.js';

// Filenames, formatting, progress
export * from './files/index.js';

// Secret-exchange files
export * from './credentials/index.js';
