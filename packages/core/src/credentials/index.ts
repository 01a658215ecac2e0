/**
 * Credential acquisition through secret-exchange files
 */

export { awaitSecret, type AwaitSecretOptions } from './secret-file.js';
