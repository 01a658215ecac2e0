/**
 * Core types for docdrop
 * @packageDocumentation
 */

// Result pattern
export { type Result, type Ok, type Err, ok, err } from './result.js';

// Error classes
export {
  AppError,
  ConfigurationError,
  CredentialTimeoutError,
  CredentialError,
  AuthenticationError,
  DocumentRejectedError,
  TransferError,
  OperationCancelledError,
  type RejectionReason,
  type TransferFailureKind,
  getErrorMessage,
  getErrorCode,
  isFatalError,
} from './errors.js';

// Async helpers
export { sleep, raceAbort } from './utility.js';
