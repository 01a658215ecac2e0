/**
 * Structured error classes for docdrop
 * All errors are serializable and include metadata
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  /** Whether the process must stop (start-up failures) or the loop may continue */
  abstract readonly fatal: boolean;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      timestamp: this.timestamp.toISOString(),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Missing or invalid start-up configuration
 */
export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly fatal = true;
  readonly option?: string;

  constructor(message: string, options?: { option?: string; cause?: unknown }) {
    super(message, options);
    this.option = options?.option;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), option: this.option };
  }
}

/**
 * An operator-supplied secret file never became non-empty before the deadline
 */
export class CredentialTimeoutError extends AppError {
  readonly code = 'CREDENTIAL_TIMEOUT' as const;
  readonly fatal = true;
  readonly path: string;
  readonly timeoutMs: number;

  constructor(path: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Timed out after ${timeoutMs}ms waiting for file: ${path}`, options);
    this.path = path;
    this.timeoutMs = timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path, timeoutMs: this.timeoutMs };
  }
}

/**
 * A secret file exists but could not be read
 */
export class CredentialError extends AppError {
  readonly code = 'CREDENTIAL_ERROR' as const;
  readonly fatal = true;
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path };
  }
}

/**
 * The login handshake failed or asked for something this agent cannot provide
 */
export class AuthenticationError extends AppError {
  readonly code = 'AUTHENTICATION_ERROR' as const;
  readonly fatal = true;

  constructor(message: string = 'Authentication failed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type RejectionReason = 'extension' | 'size';

/**
 * A document was refused before any byte was transferred
 */
export class DocumentRejectedError extends AppError {
  readonly code = 'DOCUMENT_REJECTED' as const;
  readonly fatal = false;
  readonly reason: RejectionReason;
  readonly fileName: string;

  constructor(reason: RejectionReason, fileName: string, message: string) {
    super(message);
    this.reason = reason;
    this.fileName = fileName;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason, fileName: this.fileName };
  }
}

export type TransferFailureKind = 'network' | 'disk' | 'cancelled';

/**
 * A transfer started but did not complete
 */
export class TransferError extends AppError {
  readonly code = 'TRANSFER_ERROR' as const;
  readonly fatal = false;
  readonly kind: TransferFailureKind;
  readonly path?: string;

  constructor(kind: TransferFailureKind, message: string, options?: { path?: string; cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.path = options?.path;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind, path: this.path };
  }
}

/**
 * Operation abandoned because its AbortSignal fired
 */
export class OperationCancelledError extends AppError {
  readonly code = 'CANCELLED' as const;
  readonly fatal = false;
  readonly operation: string;

  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Operation cancelled: ${operation}`, options);
    this.operation = operation;
  }
}

/**
 * Extract error message from an unknown catch value.
 * Without a fallback, stringifies non-Error values via String().
 * With a fallback, returns the fallback for non-Error values.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}

/**
 * Node's system errors carry a string `code` (ENOENT, EEXIST, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if an error is a fatal start-up failure
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof AppError && error.fatal;
}
