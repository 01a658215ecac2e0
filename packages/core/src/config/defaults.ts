/**
 * Default Configuration
 *
 * Named constants for all tunable values.
 * Import these instead of using inline magic numbers.
 */

// ============================================================================
// Documents
// ============================================================================

/** Largest document accepted unless overridden (bytes) */
export const MAX_FILE_SIZE_BYTES = 2 * 1024 * 1024 * 1024; // 2 GiB

/** Name used when sanitization leaves nothing */
export const UNNAMED_FILE_PLACEHOLDER = 'unnamed_file';

/** Prefix of the name synthesized for documents that declare none */
export const SYNTHESIZED_NAME_PREFIX = 'document_';

/** Bytes requested per download chunk */
export const DOWNLOAD_REQUEST_SIZE_BYTES = 512 * 1024;

// ============================================================================
// Progress
// ============================================================================

/** Minimum gap between two progress edits (ms) */
export const PROGRESS_THROTTLE_MS = 2_000;

/** Number of slots in the rendered progress bar */
export const PROGRESS_BAR_WIDTH = 20;

// ============================================================================
// Credentials
// ============================================================================

/** How long a secret file is waited for before start-up fails (ms) */
export const SECRET_WAIT_TIMEOUT_MS = 300_000;

/** Gap between two checks of a secret file (ms) */
export const SECRET_POLL_INTERVAL_MS = 500;

/** Default secret-exchange and session file names */
export const DEFAULT_SESSION_FILE = 'session.txt';
export const DEFAULT_CODE_FILE = 'telegram_code.txt';
export const DEFAULT_PASSWORD_FILE = 'telegram_password.txt';

// ============================================================================
// Transport
// ============================================================================

/** Reconnect attempts before the transport gives up */
export const CONNECTION_RETRIES = 5;

/** Flood waits up to this many seconds are slept through automatically */
export const FLOOD_SLEEP_THRESHOLD_SECONDS = 60;

/** How long shutdown waits for the cancelled download to report before disconnecting (ms) */
export const SHUTDOWN_GRACE_MS = 5_000;
