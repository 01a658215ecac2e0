/**
 * Secret-exchange files
 *
 * During login the operator drops a one-time secret (login code, second-factor
 * password) into a known file. `awaitSecret` polls that file until it holds
 * something, consumes it, and gives up after a fixed deadline.
 */

import { readFile, rm } from 'node:fs/promises';
import { SECRET_POLL_INTERVAL_MS, SECRET_WAIT_TIMEOUT_MS } from '../config/defaults.js';
import { getLog } from '../services/get-log.js';
import {
  CredentialError,
  CredentialTimeoutError,
  OperationCancelledError,
  getErrorCode,
  getErrorMessage,
} from '../types/errors.js';
import { sleep as defaultSleep } from '../types/utility.js';

const log = getLog('CredentialGate');

export interface AwaitSecretOptions {
  /** Give up after this long (default 5 minutes) */
  timeoutMs?: number;
  /** Gap between two reads (default 500 ms) */
  pollIntervalMs?: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function readIfPresent(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return null;
    throw new CredentialError(path, `Failed to read file ${path}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

async function consume(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    log.error('Failed to delete secret file after reading it', { path, error: getErrorMessage(error) });
  }
}

/**
 * Wait for `path` to hold non-empty text, delete it and return the trimmed text.
 *
 * @throws CredentialTimeoutError when the deadline passes first
 * @throws CredentialError when the file exists but cannot be read
 * @throws OperationCancelledError when `signal` aborts
 */
export async function awaitSecret(path: string, options: AwaitSecretOptions = {}): Promise<string> {
  const {
    timeoutMs = SECRET_WAIT_TIMEOUT_MS,
    pollIntervalMs = SECRET_POLL_INTERVAL_MS,
    signal,
    now = Date.now,
    sleep = defaultSleep,
  } = options;

  const deadline = now() + timeoutMs;
  let reportedEmpty = false;
  log.info(`Waiting for ${path} (timeout ${Math.round(timeoutMs / 1000)}s)`);

  for (;;) {
    if (signal?.aborted) {
      throw new OperationCancelledError(`wait for ${path}`, { cause: signal.reason });
    }

    const content = await readIfPresent(path);
    if (content !== null) {
      const secret = content.trim();
      if (secret !== '') {
        await consume(path);
        log.info(`Read and removed ${path}`);
        return secret;
      }
      if (!reportedEmpty) {
        log.debug(`File ${path} is empty, waiting for content...`);
        reportedEmpty = true;
      }
    }

    if (now() >= deadline) {
      throw new CredentialTimeoutError(path, timeoutMs);
    }

    try {
      await sleep(pollIntervalMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError(`wait for ${path}`, { cause: error });
      }
      throw error;
    }
  }
}
