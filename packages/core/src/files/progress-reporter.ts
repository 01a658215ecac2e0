/**
 * ProgressReporter
 *
 * Byte sink decorator: every chunk goes to the wrapped sink, and at most once
 * per throttle window a status text is handed to `emit` (usually an edit of
 * the chat status message).
 */

import { PROGRESS_THROTTLE_MS } from '../config/defaults.js';
import { getLog } from '../services/get-log.js';
import { getErrorMessage } from '../types/errors.js';
import { formatBytes, formatDuration, renderProgressBar } from './format.js';

const log = getLog('ProgressReporter');

export interface ByteSink {
  write(chunk: Uint8Array): Promise<void>;
}

export interface ProgressReporterOptions {
  fileName: string;
  /** Expected size in bytes; 0 or less when unknown */
  total: number;
  sink: ByteSink;
  emit: (text: string) => Promise<void>;
  throttleMs?: number;
  now?: () => number;
}

export interface TransferSummary {
  bytes: number;
  elapsedMs: number;
  averageBytesPerSecond: number;
}

export interface ProgressSnapshot {
  fileName: string;
  current: number;
  total: number;
  elapsedMs: number;
}

/**
 * Status text for a transfer in flight.
 */
export function formatProgress({ fileName, current, total, elapsedMs }: ProgressSnapshot): string {
  if (total <= 0) {
    return `📥 Downloading: ${fileName}\n🔄 Progress: ${formatBytes(current)} downloaded\n⏱️ In progress...`;
  }

  const percent = Math.min(100, (current / total) * 100);
  let eta = '';
  if (current > 0 && elapsedMs > 0) {
    const remaining = Math.max(0, total - current);
    eta = ` • ETA: ${formatDuration((remaining * elapsedMs) / current)}`;
  }

  return (
    `📥 Downloading: ${fileName}\n` +
    `${renderProgressBar(percent)} ${percent.toFixed(1)}%\n` +
    `📊 ${formatBytes(current)} / ${formatBytes(total)}${eta}`
  );
}

export class ProgressReporter implements ByteSink {
  private readonly options: ProgressReporterOptions;
  private readonly now: () => number;
  private readonly throttleMs: number;
  private readonly startedAt: number;
  private lastEmitAt: number;
  private current = 0;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.throttleMs = options.throttleMs ?? PROGRESS_THROTTLE_MS;
    this.startedAt = this.now();
    this.lastEmitAt = this.startedAt;
  }

  get bytesWritten(): number {
    return this.current;
  }

  async write(chunk: Uint8Array): Promise<void> {
    await this.options.sink.write(chunk);
    this.current += chunk.byteLength;

    const at = this.now();
    if (at - this.lastEmitAt > this.throttleMs) {
      this.lastEmitAt = at;
      await this.emitSafely(
        formatProgress({
          fileName: this.options.fileName,
          current: this.current,
          total: this.options.total,
          elapsedMs: at - this.startedAt,
        })
      );
    }
  }

  summary(): TransferSummary {
    const elapsedMs = this.now() - this.startedAt;
    const averageBytesPerSecond =
      elapsedMs > 0 ? Math.floor(this.current / (elapsedMs / 1000)) : this.current;
    return { bytes: this.current, elapsedMs, averageBytesPerSecond };
  }

  private async emitSafely(text: string): Promise<void> {
    try {
      await this.options.emit(text);
    } catch (error) {
      log.warn('Failed to update progress', {
        fileName: this.options.fileName,
        error: getErrorMessage(error),
      });
    }
  }
}
