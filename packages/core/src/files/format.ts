/**
 * Human-readable sizes, durations and progress bars for chat messages.
 */

import { PROGRESS_BAR_WIDTH } from '../config/defaults.js';

const UNIT = 1024;
const UNIT_PREFIXES = 'KMGTPE';

/**
 * 1024-based size with one decimal: `512 B`, `1.5 KB`, `2.0 GB`.
 */
export function formatBytes(bytes: number): string {
  if (bytes < UNIT) return `${bytes} B`;

  let div = UNIT;
  let exp = 0;
  for (let n = Math.floor(bytes / UNIT); n >= UNIT && exp < UNIT_PREFIXES.length - 1; n = Math.floor(n / UNIT)) {
    div *= UNIT;
    exp++;
  }
  return `${(bytes / div).toFixed(1)} ${UNIT_PREFIXES.charAt(exp)}B`;
}

/**
 * Whole-unit duration: `45s`, `2m 5s`, `1h 3m`.
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  if (totalSeconds < 60) return `${totalSeconds}s`;

  if (totalSeconds < 3600) {
    return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
  }
  return `${Math.floor(totalSeconds / 3600)}h ${Math.floor((totalSeconds % 3600) / 60)}m`;
}

/**
 * `[█████░░░…]` with `PROGRESS_BAR_WIDTH` slots. Out-of-range input is clamped.
 */
export function renderProgressBar(percent: number, width: number = PROGRESS_BAR_WIDTH): string {
  const clamped = Math.min(100, Math.max(0, percent));
  const filled = Math.floor((clamped / 100) * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}]`;
}
