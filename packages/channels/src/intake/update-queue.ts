/**
 * Update intake queue
 *
 * Single FIFO between the transport's event callback and the document
 * pipeline. One consumer runs at a time, so updates are handled strictly in
 * arrival order and a failing item never stops the ones behind it.
 */

import { getErrorMessage } from '@docdrop/core';
import { getLog } from '../log.js';

const log = getLog('UpdateQueue');

export class UpdateQueue<T> {
  private readonly items: Array<{ item: T }> = [];
  private draining: Promise<void> | null = null;
  private stopped = false;

  constructor(private readonly consumer: (item: T) => Promise<void>) {}

  get size(): number {
    return this.items.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  enqueue(item: T): void {
    if (this.stopped) {
      log.debug('Queue stopped, dropping update');
      return;
    }
    this.items.push({ item });
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  /**
   * Resolves once every queued item has been consumed.
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Drop pending items and wait for the one in progress.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    const dropped = this.items.splice(0).length;
    if (dropped > 0) {
      log.info(`Dropped ${dropped} pending update(s)`);
    }
    await this.idle();
  }

  private async drain(): Promise<void> {
    try {
      for (let next = this.items.shift(); next && !this.stopped; next = this.items.shift()) {
        try {
          await this.consumer(next.item);
        } catch (error) {
          log.error('Error processing update', { error: getErrorMessage(error) });
        }
      }
    } finally {
      this.draining = null;
    }
  }
}
