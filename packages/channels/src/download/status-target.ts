/**
 * The chat message a download reports into, edited in place.
 * Without a message id (the announcement failed) edits are no-ops and the
 * terminal text goes out as a new message.
 */

import { getErrorMessage } from '@docdrop/core';
import type { MessagingTransport, ReplyTarget } from '../types/index.js';
import { getLog } from '../log.js';

const log = getLog('StatusTarget');

export class StatusTarget {
  constructor(
    private readonly transport: MessagingTransport,
    readonly target: ReplyTarget,
    readonly messageId: number | null
  ) {}

  /**
   * Send the first status text. A failed send yields a target without a message.
   */
  static async announce(
    transport: MessagingTransport,
    target: ReplyTarget,
    text: string
  ): Promise<StatusTarget> {
    try {
      const sent = await transport.sendText(target, text);
      return new StatusTarget(transport, target, sent.id);
    } catch (error) {
      log.error('Error sending status message', { error: getErrorMessage(error) });
      return new StatusTarget(transport, target, null);
    }
  }

  /**
   * Replace the status text. Transport failures propagate.
   */
  async edit(text: string): Promise<void> {
    if (this.messageId === null) return;
    await this.transport.editText(this.target, this.messageId, text);
  }

  /**
   * Replace the status text, logging instead of failing.
   */
  async tryEdit(text: string): Promise<void> {
    try {
      await this.edit(text);
    } catch (error) {
      log.warn('Error updating status message', { messageId: this.messageId, error: getErrorMessage(error) });
    }
  }

  /**
   * Deliver the terminal text regardless of earlier failures.
   */
  async finish(text: string): Promise<void> {
    if (this.messageId !== null) {
      await this.tryEdit(text);
      return;
    }
    try {
      await this.transport.sendText(this.target, text);
    } catch (error) {
      log.error('Error sending final status message', { error: getErrorMessage(error) });
    }
  }
}
