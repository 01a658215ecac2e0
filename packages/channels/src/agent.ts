/**
 * Document agent
 *
 * Owns the transport, the router, the orchestrator and the intake queue, and
 * runs them for the lifetime of the process.
 */

import { SHUTDOWN_GRACE_MS, getErrorMessage, raceAbort } from '@docdrop/core';
import type { AccountInfo, DownloaderConfig, InboundUpdate, MessagingTransport } from './types/index.js';
import { createRouter, type AuthorizationRouter } from './routing/index.js';
import { createOrchestrator, type DownloadOrchestrator, type DownloadResult } from './download/index.js';
import { UpdateQueue } from './intake/update-queue.js';
import { sendGreeting } from './intake/greeting.js';
import { getLog } from './log.js';

const log = getLog('DocumentAgent');

/**
 * Document agent options
 */
export interface DocumentAgentOptions {
  config: DownloaderConfig;
  transport: MessagingTransport;
  /** Send the start-up greeting (default true) */
  greet?: boolean;
  /** Clock used for progress throttling and speed figures */
  now?: () => number;
  /** Upper bound on waiting for in-flight work during stop() */
  shutdownGraceMs?: number;
}

export class DocumentAgent {
  private readonly config: DownloaderConfig;
  private readonly transport: MessagingTransport;
  private readonly router: AuthorizationRouter;
  private readonly orchestrator: DownloadOrchestrator;
  private readonly queue: UpdateQueue<InboundUpdate>;
  private readonly shutdown = new AbortController();
  private readonly greet: boolean;
  private readonly shutdownGraceMs: number;
  private isRunning = false;

  constructor(options: DocumentAgentOptions) {
    this.config = options.config;
    this.transport = options.transport;
    this.greet = options.greet ?? true;
    this.shutdownGraceMs = options.shutdownGraceMs ?? SHUTDOWN_GRACE_MS;
    this.router = createRouter({ allowedUserId: this.config.allowedUserId, routing: this.config.routing });
    this.orchestrator = createOrchestrator({
      transport: this.transport,
      downloadFolder: this.config.downloadFolder,
      allowedExtensions: this.config.allowedExtensions,
      maxFileSize: this.config.maxFileSize,
      now: options.now,
    });
    this.queue = new UpdateQueue(async (update) => {
      await this.process(update);
    });
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Connect, authenticate, greet and start consuming updates.
   */
  async start(): Promise<AccountInfo> {
    if (this.isRunning) {
      throw new Error('Document agent is already running');
    }

    const account = await this.transport.connect();
    const name = account.username ? `@${account.username}` : (account.firstName ?? 'unknown');
    log.info(`Logged in as: ${name} (ID: ${account.id})`);

    if (this.greet) {
      await sendGreeting(this.transport, this.config);
    }

    this.transport.onUpdate((update) => this.queue.enqueue(update));
    this.isRunning = true;

    const where =
      this.config.routing.kind === 'container'
        ? `${this.config.routing.container.kind} ${this.config.routing.container.id}`
        : 'direct messages';
    log.info(`Monitoring ${where} for documents from user ${this.config.allowedUserId}`);
    return account;
  }

  /**
   * Route one update and download its document if it is accepted.
   * Resolves with the download result, or null when the update was ignored.
   */
  async process(update: InboundUpdate): Promise<DownloadResult | null> {
    const decision = this.router.route(update);
    if (decision.status === 'rejected') return null;

    const result = await this.orchestrator.handle(decision, this.shutdown.signal);
    if (!result.ok) {
      log.warn(`Error handling message ${update.messageId}: ${result.error.message}`);
    }
    return result;
  }

  /**
   * Resolves once every received update has been processed.
   */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /**
   * Cancel the download in progress, drop pending updates and disconnect.
   * Disconnects after the grace period even if the cancelled download has
   * not finished reporting.
   */
  async stop(): Promise<void> {
    this.shutdown.abort(new Error('Document agent stopping'));
    try {
      await raceAbort(this.queue.stop(), AbortSignal.timeout(this.shutdownGraceMs));
    } catch (error) {
      log.warn('Pending work did not finish in time, disconnecting anyway', {
        graceMs: this.shutdownGraceMs,
        error: getErrorMessage(error),
      });
    }

    try {
      await this.transport.disconnect();
    } catch (error) {
      log.error('Error disconnecting', { error: getErrorMessage(error) });
    }

    this.isRunning = false;
    log.info('Document agent stopped');
  }
}

/**
 * Create a document agent instance
 */
export function createDocumentAgent(options: DocumentAgentOptions): DocumentAgent {
  return new DocumentAgent(options);
}
