/**
 * Download orchestrator
 *
 * Runs one accepted document through
 *   Validating → Naming → Announcing → Streaming → Finalizing
 * Rejections and transfer failures are reported in the chat and returned as
 * `err(...)`; nothing thrown here should stop the update loop.
 */

import { basename, join } from 'node:path';
import type { FileHandle } from 'node:fs/promises';
import {
  DocumentRejectedError,
  ProgressReporter,
  SYNTHESIZED_NAME_PREFIX,
  TransferError,
  createUniqueFile,
  err,
  fileExtension,
  getErrorMessage,
  ok,
  raceAbort,
  sanitizeFilename,
  type ByteSink,
  type Result,
} from '@docdrop/core';
import type { InboundDocument, MessagingTransport, ReplyTarget } from '../types/index.js';
import type { RouteDecision } from '../routing/index.js';
import { StatusTarget } from './status-target.js';
import {
  cancelledText,
  connectingText,
  createFailedText,
  diskFailedText,
  extensionRejectedText,
  networkFailedText,
  sizeRejectedText,
  startingText,
  successText,
} from './messages.js';
import { getLog } from '../log.js';

const log = getLog('Orchestrator');

export type AcceptedDocument = Extract<RouteDecision, { status: 'accepted' }>;

export interface DownloadOutcome {
  fileName: string;
  path: string;
  bytes: number;
  elapsedMs: number;
  averageBytesPerSecond: number;
}

export type DownloadResult = Result<DownloadOutcome, DocumentRejectedError | TransferError>;

export interface OrchestratorOptions {
  transport: MessagingTransport;
  downloadFolder: string;
  /** Lower-case, without leading dot. Empty accepts every type. */
  allowedExtensions: readonly string[];
  maxFileSize: number;
  /** Minimum gap between progress edits (ms) */
  throttleMs?: number;
  now?: () => number;
}

/**
 * Declared name, or `document_<id>` when the sender attached none.
 */
export function declaredFileName(document: InboundDocument): string {
  return document.fileName ? document.fileName : `${SYNTHESIZED_NAME_PREFIX}${document.id}`;
}

/**
 * Sink that writes every byte of each chunk to an open file.
 * Failures surface as disk transfer errors.
 */
function fileSink(handle: FileHandle, path: string): ByteSink {
  return {
    async write(chunk) {
      try {
        let offset = 0;
        while (offset < chunk.byteLength) {
          const { bytesWritten } = await handle.write(chunk, offset);
          offset += bytesWritten;
        }
      } catch (error) {
        throw new TransferError('disk', `failed to write ${path}`, { path, cause: error });
      }
    },
  };
}

export class DownloadOrchestrator {
  private readonly transport: MessagingTransport;
  private readonly options: OrchestratorOptions;

  constructor(options: OrchestratorOptions) {
    this.transport = options.transport;
    this.options = options;
  }

  async handle(accepted: AcceptedDocument, signal?: AbortSignal): Promise<DownloadResult> {
    const { document, target, senderId } = accepted;
    const name = declaredFileName(document);
    log.info(`Found document from user ${senderId}: ${name} (size: ${document.size} bytes)`);

    // Validating
    const rejection = this.validate(name, document.size);
    if (rejection) {
      await this.reply(target, rejection.text);
      log.info(`File ${name} rejected: ${rejection.error.message}`);
      return err(rejection.error);
    }

    // Naming
    const safeName = sanitizeFilename(name);
    const basePath = join(this.options.downloadFolder, safeName);

    // Announcing
    const status = await StatusTarget.announce(this.transport, target, startingText(name, document.size));

    // Streaming
    let file: { path: string; handle: FileHandle };
    try {
      file = await createUniqueFile(basePath);
    } catch (error) {
      await status.finish(createFailedText(safeName));
      const failure = new TransferError('disk', 'failed to create local file', { path: basePath, cause: error });
      log.error(`Error creating ${basePath}`, { error: getErrorMessage(error) });
      return err(failure);
    }

    const fileName = basename(file.path);
    await status.tryEdit(connectingText(fileName, document.size));
    log.info(`Downloading file: ${fileName}`);

    const reporter = new ProgressReporter({
      fileName,
      total: document.size,
      sink: fileSink(file.handle, file.path),
      emit: (text) => status.edit(text),
      throttleMs: this.options.throttleMs,
      now: this.options.now,
    });

    const failure = await this.stream(document, reporter, file.path, signal);
    await this.close(file.handle, file.path);

    if (failure) {
      await status.finish(this.failureText(failure, fileName));
      log.error(`Download of ${fileName} failed (${failure.kind})`, {
        path: file.path,
        error: getErrorMessage(failure.cause, failure.message),
      });
      return err(failure);
    }

    // Finalizing
    const summary = reporter.summary();
    await status.finish(successText(fileName, summary.bytes, summary.averageBytesPerSecond, file.path));
    log.info(`Successfully downloaded: ${file.path} (${summary.bytes} bytes)`);

    return ok({ fileName, path: file.path, ...summary });
  }

  private validate(
    name: string,
    size: number
  ): { error: DocumentRejectedError; text: string } | null {
    const { allowedExtensions, maxFileSize } = this.options;

    if (allowedExtensions.length > 0) {
      const extension = fileExtension(name);
      if (!allowedExtensions.includes(extension)) {
        return {
          error: new DocumentRejectedError('extension', name, `file extension '${extension}' not allowed`),
          text: extensionRejectedText(name, extension, allowedExtensions),
        };
      }
    }

    if (size > maxFileSize) {
      return {
        error: new DocumentRejectedError(
          'size',
          name,
          `file size ${size} bytes exceeds maximum limit of ${maxFileSize} bytes`
        ),
        text: sizeRejectedText(name, size, maxFileSize),
      };
    }

    return null;
  }

  private async stream(
    document: InboundDocument,
    reporter: ProgressReporter,
    path: string,
    signal?: AbortSignal
  ): Promise<TransferError | null> {
    const chunks = this.transport.downloadDocument({ document, signal })[Symbol.asyncIterator]();
    try {
      // A stalled transport never yields again; the abort must not wait for it
      for (;;) {
        const next = await raceAbort(chunks.next(), signal);
        if (next.done) break;
        await reporter.write(next.value);
      }
    } catch (error) {
      this.abandon(chunks, document);
      if (error instanceof TransferError) return error;
      if (signal?.aborted) {
        return new TransferError('cancelled', 'download cancelled', { path, cause: signal.reason });
      }
      return new TransferError('network', 'failed to download file', { path, cause: error });
    }
    return null;
  }

  private abandon(chunks: AsyncIterator<Uint8Array>, document: InboundDocument): void {
    void chunks.return?.().catch((error: unknown) => {
      log.debug(`Error closing download of document ${document.id}`, { error: getErrorMessage(error) });
    });
  }

  private failureText(failure: TransferError, fileName: string): string {
    switch (failure.kind) {
      case 'disk':
        return diskFailedText(fileName);
      case 'cancelled':
        return cancelledText(fileName);
      case 'network':
        return networkFailedText(fileName);
    }
  }

  private async reply(target: ReplyTarget, text: string): Promise<void> {
    try {
      await this.transport.sendText(target, text);
    } catch (error) {
      log.error('Error sending rejection message', { error: getErrorMessage(error) });
    }
  }

  private async close(handle: FileHandle, path: string): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      log.warn(`Error closing ${path}`, { error: getErrorMessage(error) });
    }
  }
}

export function createOrchestrator(options: OrchestratorOptions): DownloadOrchestrator {
  return new DownloadOrchestrator(options);
}
