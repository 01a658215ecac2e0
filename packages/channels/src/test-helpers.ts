/**
 * Shared test helpers for @docdrop/channels
 */

import type {
  AccountInfo,
  DownloadRequest,
  InboundDocument,
  InboundUpdate,
  MessagingTransport,
  ReplyTarget,
  SentMessage,
  UserCredential,
} from './types/index.js';

function stall(): Promise<never> {
  return new Promise<never>(() => {});
}

export type OutboundCall =
  | { type: 'send'; target: ReplyTarget; text: string; id: number }
  | { type: 'edit'; target: ReplyTarget; messageId: number; text: string };

/**
 * In-memory transport. Documents are served from `files`, every outbound
 * text is recorded in `outbound` in call order.
 */
export class FakeTransport implements MessagingTransport {
  readonly outbound: OutboundCall[] = [];
  readonly files = new Map<bigint, Uint8Array[]>();
  readonly downloads: bigint[] = [];
  account: AccountInfo = { id: 1n, username: 'agent', firstName: 'Agent' };
  contacts: UserCredential[] = [];
  connected = false;

  /** Number of upcoming sends that fail */
  failSends = 0;
  failEdits = false;
  contactsError?: Error;
  connectError?: Error;
  /** Thrown by the download stream after all chunks were served */
  downloadError?: Error;
  /** Called after each served chunk */
  onChunk?: (index: number) => void;
  /** After this many chunks the stream never yields again, as on a dead connection */
  stallAfter?: number;
  /** Edits never settle */
  hangEdits = false;

  private handler?: (update: InboundUpdate) => void;
  private nextMessageId = 100;

  async connect(): Promise<AccountInfo> {
    if (this.connectError) throw this.connectError;
    this.connected = true;
    return this.account;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  onUpdate(handler: (update: InboundUpdate) => void): void {
    this.handler = handler;
  }

  /** Deliver an update as the platform would */
  emit(update: InboundUpdate): void {
    this.handler?.(update);
  }

  async sendText(target: ReplyTarget, text: string): Promise<SentMessage> {
    if (this.failSends > 0) {
      this.failSends--;
      throw new Error('PEER_ID_INVALID');
    }
    const id = this.nextMessageId++;
    this.outbound.push({ type: 'send', target, text, id });
    return { id };
  }

  async editText(target: ReplyTarget, messageId: number, text: string): Promise<void> {
    if (this.failEdits) throw new Error('MESSAGE_ID_INVALID');
    if (this.hangEdits) await stall();
    this.outbound.push({ type: 'edit', target, messageId, text });
  }

  async *downloadDocument({ document, signal }: DownloadRequest): AsyncIterable<Uint8Array> {
    this.downloads.push(document.id);
    const chunks = this.files.get(document.id) ?? [];
    for (const [index, chunk] of chunks.entries()) {
      if (signal?.aborted) throw new Error('download aborted');
      yield chunk;
      this.onChunk?.(index);
      if (this.stallAfter !== undefined && index + 1 >= this.stallAfter) await stall();
    }
    if (this.downloadError) throw this.downloadError;
  }

  async fetchContacts(): Promise<UserCredential[]> {
    if (this.contactsError) throw this.contactsError;
    return this.contacts;
  }

  texts(): string[] {
    return this.outbound.map((call) => call.text);
  }
}

export function makeDocument(overrides: Partial<InboundDocument> = {}): InboundDocument {
  return {
    id: 55n,
    fileName: 'report.pdf',
    size: 500,
    locator: { id: 55n, accessHash: 7n, fileReference: new Uint8Array([1, 2]), dcId: 2 },
    ...overrides,
  };
}

/** Split `size` bytes of `fill` into chunks of `chunkSize` */
export function makeChunks(size: number, chunkSize: number, fill = 0x61): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < size; offset += chunkSize) {
    chunks.push(new Uint8Array(Math.min(chunkSize, size - offset)).fill(fill));
  }
  return chunks;
}
