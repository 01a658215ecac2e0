/**
 * Transport-neutral types shared by routing, download orchestration and the
 * Telegram transport.
 */

// ============================================================================
// Configuration
// ============================================================================

/**
 * A group the agent listens in instead of direct messages.
 * `channel` covers channels and supergroups, `chat` covers basic groups.
 */
export type ContainerRef = { kind: 'channel'; id: bigint } | { kind: 'chat'; id: bigint };

/**
 * Where documents are accepted from. Chosen once at start-up.
 */
export type RoutingMode = { kind: 'direct' } | { kind: 'container'; container: ContainerRef };

/**
 * Resolved start-up configuration. Immutable for the process lifetime.
 */
export interface DownloaderConfig {
  readonly apiId: number;
  readonly apiHash: string;
  readonly phone: string;
  readonly downloadFolder: string;
  readonly allowedUserId: bigint;
  readonly routing: RoutingMode;
  /** Lower-case, without leading dot. Empty accepts every type. */
  readonly allowedExtensions: readonly string[];
  readonly maxFileSize: number;
  readonly debug: boolean;
  readonly sessionFile: string;
  readonly codeFile: string;
  readonly passwordFile: string;
}

// ============================================================================
// Inbound
// ============================================================================

/**
 * Peer an update was delivered in, or the sender embedded in it.
 */
export type PeerRef =
  | { kind: 'user'; id: bigint }
  | { kind: 'channel'; id: bigint }
  | { kind: 'chat'; id: bigint };

/**
 * Addressing credential of a user from the update's entity set.
 */
export interface UserCredential {
  id: bigint;
  accessHash: bigint;
}

/**
 * Fields the transport needs to fetch a document. Passed through unchanged.
 */
export interface DocumentLocator {
  id: bigint;
  accessHash: bigint;
  fileReference: Uint8Array;
  dcId: number;
}

export interface InboundDocument {
  id: bigint;
  /** Declared file name; absent when the sender attached none */
  fileName?: string;
  /** Declared size in bytes; 0 when unknown */
  size: number;
  mimeType?: string;
  locator: DocumentLocator;
}

/**
 * One new-message event as delivered by the transport.
 */
export interface InboundUpdate {
  messageId: number;
  peer: PeerRef;
  from?: PeerRef;
  /** Sent by the logged-in account itself */
  outgoing: boolean;
  users: UserCredential[];
  document?: InboundDocument;
}

// ============================================================================
// Outbound
// ============================================================================

export type ReplyTarget =
  | { kind: 'user'; userId: bigint; accessHash: bigint }
  | { kind: 'channel'; channelId: bigint }
  | { kind: 'chat'; chatId: bigint };

export interface SentMessage {
  id: number;
}

export interface AccountInfo {
  id: bigint;
  username?: string;
  firstName?: string;
  phone?: string;
}

export interface DownloadRequest {
  document: InboundDocument;
  signal?: AbortSignal;
}

/**
 * Everything the agent needs from the messaging platform.
 */
export interface MessagingTransport {
  /** Connect and authenticate; resolves with the logged-in account */
  connect(): Promise<AccountInfo>;
  disconnect(): Promise<void>;
  onUpdate(handler: (update: InboundUpdate) => void): void;
  sendText(target: ReplyTarget, text: string): Promise<SentMessage>;
  editText(target: ReplyTarget, messageId: number, text: string): Promise<void>;
  downloadDocument(request: DownloadRequest): AsyncIterable<Uint8Array>;
  fetchContacts(): Promise<UserCredential[]>;
}
