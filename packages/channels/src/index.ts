/**
 * @docdrop/channels
 *
 * Telegram side of the document agent
 *
 * @packageDocumentation
 */

// Types
export type {
  AccountInfo,
  ContainerRef,
  DocumentLocator,
  DownloaderConfig,
  DownloadRequest,
  InboundDocument,
  InboundUpdate,
  MessagingTransport,
  PeerRef,
  ReplyTarget,
  RoutingMode,
  SentMessage,
  UserCredential,
} from './types/index.js';

// Routing
export * from './routing/index.js';

// Downloads
export * from './download/index.js';

// Intake
export * from './intake/index.js';

// Telegram
export * from './telegram/index.js';

// Agent
export { DocumentAgent, createDocumentAgent, type DocumentAgentOptions } from './agent.js';
