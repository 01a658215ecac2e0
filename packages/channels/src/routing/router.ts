/**
 * Authorization router
 *
 * Decides whether an inbound update is a document from the allow-listed
 * sender in the configured place, and where replies about it go.
 * Ordinary rejections are values, never exceptions.
 */

import type {
  ContainerRef,
  InboundDocument,
  InboundUpdate,
  PeerRef,
  ReplyTarget,
  RoutingMode,
} from '../types/index.js';
import { getLog } from '../log.js';

const log = getLog('Router');

export type RejectReason = 'outgoing' | 'foreign-peer' | 'unshaped' | 'unauthorized' | 'no-document';

export type RouteDecision =
  | {
      status: 'accepted';
      target: ReplyTarget;
      senderId: bigint;
      messageId: number;
      document: InboundDocument;
    }
  | { status: 'rejected'; reason: RejectReason; senderId?: bigint };

type Origin = { target: ReplyTarget; senderId: bigint } | { reason: RejectReason };

/**
 * Extracts sender and reply target for one routing mode.
 */
export interface RoutingStrategy {
  readonly mode: RoutingMode['kind'];
  resolve(update: InboundUpdate): Origin;
}

export function samePeer(a: PeerRef, b: PeerRef | ContainerRef): boolean {
  return a.kind === b.kind && a.id === b.id;
}

export function containerTarget(container: ContainerRef): ReplyTarget {
  return container.kind === 'channel'
    ? { kind: 'channel', channelId: container.id }
    : { kind: 'chat', chatId: container.id };
}

export class DirectModeStrategy implements RoutingStrategy {
  readonly mode = 'direct';

  resolve(update: InboundUpdate): Origin {
    if (update.peer.kind !== 'user') return { reason: 'foreign-peer' };

    const senderId = update.peer.id;
    // 0 is a degraded address the platform may still accept
    const accessHash = update.users.find((u) => u.id === senderId)?.accessHash ?? 0n;
    return { senderId, target: { kind: 'user', userId: senderId, accessHash } };
  }
}

export class ContainerModeStrategy implements RoutingStrategy {
  readonly mode = 'container';
  private readonly target: ReplyTarget;

  constructor(private readonly container: ContainerRef) {
    this.target = containerTarget(container);
  }

  resolve(update: InboundUpdate): Origin {
    if (!samePeer(update.peer, this.container)) return { reason: 'foreign-peer' };
    if (update.from?.kind !== 'user') return { reason: 'unshaped' };
    return { senderId: update.from.id, target: this.target };
  }
}

export interface RouterOptions {
  allowedUserId: bigint;
  routing: RoutingMode;
}

export class AuthorizationRouter {
  private readonly strategy: RoutingStrategy;
  private readonly allowedUserId: bigint;

  constructor(options: RouterOptions) {
    this.allowedUserId = options.allowedUserId;
    this.strategy =
      options.routing.kind === 'container'
        ? new ContainerModeStrategy(options.routing.container)
        : new DirectModeStrategy();
  }

  get mode(): RoutingMode['kind'] {
    return this.strategy.mode;
  }

  route(update: InboundUpdate): RouteDecision {
    if (update.outgoing) return { status: 'rejected', reason: 'outgoing' };

    const origin = this.strategy.resolve(update);
    if ('reason' in origin) {
      log.debug('Ignoring update', { reason: origin.reason, messageId: update.messageId });
      return { status: 'rejected', reason: origin.reason };
    }

    const { senderId, target } = origin;
    if (senderId !== this.allowedUserId) {
      log.info(`Ignoring message from unauthorized user ${senderId}`);
      return { status: 'rejected', reason: 'unauthorized', senderId };
    }

    if (!update.document) {
      log.debug('Message from allowed user carries no document', { messageId: update.messageId });
      return { status: 'rejected', reason: 'no-document', senderId };
    }

    return { status: 'accepted', target, senderId, messageId: update.messageId, document: update.document };
  }
}

export function createRouter(options: RouterOptions): AuthorizationRouter {
  return new AuthorizationRouter(options);
}
