/**
 * Conversions between GramJS objects and the transport-neutral types.
 */

import { Api } from 'telegram';
import bigInt from 'big-integer';
import type {
  DocumentLocator,
  InboundDocument,
  InboundUpdate,
  PeerRef,
  ReplyTarget,
  UserCredential,
} from '../types/index.js';

/**
 * The parts of `Api.Message` an inbound update is built from.
 */
export interface MessageLike {
  id: number;
  peerId: Api.TypePeer;
  fromId?: Api.TypePeer | null;
  out?: boolean;
  media?: Api.TypeMessageMedia | null;
  sender?: unknown;
}

export function toBigInt(value: bigInt.BigInteger | number): bigint {
  return BigInt(value.toString());
}

export function toBigInteger(value: bigint): bigInt.BigInteger {
  return bigInt(value.toString());
}

function toSize(value: bigInt.BigInteger | number): number {
  return typeof value === 'number' ? value : value.toJSNumber();
}

export function peerRefOf(peer: Api.TypePeer): PeerRef {
  if (peer instanceof Api.PeerUser) return { kind: 'user', id: toBigInt(peer.userId) };
  if (peer instanceof Api.PeerChannel) return { kind: 'channel', id: toBigInt(peer.channelId) };
  return { kind: 'chat', id: toBigInt(peer.chatId) };
}

export function documentOf(media: Api.TypeMessageMedia | null | undefined): InboundDocument | undefined {
  if (!(media instanceof Api.MessageMediaDocument)) return undefined;
  const doc = media.document;
  if (!(doc instanceof Api.Document)) return undefined;

  const nameAttribute = doc.attributes.find(
    (attr): attr is Api.DocumentAttributeFilename => attr instanceof Api.DocumentAttributeFilename
  );
  const locator: DocumentLocator = {
    id: toBigInt(doc.id),
    accessHash: toBigInt(doc.accessHash),
    fileReference: doc.fileReference,
    dcId: doc.dcId,
  };

  return {
    id: locator.id,
    fileName: nameAttribute?.fileName || undefined,
    size: toSize(doc.size),
    mimeType: doc.mimeType,
    locator,
  };
}

function usersOf(sender: unknown): UserCredential[] {
  if (sender instanceof Api.User && sender.accessHash) {
    return [{ id: toBigInt(sender.id), accessHash: toBigInt(sender.accessHash) }];
  }
  return [];
}

export function toInboundUpdate(message: MessageLike): InboundUpdate {
  return {
    messageId: message.id,
    peer: peerRefOf(message.peerId),
    from: message.fromId ? peerRefOf(message.fromId) : undefined,
    outgoing: Boolean(message.out),
    users: usersOf(message.sender),
    document: documentOf(message.media),
  };
}

/**
 * Peer to address a reply to. A user without a known access hash is passed
 * as a bare peer so the client can resolve it from its entity cache.
 */
export function toPeer(target: ReplyTarget): Api.TypeInputPeer | Api.TypePeer {
  switch (target.kind) {
    case 'user':
      return target.accessHash === 0n
        ? new Api.PeerUser({ userId: toBigInteger(target.userId) })
        : new Api.InputPeerUser({
            userId: toBigInteger(target.userId),
            accessHash: toBigInteger(target.accessHash),
          });
    case 'channel':
      return new Api.PeerChannel({ channelId: toBigInteger(target.channelId) });
    case 'chat':
      return new Api.PeerChat({ chatId: toBigInteger(target.chatId) });
  }
}

export function toFileLocation(locator: DocumentLocator): Api.InputDocumentFileLocation {
  return new Api.InputDocumentFileLocation({
    id: toBigInteger(locator.id),
    accessHash: toBigInteger(locator.accessHash),
    fileReference: Buffer.from(locator.fileReference),
    thumbSize: '',
  });
}
