/**
 * In-process stand-in for the GramJS modules, loaded through vi.mock in
 * transport tests. TL objects only copy their constructor arguments, which
 * is enough for `instanceof` checks and field reads.
 */

import { vi } from 'vitest';

class FakeTLObject {
  constructor(args: object = {}) {
    Object.assign(this, args);
  }
}

export const Api = {
  User: class User extends FakeTLObject {},
  PeerUser: class PeerUser extends FakeTLObject {},
  PeerChannel: class PeerChannel extends FakeTLObject {},
  PeerChat: class PeerChat extends FakeTLObject {},
  InputPeerUser: class InputPeerUser extends FakeTLObject {},
  MessageMediaDocument: class MessageMediaDocument extends FakeTLObject {},
  MessageMediaPhoto: class MessageMediaPhoto extends FakeTLObject {},
  Document: class Document extends FakeTLObject {},
  DocumentAttributeFilename: class DocumentAttributeFilename extends FakeTLObject {},
  DocumentAttributeVideo: class DocumentAttributeVideo extends FakeTLObject {},
  InputDocumentFileLocation: class InputDocumentFileLocation extends FakeTLObject {},
  contacts: {
    GetContacts: class GetContacts extends FakeTLObject {},
    Contacts: class Contacts extends FakeTLObject {},
    ContactsNotModified: class ContactsNotModified extends FakeTLObject {},
  },
};

/** The login callbacks the transport hands to `client.start` */
export interface FakeAuthParams {
  phoneNumber: () => Promise<string>;
  phoneCode: (isCodeViaApp?: boolean) => Promise<string>;
  password: (hint?: string) => Promise<string>;
  firstAndLastNames: () => Promise<unknown>;
  onError: (error: Error) => Promise<boolean>;
}

export const mockClient = {
  start: vi.fn(async (_params: FakeAuthParams) => {}),
  getMe: vi.fn(),
  addEventHandler: vi.fn(),
  sendMessage: vi.fn(),
  editMessage: vi.fn(),
  iterDownload: vi.fn(),
  invoke: vi.fn(),
  destroy: vi.fn(async () => {}),
  setLogLevel: vi.fn(),
};

export const TelegramClient = vi.fn(function () {
  return mockClient;
});

export const StringSession = vi.fn(function (saved: string) {
  if (saved === 'not-a-session') throw new Error('Not a valid string');
  return { saved, save: () => 'saved-session-string' };
});

export const NewMessage = vi.fn(function () {
  return { kind: 'NewMessage' };
});

export const LogLevel = { NONE: 'none', ERROR: 'error', WARN: 'warn', INFO: 'info', DEBUG: 'debug' };
