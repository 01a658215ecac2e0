/**
 * Telegram transport (MTProto user account, via GramJS)
 *
 * Logs in as a user, turns new-message events into inbound updates and
 * carries the outbound operations the agent needs.
 * Flood waits and reconnects are handled inside the client.
 */

import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';
import { NewMessage, type NewMessageEvent } from 'telegram/events/index.js';
import { LogLevel } from 'telegram/extensions/Logger.js';
import bigInt from 'big-integer';
import {
  AuthenticationError,
  CONNECTION_RETRIES,
  DOWNLOAD_REQUEST_SIZE_BYTES,
  FLOOD_SLEEP_THRESHOLD_SECONDS,
  OperationCancelledError,
  getErrorMessage,
  raceAbort,
  type AwaitSecretOptions,
} from '@docdrop/core';
import type {
  AccountInfo,
  DownloadRequest,
  InboundUpdate,
  MessagingTransport,
  ReplyTarget,
  SentMessage,
  UserCredential,
} from '../types/index.js';
import { FileAuthenticator } from './file-auth.js';
import { SessionStore } from './session-store.js';
import { toBigInt, toFileLocation, toInboundUpdate, toPeer } from './normalize.js';
import { getLog } from '../log.js';

const log = getLog('Telegram');

export interface TelegramTransportOptions {
  apiId: number;
  apiHash: string;
  phone: string;
  sessionFile: string;
  codeFile: string;
  passwordFile: string;
  /** Raise the client's own log level */
  debug?: boolean;
  /** Passed to every secret-file wait */
  wait?: AwaitSecretOptions;
  requestSize?: number;
}

function restoreSession(saved: string): StringSession {
  try {
    return new StringSession(saved);
  } catch (error) {
    log.warn('Stored session is invalid, logging in again', { error: getErrorMessage(error) });
    return new StringSession('');
  }
}

export class TelegramTransport implements MessagingTransport {
  private readonly options: TelegramTransportOptions;
  private readonly store: SessionStore;
  private client: TelegramClient | null = null;
  private handler?: (update: InboundUpdate) => void;

  constructor(options: TelegramTransportOptions) {
    this.options = options;
    this.store = new SessionStore(options.sessionFile);
  }

  async connect(): Promise<AccountInfo> {
    if (this.client) {
      throw new Error('Telegram transport is already connected');
    }

    const session = restoreSession(await this.store.load());
    const client = new TelegramClient(session, this.options.apiId, this.options.apiHash, {
      connectionRetries: CONNECTION_RETRIES,
      floodSleepThreshold: FLOOD_SLEEP_THRESHOLD_SECONDS,
    });
    client.setLogLevel(this.options.debug ? LogLevel.DEBUG : LogLevel.ERROR);

    const auth = new FileAuthenticator({
      phone: this.options.phone,
      codeFile: this.options.codeFile,
      passwordFile: this.options.passwordFile,
      wait: this.options.wait,
    });

    try {
      await client.start({
        phoneNumber: () => auth.phoneNumber(),
        phoneCode: (isCodeViaApp) => auth.phoneCode(isCodeViaApp),
        password: (hint) => auth.password(hint),
        firstAndLastNames: () => auth.signUp(),
        onError: (error) => auth.onError(error),
      });
    } catch (error) {
      await this.release(client);
      if (auth.failure) throw auth.failure;
      throw new AuthenticationError(`Authentication failed: ${getErrorMessage(error)}`, { cause: error });
    }
    log.info('Authentication successful!');
    this.client = client;

    await this.store.save(session.save());
    log.debug(`Session saved to ${this.options.sessionFile}`);

    const me = await client.getMe();
    client.addEventHandler((event: NewMessageEvent) => this.dispatch(event), new NewMessage({}));

    if (!(me instanceof Api.User)) {
      return { id: 0n };
    }
    return {
      id: toBigInt(me.id),
      username: me.username ?? undefined,
      firstName: me.firstName ?? undefined,
      phone: me.phone ?? undefined,
    };
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.destroy();
    log.info('Disconnected from Telegram');
  }

  onUpdate(handler: (update: InboundUpdate) => void): void {
    this.handler = handler;
  }

  async sendText(target: ReplyTarget, text: string): Promise<SentMessage> {
    const message = await this.requireClient().sendMessage(toPeer(target), { message: text });
    return { id: message.id };
  }

  async editText(target: ReplyTarget, messageId: number, text: string): Promise<void> {
    await this.requireClient().editMessage(toPeer(target), { message: messageId, text });
  }

  async *downloadDocument({ document, signal }: DownloadRequest): AsyncIterable<Uint8Array> {
    const client = this.requireClient();
    const chunks = client.iterDownload({
      file: toFileLocation(document.locator),
      dcId: document.locator.dcId,
      fileSize: document.size > 0 ? bigInt(document.size) : undefined,
      requestSize: this.options.requestSize ?? DOWNLOAD_REQUEST_SIZE_BYTES,
    });

    const iterator = chunks[Symbol.asyncIterator]();
    for (;;) {
      let next: IteratorResult<unknown>;
      try {
        // The client retries silently on a dead connection; do not wait for it once aborted
        next = await raceAbort(iterator.next(), signal);
      } catch (error) {
        if (!signal?.aborted) throw error;
        void iterator.return?.().catch((closeError: unknown) => {
          log.debug('Error closing download iterator', { error: getErrorMessage(closeError) });
        });
        throw new OperationCancelledError(`download of document ${document.id}`, { cause: signal.reason });
      }
      if (next.done) return;
      if (Buffer.isBuffer(next.value)) {
        yield next.value;
      }
    }
  }

  async fetchContacts(): Promise<UserCredential[]> {
    const result = await this.requireClient().invoke(new Api.contacts.GetContacts({ hash: bigInt(0) }));
    if (!(result instanceof Api.contacts.Contacts)) return [];

    return result.users.flatMap((user) =>
      user instanceof Api.User && user.accessHash
        ? [{ id: toBigInt(user.id), accessHash: toBigInt(user.accessHash) }]
        : []
    );
  }

  private dispatch(event: NewMessageEvent): void {
    try {
      this.handler?.(toInboundUpdate(event.message));
    } catch (error) {
      log.error('Error converting update', { error: getErrorMessage(error) });
    }
  }

  private requireClient(): TelegramClient {
    if (!this.client) {
      throw new Error('Telegram transport is not connected');
    }
    return this.client;
  }

  private async release(client: TelegramClient): Promise<void> {
    try {
      await client.destroy();
    } catch (error) {
      log.warn('Error closing connection after failed login', { error: getErrorMessage(error) });
    }
  }
}

export function createTelegramTransport(options: TelegramTransportOptions): TelegramTransport {
  return new TelegramTransport(options);
}
