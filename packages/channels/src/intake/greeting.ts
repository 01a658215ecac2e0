/**
 * Start-up greeting
 *
 * Tells the allowed user (or the container) that the agent is listening.
 * Best effort: every failure is logged and start-up carries on.
 */

import { formatBytes, getErrorMessage } from '@docdrop/core';
import type {
  DownloaderConfig,
  MessagingTransport,
  ReplyTarget,
  UserCredential,
} from '../types/index.js';
import { containerTarget } from '../routing/index.js';
import { getLog } from '../log.js';

const log = getLog('Greeting');

export type GreetingConfig = Pick<
  DownloaderConfig,
  'routing' | 'allowedUserId' | 'maxFileSize' | 'allowedExtensions'
>;

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:mm:ss`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function greetingText(config: Pick<GreetingConfig, 'maxFileSize' | 'allowedExtensions'>, at: Date): string {
  const types =
    config.allowedExtensions.length > 0
      ? `📎 Allowed types: ${config.allowedExtensions.join(', ')}`
      : '📎 All file types accepted';
  return `[${formatTimestamp(at)}] Hi, show me the docs!\n\n📋 File size limit: ${formatBytes(config.maxFileSize)}\n${types}`;
}

function logDirectHints(userId: bigint): void {
  log.info('💡 Use container mode (--channel) for a reliable greeting, or:');
  log.info(`   1. Add user ${userId} to this account's contacts, OR`);
  log.info('   2. Send any message from that user to this account first');
}

async function resolveTarget(
  transport: MessagingTransport,
  config: GreetingConfig
): Promise<ReplyTarget | null> {
  if (config.routing.kind === 'container') {
    return containerTarget(config.routing.container);
  }

  let contacts: UserCredential[];
  try {
    contacts = await transport.fetchContacts();
  } catch (error) {
    log.warn('Greeting skipped: could not fetch contacts', { error: getErrorMessage(error) });
    logDirectHints(config.allowedUserId);
    return null;
  }

  const contact = contacts.find((c) => c.id === config.allowedUserId);
  if (!contact) {
    log.warn(`Greeting skipped: user ${config.allowedUserId} not in contacts`);
    logDirectHints(config.allowedUserId);
    return null;
  }
  return { kind: 'user', userId: contact.id, accessHash: contact.accessHash };
}

/**
 * Send the greeting. Resolves with whether it was delivered.
 */
export async function sendGreeting(
  transport: MessagingTransport,
  config: GreetingConfig,
  at: Date = new Date()
): Promise<boolean> {
  const target = await resolveTarget(transport, config);
  if (!target) return false;

  try {
    await transport.sendText(target, greetingText(config, at));
  } catch (error) {
    log.warn('Could not send greeting', { error: getErrorMessage(error) });
    if (config.routing.kind === 'container') {
      log.info('💡 Make sure this account is a member of the channel/group and the id is correct');
    }
    return false;
  }

  log.info(
    config.routing.kind === 'container'
      ? `✅ Sent greeting to ${config.routing.container.kind} ${config.routing.container.id}`
      : `✅ Sent greeting to user ${config.allowedUserId}`
  );
  return true;
}
