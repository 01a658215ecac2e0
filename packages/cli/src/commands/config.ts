/**
 * Configuration resolution
 *
 * Every option comes from a command-line flag or, failing that, from an
 * environment variable (after .env has been loaded). Values are validated
 * once with zod and frozen into a DownloaderConfig.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  DEFAULT_CODE_FILE,
  DEFAULT_PASSWORD_FILE,
  DEFAULT_SESSION_FILE,
  MAX_FILE_SIZE_BYTES,
  formatBytes,
  getErrorMessage,
} from '@docdrop/core';
import type { ContainerRef, DownloaderConfig } from '@docdrop/channels';

/**
 * Flags as commander hands them over
 */
export interface CliFlags {
  apiId?: string;
  apiHash?: string;
  phone?: string;
  folder?: string;
  user?: string;
  channel?: string;
  types?: string;
  maxSize?: string;
  debug?: boolean;
  session?: string;
  codeFile?: string;
  passwordFile?: string;
}

export type OptionKey = keyof CliFlags;

interface OptionSource {
  label: string;
  flag: string;
  env: string;
}

export const OPTION_SOURCES: Record<OptionKey, OptionSource> = {
  apiId: { label: 'API id', flag: '--api-id', env: 'TELEGRAM_API_ID' },
  apiHash: { label: 'API hash', flag: '--api-hash', env: 'TELEGRAM_API_HASH' },
  phone: { label: 'phone number', flag: '--phone', env: 'TELEGRAM_PHONE' },
  folder: { label: 'download folder', flag: '--folder', env: 'TELEGRAM_FOLDER' },
  user: { label: 'allowed user id', flag: '--user', env: 'TELEGRAM_USER_ID' },
  channel: { label: 'channel id', flag: '--channel', env: 'TELEGRAM_CHANNEL_ID' },
  types: { label: 'allowed types', flag: '--types', env: 'TELEGRAM_ALLOWED_TYPES' },
  maxSize: { label: 'max file size', flag: '--max-size', env: 'TELEGRAM_MAX_FILE_SIZE' },
  debug: { label: 'debug', flag: '--debug', env: 'TELEGRAM_DEBUG' },
  session: { label: 'session file', flag: '--session', env: 'TELEGRAM_SESSION_FILE' },
  codeFile: { label: 'code file', flag: '--code-file', env: 'TELEGRAM_CODE_FILE' },
  passwordFile: { label: 'password file', flag: '--password-file', env: 'TELEGRAM_PASSWORD_FILE' },
};

const OPTION_KEYS: readonly OptionKey[] = [
  'apiId',
  'apiHash',
  'phone',
  'folder',
  'user',
  'channel',
  'types',
  'maxSize',
  'debug',
  'session',
  'codeFile',
  'passwordFile',
];

// Supergroups and channels are addressed as -100<id> by most clients
const CHANNEL_ID_PREFIX = '-100';

// ============================================================================
// Parsers
// ============================================================================

/**
 * Interpret a container id as typed by the operator.
 * `-100<id>` and positive ids name a channel, other negative ids a basic group.
 */
export function parseContainerId(value: string): ContainerRef | null {
  if (!/^-?\d+$/.test(value)) return null;
  if (value.startsWith(CHANNEL_ID_PREFIX) && value.length > CHANNEL_ID_PREFIX.length) {
    const id = BigInt(value.slice(CHANNEL_ID_PREFIX.length));
    return id > 0n ? { kind: 'channel', id } : null;
  }
  const id = BigInt(value);
  if (id > 0n) return { kind: 'channel', id };
  if (id < 0n) return { kind: 'chat', id: -id };
  return null;
}

/**
 * Comma-separated extension list to lower-case names without a leading dot.
 */
export function parseExtensions(value: string): string[] {
  const extensions = value
    .split(',')
    .map((part) => part.trim().replace(/^\.+/, '').toLowerCase())
    .filter((part) => part.length > 0);
  return [...new Set(extensions)];
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

// ============================================================================
// Schema
// ============================================================================

const positiveInteger = z
  .string()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform((value) => BigInt(value))
  .refine((value) => value > 0n, 'must be a positive integer');

const safePositiveInteger = positiveInteger
  .refine((value) => value <= BigInt(Number.MAX_SAFE_INTEGER), 'is too large')
  .transform((value) => Number(value));

const configSchema = z.object({
  apiId: safePositiveInteger,
  apiHash: z.string(),
  phone: z.string(),
  folder: z.string(),
  user: positiveInteger,
  channel: z
    .string()
    .transform((value, ctx) => {
      const container = parseContainerId(value);
      if (!container) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a non-zero integer' });
        return z.NEVER;
      }
      return container;
    })
    .optional(),
  types: z.string().transform(parseExtensions).optional(),
  maxSize: safePositiveInteger.optional(),
  debug: z
    .string()
    .transform((value, ctx) => {
      const normalized = value.toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be true or false' });
      return z.NEVER;
    })
    .optional(),
  session: z.string().optional(),
  codeFile: z.string().optional(),
  passwordFile: z.string().optional(),
});

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merge flags over environment. Blank values count as unset.
 */
export function collectRawOptions(
  flags: CliFlags,
  env: NodeJS.ProcessEnv
): Partial<Record<OptionKey, string>> {
  const raw: Partial<Record<OptionKey, string>> = {};
  for (const key of OPTION_KEYS) {
    const flag = flags[key];
    const fromFlag = typeof flag === 'boolean' ? String(flag) : flag;
    const value = (fromFlag ?? env[OPTION_SOURCES[key].env])?.trim();
    if (value) raw[key] = value;
  }
  return raw;
}

function isOptionKey(value: unknown): value is OptionKey {
  return typeof value === 'string' && value in OPTION_SOURCES;
}

function describeIssue(issue: z.ZodIssue, raw: Partial<Record<OptionKey, string>>): ConfigurationError {
  const key = issue.path[0];
  if (!isOptionKey(key)) {
    return new ConfigurationError(`Invalid configuration: ${issue.message}`);
  }
  const { label, flag, env } = OPTION_SOURCES[key];
  if (raw[key] === undefined) {
    return new ConfigurationError(`Missing ${label}: pass ${flag} or set ${env}`, { option: key });
  }
  return new ConfigurationError(`Invalid ${label} "${raw[key]}": ${issue.message} (${flag} / ${env})`, {
    option: key,
  });
}

/**
 * Resolve the start-up configuration. Throws ConfigurationError for the
 * first missing or invalid option.
 */
export function resolveConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): DownloaderConfig {
  const raw = collectRawOptions(flags, env);
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    throw first ? describeIssue(first, raw) : new ConfigurationError('Invalid configuration');
  }

  const options = parsed.data;
  const config: DownloaderConfig = {
    apiId: options.apiId,
    apiHash: options.apiHash,
    phone: options.phone,
    downloadFolder: options.folder,
    allowedUserId: options.user,
    routing: options.channel ? { kind: 'container', container: options.channel } : { kind: 'direct' },
    allowedExtensions: options.types ?? [],
    maxFileSize: options.maxSize ?? MAX_FILE_SIZE_BYTES,
    debug: options.debug ?? false,
    sessionFile: options.session ?? DEFAULT_SESSION_FILE,
    codeFile: options.codeFile ?? DEFAULT_CODE_FILE,
    passwordFile: options.passwordFile ?? DEFAULT_PASSWORD_FILE,
  };
  return Object.freeze(config);
}

// ============================================================================
// Display
// ============================================================================

export function maskSecret(value: string): string {
  return value.length > 12
    ? value.substring(0, 4) + '...' + value.substring(value.length - 4)
    : '********';
}

function describeRouting(config: DownloaderConfig): string {
  if (config.routing.kind === 'direct') return 'direct messages';
  const { container } = config.routing;
  return `${container.kind} ${container.id}`;
}

/**
 * Human-readable lines describing a resolved configuration
 */
export function describeConfig(config: DownloaderConfig): string[] {
  return [
    `   API id:          ${config.apiId}`,
    `   API hash:        ${maskSecret(config.apiHash)}`,
    `   Phone:           ${config.phone}`,
    `   Download folder: ${config.downloadFolder}`,
    `   Allowed user:    ${config.allowedUserId}`,
    `   Listening in:    ${describeRouting(config)}`,
    `   Allowed types:   ${config.allowedExtensions.length > 0 ? config.allowedExtensions.join(', ') : 'all'}`,
    `   Max file size:   ${formatBytes(config.maxFileSize)}`,
    `   Debug:           ${config.debug ? 'on' : 'off'}`,
    `   Session file:    ${config.sessionFile}`,
    `   Code file:       ${config.codeFile}`,
    `   Password file:   ${config.passwordFile}`,
  ];
}

/**
 * `docdrop config`: print the resolved configuration and exit
 */
export function configShow(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): void {
  let config: DownloaderConfig;
  try {
    config = resolveConfig(flags, env);
  } catch (error) {
    console.error(`❌ ${getErrorMessage(error)}`);
    process.exit(1);
    return;
  }

  console.log('\n🔧 Resolved configuration:\n');
  for (const line of describeConfig(config)) {
    console.log(line);
  }
  console.log('');
}
