/**
 * Start command - runs the document agent until interrupted
 */

import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  configureLogging,
  createLogService,
  getErrorMessage,
  getLog,
  isFatalError,
} from '@docdrop/core';
import {
  createDocumentAgent,
  createTelegramTransport,
  type DownloaderConfig,
} from '@docdrop/channels';
import { resolveConfig, type CliFlags } from './config.js';

function fail(error: unknown): void {
  console.error(`❌ ${getErrorMessage(error)}`);
  process.exit(1);
}

export async function startAgent(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  let config: DownloaderConfig;
  try {
    config = resolveConfig(flags, env);
  } catch (error) {
    fail(error);
    return;
  }

  configureLogging(createLogService({ level: config.debug ? 'debug' : 'info' }));
  const log = getLog('Cli');

  try {
    await mkdir(config.downloadFolder, { recursive: true });
  } catch (error) {
    fail(new Error(`Cannot create download folder ${config.downloadFolder}: ${getErrorMessage(error)}`));
    return;
  }

  console.log('\n🚀 Starting document agent...\n');
  log.info(`Saving documents to ${resolve(config.downloadFolder)}`);

  const transport = createTelegramTransport({
    apiId: config.apiId,
    apiHash: config.apiHash,
    phone: config.phone,
    sessionFile: config.sessionFile,
    codeFile: config.codeFile,
    passwordFile: config.passwordFile,
    debug: config.debug,
  });
  const agent = createDocumentAgent({ config, transport });

  try {
    await agent.start();
  } catch (error) {
    if (!isFatalError(error)) {
      log.error('Unexpected start-up failure', { error });
    }
    await transport.disconnect().catch((disconnectError: unknown) => {
      log.warn('Error disconnecting', { error: getErrorMessage(disconnectError) });
    });
    fail(error);
    return;
  }

  console.log('✅ Agent running');
  console.log('Press Ctrl+C to stop');

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`\n\n🛑 Received ${signal}, shutting down...`);
    agent.stop().then(
      () => process.exit(0),
      (error: unknown) => fail(error)
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
