/**
 * Start CLI Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AuthenticationError, resetLogging } from '@docdrop/core';

// ============================================================================
// Hoisted mocks
// ============================================================================

const { mockTransport, mockAgent, mockCreateTelegramTransport, mockCreateDocumentAgent } = vi.hoisted(() => {
  const mockTransport = { disconnect: vi.fn(async () => {}) };
  const mockAgent = {
    start: vi.fn(async () => ({ id: 1n, username: 'agent' })),
    stop: vi.fn(async () => {}),
  };
  return {
    mockTransport,
    mockAgent,
    mockCreateTelegramTransport: vi.fn(() => mockTransport),
    mockCreateDocumentAgent: vi.fn(() => mockAgent),
  };
});

vi.mock('@docdrop/channels', () => ({
  createTelegramTransport: mockCreateTelegramTransport,
  createDocumentAgent: mockCreateDocumentAgent,
}));

// ============================================================================
// Import after mocks
// ============================================================================

import { startAgent } from './start.js';

describe('Start CLI Command', () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    vi.spyOn(process, 'once').mockImplementation(() => process);

    dir = await mkdtemp(join(tmpdir(), 'docdrop-cli-'));
    env = {
      TELEGRAM_API_ID: '12345',
      TELEGRAM_API_HASH: 'test-hash',
      TELEGRAM_PHONE: '+10000000000',
      TELEGRAM_FOLDER: join(dir, 'incoming', 'docs'),
      TELEGRAM_USER_ID: '777',
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetLogging();
    await rm(dir, { recursive: true, force: true });
  });

  function signalHandler(signal: string) {
    const call = vi.mocked(process.once).mock.calls.find(([event]) => event === signal);
    if (!call) throw new Error(`No handler registered for ${signal}`);
    return call[1];
  }

  it('exits with 1 and starts nothing when configuration is invalid', async () => {
    await startAgent({}, { ...env, TELEGRAM_USER_ID: undefined });

    expect(console.error).toHaveBeenCalledWith('❌ Missing allowed user id: pass --user or set TELEGRAM_USER_ID');
    expect(process.exit).toHaveBeenCalledWith(1);
    expect(mockCreateTelegramTransport).not.toHaveBeenCalled();
  });

  it('creates the download folder and starts the agent', async () => {
    await startAgent({ session: join(dir, 'session.txt') }, env);

    const folder = await stat(join(dir, 'incoming', 'docs'));
    expect(folder.isDirectory()).toBe(true);
    expect(mockCreateTelegramTransport).toHaveBeenCalledWith({
      apiId: 12345,
      apiHash: 'test-hash',
      phone: '+10000000000',
      sessionFile: join(dir, 'session.txt'),
      codeFile: 'telegram_code.txt',
      passwordFile: 'telegram_password.txt',
      debug: false,
    });
    expect(mockCreateDocumentAgent).toHaveBeenCalledWith({
      config: expect.objectContaining({ allowedUserId: 777n, routing: { kind: 'direct' } }),
      transport: mockTransport,
    });
    expect(mockAgent.start).toHaveBeenCalledOnce();
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('stops the agent and exits with 0 on SIGINT', async () => {
    await startAgent({}, env);

    signalHandler('SIGINT')('SIGINT');

    await vi.waitFor(() => expect(process.exit).toHaveBeenCalledWith(0));
    expect(mockAgent.stop).toHaveBeenCalledOnce();
  });

  it('ignores a second signal while stopping', async () => {
    await startAgent({}, env);

    signalHandler('SIGTERM')('SIGTERM');
    signalHandler('SIGINT')('SIGINT');

    await vi.waitFor(() => expect(process.exit).toHaveBeenCalledWith(0));
    expect(mockAgent.stop).toHaveBeenCalledOnce();
  });

  it('disconnects and exits with 1 when login fails', async () => {
    mockAgent.start.mockRejectedValueOnce(new AuthenticationError('Authentication failed: PHONE_CODE_INVALID'));

    await startAgent({}, env);

    expect(mockTransport.disconnect).toHaveBeenCalledOnce();
    expect(console.error).toHaveBeenCalledWith('❌ Authentication failed: PHONE_CODE_INVALID');
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
