import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

const { mockLog } = vi.hoisted(() => ({
  mockLog: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn(), child: vi.fn() },
}));

vi.mock('./log.js', () => ({
  getLog: vi.fn(() => mockLog),
}));

import { createDocumentAgent } from './agent.js';
import { FakeTransport, makeDocument } from './test-helpers.js';
import type { DownloaderConfig, InboundUpdate } from './types/index.js';

const ALLOWED = 1001n;

function makeConfig(dir: string, overrides: Partial<DownloaderConfig> = {}): DownloaderConfig {
  return {
    apiId: 12345,
    apiHash: 'test-hash',
    phone: '+10000000000',
    downloadFolder: dir,
    allowedUserId: ALLOWED,
    routing: { kind: 'direct' },
    allowedExtensions: [],
    maxFileSize: 2147483648,
    debug: false,
    sessionFile: join(dir, 'session.txt'),
    codeFile: join(dir, 'code.txt'),
    passwordFile: join(dir, 'password.txt'),
    ...overrides,
  };
}

function documentFrom(senderId: bigint, messageId = 10): InboundUpdate {
  return {
    messageId,
    peer: { kind: 'user', id: senderId },
    outgoing: false,
    users: [{ id: senderId, accessHash: 999n }],
    document: makeDocument({ fileName: `file-${messageId}.txt`, size: 5 }),
  };
}

/** A promise the test resolves from a transport callback */
function trigger(): { fired: Promise<void>; fire: () => void } {
  let fire = () => {};
  const fired = new Promise<void>((resolve) => {
    fire = resolve;
  });
  return { fired, fire };
}

describe('DocumentAgent', () => {
  let dir: string;
  let transport: FakeTransport;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'docdrop-agent-'));
    transport = new FakeTransport();
    transport.files.set(55n, [new TextEncoder().encode('hello')]);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('connects, greets and saves documents from the allowed user', async () => {
    transport.contacts = [{ id: ALLOWED, accessHash: 999n }];
    const agent = createDocumentAgent({ config: makeConfig(dir), transport });

    const account = await agent.start();
    transport.emit(documentFrom(ALLOWED));
    await agent.idle();

    expect(account.id).toBe(1n);
    expect(agent.running).toBe(true);
    expect(transport.connected).toBe(true);
    expect(transport.texts()[0]).toContain('Hi, show me the docs!');
    expect(await readFile(join(dir, 'file-10.txt'), 'utf8')).toBe('hello');
    expect(mockLog.info).toHaveBeenCalledWith('Logged in as: @agent (ID: 1)');
  });

  it('never answers an unauthorized sender', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });
    const send = vi.spyOn(transport, 'sendText');
    const edit = vi.spyOn(transport, 'editText');

    await agent.start();
    transport.emit(documentFrom(2002n));
    await agent.idle();

    expect(send).not.toHaveBeenCalled();
    expect(edit).not.toHaveBeenCalled();
    expect(transport.downloads).toEqual([]);
    expect(await readdir(dir)).toEqual([]);
  });

  it('handles documents one after another in arrival order', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });

    await agent.start();
    transport.emit(documentFrom(ALLOWED, 1));
    transport.emit(documentFrom(ALLOWED, 2));
    await agent.idle();

    const announced = transport.outbound.filter((c) => c.type === 'send').map((c) => c.text);
    expect(announced).toEqual([
      '📥 Downloading: file-1.txt\n📊 Size: 5 B\n⏳ Starting download...',
      '📥 Downloading: file-2.txt\n📊 Size: 5 B\n⏳ Starting download...',
    ]);
    expect((await readdir(dir)).sort()).toEqual(['file-1.txt', 'file-2.txt']);
  });

  it('keeps running after a rejected document', async () => {
    const agent = createDocumentAgent({
      config: makeConfig(dir, { allowedExtensions: ['pdf'] }),
      transport,
      greet: false,
    });

    await agent.start();
    const rejected = await agent.process(documentFrom(ALLOWED));

    expect(rejected?.ok).toBe(false);
    expect(mockLog.warn).toHaveBeenCalledWith("Error handling message 10: file extension 'txt' not allowed");
    expect(agent.running).toBe(true);
  });

  it('returns null for ignored updates', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });

    expect(await agent.process({ ...documentFrom(ALLOWED), document: undefined })).toBeNull();
  });

  it('refuses to start twice', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });

    await agent.start();

    await expect(agent.start()).rejects.toThrow('Document agent is already running');
  });

  it('propagates login failures', async () => {
    transport.connectError = new Error('PHONE_NUMBER_INVALID');
    const agent = createDocumentAgent({ config: makeConfig(dir), transport });

    await expect(agent.start()).rejects.toThrow('PHONE_NUMBER_INVALID');
    expect(agent.running).toBe(false);
  });

  it('stops consuming and disconnects', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });
    await agent.start();

    await agent.stop();
    transport.emit(documentFrom(ALLOWED));
    await agent.idle();

    expect(transport.connected).toBe(false);
    expect(agent.running).toBe(false);
    expect(transport.downloads).toEqual([]);
  });

  it('cancels the download in progress when stopped', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });
    transport.files.set(55n, [new Uint8Array(3), new Uint8Array(3)]);
    let stopping: Promise<void> | undefined;
    transport.onChunk = () => {
      stopping = agent.stop();
    };

    await agent.start();
    const result = await agent.process(documentFrom(ALLOWED));
    await stopping;

    expect(result?.ok === false && 'kind' in result.error && result.error.kind).toBe('cancelled');
  });

  it('abandons a stalled download and disconnects when stopped', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });
    transport.files.set(55n, [new Uint8Array(3), new Uint8Array(3)]);
    transport.stallAfter = 1;
    const firstChunk = trigger();
    transport.onChunk = () => firstChunk.fire();

    await agent.start();
    transport.emit(documentFrom(ALLOWED));
    await firstChunk.fired;
    await agent.stop();

    expect(transport.connected).toBe(false);
    expect((await readFile(join(dir, 'file-10.txt'))).byteLength).toBe(3);
    expect(transport.texts().at(-1)).toBe('⚠️ Download cancelled: file-10.txt\n🛑 The agent is shutting down');
  });

  it('disconnects after the grace period when the cancelled download cannot report', async () => {
    const agent = createDocumentAgent({
      config: makeConfig(dir),
      transport,
      greet: false,
      shutdownGraceMs: 20,
    });
    transport.files.set(55n, [new Uint8Array(3), new Uint8Array(3)]);
    transport.stallAfter = 1;
    const firstChunk = trigger();
    transport.onChunk = () => {
      transport.hangEdits = true;
      firstChunk.fire();
    };

    await agent.start();
    transport.emit(documentFrom(ALLOWED));
    await firstChunk.fired;
    await agent.stop();

    expect(transport.connected).toBe(false);
    expect(agent.running).toBe(false);
    expect(mockLog.warn).toHaveBeenCalledWith(
      'Pending work did not finish in time, disconnecting anyway',
      expect.objectContaining({ graceMs: 20 })
    );
  });

  it('saves two same-named documents under distinct names', async () => {
    const agent = createDocumentAgent({ config: makeConfig(dir), transport, greet: false });
    const named = (messageId: number): InboundUpdate => ({
      ...documentFrom(ALLOWED, messageId),
      document: makeDocument({ fileName: 'a.txt', size: 5 }),
    });

    await agent.start();
    transport.emit(named(10));
    transport.emit(named(11));
    await agent.idle();

    expect((await readdir(dir)).sort()).toEqual(['a.txt', 'a_1.txt']);
    expect(await readFile(join(dir, 'a_1.txt'), 'utf8')).toBe('hello');
    const saved = transport.texts().filter((text) => text.startsWith('✅'));
    expect(saved[0]).toContain(`📁 Saved to: ${join(dir, 'a.txt')}`);
    expect(saved[1]).toContain(`📁 Saved to: ${join(dir, 'a_1.txt')}`);
  });
});
