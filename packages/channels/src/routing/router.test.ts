import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockLog } = vi.hoisted(() => ({
  mockLog: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn(), child: vi.fn() },
}));

vi.mock('../log.js', () => ({
  getLog: vi.fn(() => mockLog),
}));

import { createRouter, containerTarget } from './router.js';
import type { InboundDocument, InboundUpdate } from '../types/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ALLOWED = 1001n;

const DOC: InboundDocument = {
  id: 55n,
  fileName: 'report.pdf',
  size: 500,
  locator: { id: 55n, accessHash: 7n, fileReference: new Uint8Array([1]), dcId: 2 },
};

function makeUpdate(overrides: Partial<InboundUpdate> = {}): InboundUpdate {
  return {
    messageId: 10,
    peer: { kind: 'user', id: ALLOWED },
    outgoing: false,
    users: [{ id: ALLOWED, accessHash: 999n }],
    document: DOC,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Direct mode
// ---------------------------------------------------------------------------

describe('AuthorizationRouter (direct mode)', () => {
  const router = createRouter({ allowedUserId: ALLOWED, routing: { kind: 'direct' } });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('accepts a document from the allowed user and addresses the reply to them', () => {
    expect(router.mode).toBe('direct');
    expect(router.route(makeUpdate())).toEqual({
      status: 'accepted',
      target: { kind: 'user', userId: ALLOWED, accessHash: 999n },
      senderId: ALLOWED,
      messageId: 10,
      document: DOC,
    });
  });

  it('falls back to a zero access hash when the entity set lacks the sender', () => {
    const decision = router.route(makeUpdate({ users: [{ id: 5n, accessHash: 1n }] }));
    expect(decision.status === 'accepted' && decision.target).toEqual({
      kind: 'user',
      userId: ALLOWED,
      accessHash: 0n,
    });
  });

  it('rejects other senders and logs their id', () => {
    const decision = router.route(makeUpdate({ peer: { kind: 'user', id: 2002n } }));

    expect(decision).toEqual({ status: 'rejected', reason: 'unauthorized', senderId: 2002n });
    expect(mockLog.info).toHaveBeenCalledWith('Ignoring message from unauthorized user 2002');
  });

  it('ignores messages that are not one-to-one', () => {
    expect(router.route(makeUpdate({ peer: { kind: 'channel', id: 77n } }))).toEqual({
      status: 'rejected',
      reason: 'foreign-peer',
    });
    expect(router.route(makeUpdate({ peer: { kind: 'chat', id: 78n } }))).toEqual({
      status: 'rejected',
      reason: 'foreign-peer',
    });
  });

  it('passes over allowed messages without a document', () => {
    expect(router.route(makeUpdate({ document: undefined }))).toEqual({
      status: 'rejected',
      reason: 'no-document',
      senderId: ALLOWED,
    });
  });

  it('ignores messages sent by the account itself', () => {
    expect(router.route(makeUpdate({ outgoing: true }))).toEqual({ status: 'rejected', reason: 'outgoing' });
  });
});

// ---------------------------------------------------------------------------
// Container mode
// ---------------------------------------------------------------------------

describe('AuthorizationRouter (container mode)', () => {
  const router = createRouter({
    allowedUserId: ALLOWED,
    routing: { kind: 'container', container: { kind: 'channel', id: 4242n } },
  });

  it('accepts documents posted by the allowed user in the container', () => {
    const decision = router.route(
      makeUpdate({ peer: { kind: 'channel', id: 4242n }, from: { kind: 'user', id: ALLOWED }, users: [] })
    );

    expect(router.mode).toBe('container');
    expect(decision).toEqual({
      status: 'accepted',
      target: { kind: 'channel', channelId: 4242n },
      senderId: ALLOWED,
      messageId: 10,
      document: DOC,
    });
  });

  it('rejects updates from any other peer, including direct messages', () => {
    expect(router.route(makeUpdate({ peer: { kind: 'channel', id: 1n }, from: { kind: 'user', id: ALLOWED } })).status).toBe(
      'rejected'
    );
    expect(router.route(makeUpdate())).toEqual({ status: 'rejected', reason: 'foreign-peer' });
  });

  it('does not confuse a basic group with a channel of the same id', () => {
    const decision = router.route(
      makeUpdate({ peer: { kind: 'chat', id: 4242n }, from: { kind: 'user', id: ALLOWED } })
    );
    expect(decision).toEqual({ status: 'rejected', reason: 'foreign-peer' });
  });

  it('ignores posts without a user sender', () => {
    expect(router.route(makeUpdate({ peer: { kind: 'channel', id: 4242n } }))).toEqual({
      status: 'rejected',
      reason: 'unshaped',
    });
    expect(
      router.route(makeUpdate({ peer: { kind: 'channel', id: 4242n }, from: { kind: 'channel', id: 4242n } }))
    ).toEqual({ status: 'rejected', reason: 'unshaped' });
  });

  it('rejects other members of the container', () => {
    expect(
      router.route(makeUpdate({ peer: { kind: 'channel', id: 4242n }, from: { kind: 'user', id: 3n } }))
    ).toEqual({ status: 'rejected', reason: 'unauthorized', senderId: 3n });
  });

  it('addresses basic groups as chats', () => {
    expect(containerTarget({ kind: 'chat', id: 12n })).toEqual({ kind: 'chat', chatId: 12n });
  });
});
