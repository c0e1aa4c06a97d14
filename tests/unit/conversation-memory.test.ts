import { InMemoryConversationStore } from '../../src/memory/conversation-memory';
import { Conversation, Message } from '../../src/memory/types';

function conversation(id: string, startedAt: string, overrides: Partial<Conversation> = {}): Conversation {
  return {
    id,
    tenantId: 'tenant-a',
    kbId: 'kb-1',
    userId: 'user-1',
    status: 'ongoing',
    ticketNumber: `CHAT-${id.toUpperCase().padEnd(8, 'A')}`,
    startedAt,
    resolvedAt: null,
    escalation: {},
    pendingContactRequest: null,
    satisfactionScore: null,
    resolutionTimeSeconds: null,
    lastMessageAt: 0,
    messageCount: 0,
    ...overrides,
  };
}

function message(conversationId: string, n: number): Message {
  return {
    id: `m${n}`,
    conversationId,
    sender: n % 2 === 0 ? 'ai' : 'user',
    content: `message ${n}`,
    timestamp: new Date(Date.UTC(2026, 2, 1, 9, 0, n)).toISOString(),
  };
}

describe('InMemoryConversationStore', () => {
  let store: InMemoryConversationStore;

  beforeEach(() => {
    store = new InMemoryConversationStore();
  });

  it('should return null for unknown conversations', async () => {
    expect(await store.getConversation('missing')).toBeNull();
    expect(await store.getMessages('missing')).toEqual([]);
  });

  it('should hand out copies so callers cannot mutate stored state', async () => {
    const conv = conversation('c1', '2026-03-01T09:00:00.000Z');
    await store.saveConversation(conv);
    conv.status = 'escalated';

    const loaded = await store.getConversation('c1');
    expect(loaded?.status).toBe('ongoing');
    if (loaded) loaded.status = 'resolved_ai';
    expect((await store.getConversation('c1'))?.status).toBe('ongoing');
  });

  it('should keep messages in arrival order and honour the limit', async () => {
    for (let n = 1; n <= 5; n++) {
      await store.appendMessage(message('c1', n));
    }

    expect((await store.getMessages('c1')).map((m) => m.id)).toEqual(['m1', 'm2', 'm3', 'm4', 'm5']);
    expect((await store.getMessages('c1', 2)).map((m) => m.id)).toEqual(['m4', 'm5']);
    expect(await store.getMessages('c1', 0)).toEqual([]);
  });

  it('should list a user conversations newest first within the tenant', async () => {
    await store.saveConversation(conversation('c1', '2026-03-01T09:00:00.000Z'));
    await store.saveConversation(conversation('c2', '2026-03-02T09:00:00.000Z'));
    await store.saveConversation(conversation('c3', '2026-03-03T09:00:00.000Z', { tenantId: 'tenant-b' }));
    await store.saveConversation(conversation('c4', '2026-03-04T09:00:00.000Z', { userId: 'user-2' }));

    expect((await store.listByUser('tenant-a', 'user-1')).map((c) => c.id)).toEqual(['c2', 'c1']);
  });
});
