import { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/app';
import { buildTestEngine, TestEngine } from '../helpers/engine';
import { draft } from '../helpers/fakes';
import { getDefaultFallback } from '../../src/resilience/static-fallbacks';

describe('Query API', () => {
  let app: FastifyInstance;
  let ctx: TestEngine;

  const ask = (payload: Record<string, unknown>, tenantId = 'tenant-a') =>
    app.inject({ method: 'POST', url: '/v1/query', headers: { 'x-tenant-id': tenantId }, payload });

  beforeEach(async () => {
    ctx = buildTestEngine([draft('Refunds are issued within 5 days [1].', 0.9, [1])]);
    app = await buildServer({
      engine: ctx.engine,
      state: ctx.state,
      breakers: ctx.breakers,
      defaultTenantId: 'default',
      enableMetrics: true,
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /v1/query', () => {
    it('should answer and open a conversation', async () => {
      const res = await ask({ message: 'How long does a refund take?', kb_id: 'kb-1', user_id: 'user-1' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.ai_response).toBe('Refunds are issued within 5 days [1].');
      expect(body.handoff_triggered).toBe(false);
      expect(body.confidence).toBe(0.9);
      expect(body.ticket_number).toMatch(/^CHAT-[A-Z2-9]{8}$/);
      expect(body.sources).toEqual([
        {
          title: 'Refund policy',
          excerpt: 'A refund is issued within 5 days.',
          similarity: 1,
          url: 'https://help.example.com/refunds',
        },
      ]);
      expect(typeof body.response_time).toBe('number');
    });

    it('should reject a missing or empty message', async () => {
      const missing = await ask({ kb_id: 'kb-1', user_id: 'user-1' });
      expect(missing.statusCode).toBe(400);
      expect(missing.json().error).toBe('invalid_request');

      const blank = await ask({ message: '   ', kb_id: 'kb-1', user_id: 'user-1' });
      expect(blank.statusCode).toBe(400);
      expect(blank.json()).toEqual({ error: 'invalid_request', details: 'message must not be empty' });
    });

    it('should reject an oversized message', async () => {
      const res = await ask({ message: 'a'.repeat(4001), kb_id: 'kb-1', user_id: 'user-1' });
      expect(res.statusCode).toBe(400);
    });

    it('should return 404 for an unknown conversation', async () => {
      const res = await ask({ message: 'Hello there', kb_id: 'kb-1', user_id: 'user-1', conversation_id: 'nope' });
      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('conversation_not_found');
    });

    it('should answer with the fallback body when a conversation cannot be opened', async () => {
      await app.close();
      ctx = buildTestEngine([draft('unused', 0.9)], undefined, { ticketStore: { reserve: async () => false } });
      app = await buildServer({ engine: ctx.engine, state: ctx.state, breakers: ctx.breakers, defaultTenantId: 'default' });
      await app.ready();

      const res = await ask({ message: 'How long does a refund take?', kb_id: 'kb-1', user_id: 'user-1' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        conversation_id: '',
        ticket_number: '',
        ai_response: getDefaultFallback(),
        sources: [],
        confidence: 0,
        handoff_triggered: true,
      });
      expect(ctx.primary.prompts).toHaveLength(0);
    });

    it('should keep tenants apart', async () => {
      const first = (await ask({ message: 'How long does a refund take?', kb_id: 'kb-1', user_id: 'user-1' })).json();

      const other = await ask(
        { message: 'And shipping?', kb_id: 'kb-1', user_id: 'user-1', conversation_id: first.conversation_id },
        'tenant-b',
      );
      expect(other.statusCode).toBe(404);
    });
  });

  describe('conversation lifecycle', () => {
    it('should resolve with a satisfaction score and refuse further agent replies', async () => {
      const first = (await ask({ message: 'How long does a refund take?', kb_id: 'kb-1', user_id: 'user-1' })).json();
      const id: string = first.conversation_id;

      const resolved = await app.inject({
        method: 'POST',
        url: `/v1/conversations/${id}/resolve`,
        headers: { 'x-tenant-id': 'tenant-a' },
        payload: { satisfaction_score: 5 },
      });
      expect(resolved.statusCode).toBe(200);
      expect(resolved.json()).toMatchObject({
        conversation_id: id,
        ticket_number: first.ticket_number,
        status: 'resolved_ai',
        satisfaction_score: 5,
      });

      const again = await app.inject({
        method: 'POST',
        url: `/v1/conversations/${id}/resolve`,
        headers: { 'x-tenant-id': 'tenant-a' },
      });
      expect(again.statusCode).toBe(200);
      expect(again.json().resolved_at).toBe(resolved.json().resolved_at);

      const agent = await app.inject({
        method: 'POST',
        url: `/v1/conversations/${id}/agent-messages`,
        headers: { 'x-tenant-id': 'tenant-a' },
        payload: { content: 'Anything else?' },
      });
      expect(agent.statusCode).toBe(409);
      expect(agent.json().error).toBe('invalid_state');
    });

    it('should reject an out-of-range satisfaction score', async () => {
      const first = (await ask({ message: 'How long does a refund take?', kb_id: 'kb-1', user_id: 'user-1' })).json();

      const res = await app.inject({
        method: 'POST',
        url: `/v1/conversations/${first.conversation_id}/resolve`,
        headers: { 'x-tenant-id': 'tenant-a' },
        payload: { satisfaction_score: 9 },
      });

      expect(res.statusCode).toBe(400);
    });

    it('should let an agent reply once the conversation is escalated', async () => {
      const first = (await ask({ message: 'Can I speak to a human?', kb_id: 'kb-1', user_id: 'user-1' })).json();
      expect(first.handoff_triggered).toBe(true);
      await ask({ message: 'me@example.com', kb_id: 'kb-1', user_id: 'user-1', conversation_id: first.conversation_id });

      const agent = await app.inject({
        method: 'POST',
        url: `/v1/conversations/${first.conversation_id}/agent-messages`,
        headers: { 'x-tenant-id': 'tenant-a' },
        payload: { content: 'Hi, this is Sam from support.' },
      });
      expect(agent.statusCode).toBe(201);
      expect(agent.json()).toMatchObject({ sender: 'agent', content: 'Hi, this is Sam from support.' });

      const view = await app.inject({
        method: 'GET',
        url: `/v1/conversations/${first.conversation_id}`,
        headers: { 'x-tenant-id': 'tenant-a' },
      });
      const body = view.json();
      expect(body.status).toBe('escalated');
      expect(body.escalation).toMatchObject({ reason: 'explicit_request', contact_email: 'me@example.com', escalated_by: 'ai' });
      expect(body.awaiting_contact).toBe(false);
      expect(body.messages.map((m: { sender: string }) => m.sender)).toEqual(['user', 'ai', 'user', 'ai', 'agent']);
      expect(ctx.notifier.sent).toHaveLength(1);
    });

    it('should list a user conversations', async () => {
      await ask({ message: 'How long does a refund take?', kb_id: 'kb-1', user_id: 'user-1' });
      await ask({ message: 'Tell me about shipping', kb_id: 'kb-1', user_id: 'user-2' });

      const res = await app.inject({
        method: 'GET',
        url: '/v1/conversations?user_id=user-1',
        headers: { 'x-tenant-id': 'tenant-a' },
      });

      expect(res.statusCode).toBe(200);
      const { conversations } = res.json();
      expect(conversations).toHaveLength(1);
      expect(conversations[0].user_id).toBe('user-1');
      expect(conversations[0].messages).toHaveLength(2);
    });
  });

  describe('health', () => {
    it('should report liveness', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe('ok');
    });

    it('should report not ready while a dependency breaker is open', async () => {
      const ready = await app.inject({ method: 'GET', url: '/ready' });
      expect(ready.statusCode).toBe(200);

      const breaker = ctx.breakers.get('generation');
      for (let i = 0; i < 5; i++) breaker.recordFailure();

      const res = await app.inject({ method: 'GET', url: '/ready' });
      expect(res.statusCode).toBe(503);
      expect(res.json().checks.dep_generation).toEqual({ status: 'error', failures: 5 });
    });

    it('should expose prometheus metrics', async () => {
      const res = await app.inject({ method: 'GET', url: '/metrics' });
      expect(res.statusCode).toBe(200);
      expect(res.body).toContain('http_request_duration_seconds');
    });
  });
});
