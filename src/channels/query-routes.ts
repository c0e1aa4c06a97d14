import { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import Ajv, { JSONSchemaType } from 'ajv';
import { ConversationEngine } from '../orchestrator/orchestrator';
import { ConversationStateManager } from '../orchestrator/state-manager';
import { ConversationNotFoundError, InvalidStateError, InvalidTurnInputError } from '../orchestrator/types';
import { Conversation, Message } from '../memory/types';
import { logger } from '../observability/logger';

interface QueryBody {
  message: string;
  kb_id: string;
  user_id: string;
  conversation_id?: string;
}

interface ResolveBody {
  satisfaction_score?: number;
}

interface AgentMessageBody {
  content: string;
}

interface ConversationParams {
  id: string;
}

interface ListQuery {
  user_id: string;
}

const QUERY_BODY_SCHEMA: JSONSchemaType<QueryBody> = {
  type: 'object',
  properties: {
    message: { type: 'string', minLength: 1, maxLength: 4000 },
    kb_id: { type: 'string', minLength: 1 },
    user_id: { type: 'string', minLength: 1 },
    conversation_id: { type: 'string', minLength: 1, nullable: true },
  },
  required: ['message', 'kb_id', 'user_id'],
  additionalProperties: false,
};

const RESOLVE_BODY_SCHEMA: JSONSchemaType<ResolveBody> = {
  type: 'object',
  properties: {
    satisfaction_score: { type: 'integer', minimum: 1, maximum: 5, nullable: true },
  },
  required: [],
  additionalProperties: false,
};

const AGENT_MESSAGE_SCHEMA: JSONSchemaType<AgentMessageBody> = {
  type: 'object',
  properties: {
    content: { type: 'string', minLength: 1, maxLength: 4000 },
  },
  required: ['content'],
  additionalProperties: false,
};

const PARAMS_SCHEMA: JSONSchemaType<ConversationParams> = {
  type: 'object',
  properties: { id: { type: 'string', minLength: 1 } },
  required: ['id'],
};

const LIST_QUERY_SCHEMA: JSONSchemaType<ListQuery> = {
  type: 'object',
  properties: { user_id: { type: 'string', minLength: 1 } },
  required: ['user_id'],
};

// Resolve may arrive without any body at all
const validateResolveBody = new Ajv().compile(RESOLVE_BODY_SCHEMA);

export interface QueryRouteDeps {
  engine: ConversationEngine;
  state: ConversationStateManager;
  defaultTenantId: string;
}

function tenantOf(req: FastifyRequest, fallback: string): string {
  const header = req.headers['x-tenant-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value?.trim() || fallback;
}

function messageView(m: Message) {
  return {
    id: m.id,
    sender: m.sender,
    content: m.content,
    timestamp: m.timestamp,
    ...(m.metadata ? { metadata: m.metadata } : {}),
  };
}

export function conversationView(c: Conversation, messages: Message[]) {
  return {
    conversation_id: c.id,
    ticket_number: c.ticketNumber,
    tenant_id: c.tenantId,
    kb_id: c.kbId,
    user_id: c.userId,
    status: c.status,
    started_at: c.startedAt,
    resolved_at: c.resolvedAt,
    escalation: {
      reason: c.escalation.reason ?? null,
      escalated_at: c.escalation.escalatedAt ?? null,
      escalated_by: c.escalation.escalatedBy ?? null,
      contact_email: c.escalation.contactEmail ?? null,
    },
    awaiting_contact: c.pendingContactRequest !== null,
    satisfaction_score: c.satisfactionScore,
    resolution_time: c.resolutionTimeSeconds,
    messages: messages.map(messageView),
  };
}

/** Maps engine errors and request validation failures to HTTP status codes. */
export function queryErrorHandler(error: FastifyError, req: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (error.validation) {
    return reply.status(400).send({ error: 'invalid_request', details: error.message });
  }
  if (error instanceof InvalidTurnInputError) {
    return reply.status(400).send({ error: 'invalid_request', details: error.message });
  }
  if (error instanceof ConversationNotFoundError) {
    return reply.status(404).send({ error: 'conversation_not_found', details: error.message });
  }
  if (error instanceof InvalidStateError) {
    return reply.status(409).send({ error: 'invalid_state', details: error.message });
  }
  if (error.statusCode !== undefined && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ error: 'invalid_request', details: error.message });
  }
  logger.error({ err: error, requestId: req.id, url: req.url }, 'Unhandled request error');
  return reply.status(500).send({ error: 'internal_error' });
}

/**
 * Public conversation API.
 *
 *   POST /v1/query                                one user turn
 *   POST /v1/conversations/:id/resolve            close a conversation
 *   GET  /v1/conversations/:id                    conversation with messages
 *   GET  /v1/conversations?user_id=               a user's conversations
 *   POST /v1/conversations/:id/agent-messages     human agent reply
 *
 * The tenant comes from the `x-tenant-id` header.
 */
export function registerQueryRoutes(app: FastifyInstance, deps: QueryRouteDeps): void {
  const { engine, state, defaultTenantId } = deps;

  app.post<{ Body: QueryBody }>('/v1/query', { schema: { body: QUERY_BODY_SCHEMA } }, async (req, reply) => {
    const response = await engine.handleTurn({
      tenantId: tenantOf(req, defaultTenantId),
      conversationId: req.body.conversation_id,
      kbId: req.body.kb_id,
      userId: req.body.user_id,
      message: req.body.message,
      requestId: req.id,
    });

    // The turn is already recorded; nobody is left to read the answer
    if (reply.raw.destroyed) {
      logger.info({ requestId: req.id, conversationId: response.conversation_id }, 'Client disconnected before the answer was sent');
      reply.hijack();
      return;
    }
    return reply.send(response);
  });

  app.post<{ Params: ConversationParams; Body: unknown }>(
    '/v1/conversations/:id/resolve',
    { schema: { params: PARAMS_SCHEMA } },
    async (req, reply) => {
      const body = req.body ?? {};
      if (!validateResolveBody(body)) {
        return reply.status(400).send({ error: 'invalid_request', details: 'satisfaction_score must be an integer from 1 to 5' });
      }
      const conversation = await engine.resolve(
        tenantOf(req, defaultTenantId),
        req.params.id,
        body.satisfaction_score ?? undefined,
      );
      return reply.send({
        conversation_id: conversation.id,
        ticket_number: conversation.ticketNumber,
        status: conversation.status,
        resolved_at: conversation.resolvedAt,
        satisfaction_score: conversation.satisfactionScore,
        resolution_time: conversation.resolutionTimeSeconds,
      });
    },
  );

  app.get<{ Params: ConversationParams }>(
    '/v1/conversations/:id',
    { schema: { params: PARAMS_SCHEMA } },
    async (req, reply) => {
      const conversation = await state.require(tenantOf(req, defaultTenantId), req.params.id);
      const messages = await state.allMessages(conversation.id);
      return reply.send(conversationView(conversation, messages));
    },
  );

  app.get<{ Querystring: ListQuery }>(
    '/v1/conversations',
    { schema: { querystring: LIST_QUERY_SCHEMA } },
    async (req, reply) => {
      const conversations = await state.listByUser(tenantOf(req, defaultTenantId), req.query.user_id);
      const views = await Promise.all(
        conversations.map(async (c) => conversationView(c, await state.allMessages(c.id))),
      );
      return reply.send({ conversations: views });
    },
  );

  app.post<{ Params: ConversationParams; Body: AgentMessageBody }>(
    '/v1/conversations/:id/agent-messages',
    { schema: { params: PARAMS_SCHEMA, body: AGENT_MESSAGE_SCHEMA } },
    async (req, reply) => {
      const message = await engine.addAgentMessage(tenantOf(req, defaultTenantId), req.params.id, req.body.content.trim());
      return reply.status(201).send(messageView(message));
    },
  );
}
