import Ajv from 'ajv';
import { Conversation, Message } from './types';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const nullableString = { type: ['string', 'null'] };
const nullableNumber = { type: ['number', 'null'] };

export const CONVERSATION_SCHEMA = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    tenantId: { type: 'string' },
    kbId: { type: 'string' },
    userId: { type: 'string' },
    status: { type: 'string', enum: ['ongoing', 'resolved_ai', 'resolved_human', 'escalated'] },
    ticketNumber: { type: 'string' },
    startedAt: { type: 'string' },
    resolvedAt: nullableString,
    escalation: {
      type: 'object',
      properties: {
        reason: { type: 'string' },
        escalatedAt: { type: 'string' },
        escalatedBy: { type: 'string', enum: ['ai', 'agent'] },
        contactEmail: { type: 'string' },
      },
    },
    pendingContactRequest: {
      type: ['object', 'null'],
      properties: {
        reason: { type: 'string' },
        requestedAt: { type: 'string' },
      },
      required: ['reason', 'requestedAt'],
    },
    satisfactionScore: nullableNumber,
    resolutionTimeSeconds: nullableNumber,
    lastMessageAt: { type: 'number' },
    messageCount: { type: 'integer' },
  },
  required: [
    'id', 'tenantId', 'kbId', 'userId', 'status', 'ticketNumber', 'startedAt', 'resolvedAt',
    'escalation', 'pendingContactRequest', 'satisfactionScore', 'resolutionTimeSeconds',
    'lastMessageAt', 'messageCount',
  ],
};

export const MESSAGE_SCHEMA = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    conversationId: { type: 'string' },
    sender: { type: 'string', enum: ['user', 'ai', 'agent'] },
    content: { type: 'string' },
    timestamp: { type: 'string' },
    metadata: { type: 'object' },
  },
  required: ['id', 'conversationId', 'sender', 'content', 'timestamp'],
};

export const isConversation = ajv.compile<Conversation>(CONVERSATION_SCHEMA);
export const isMessage = ajv.compile<Message>(MESSAGE_SCHEMA);

/** Parse a stored JSON record, or undefined if it does not match. */
export function parseRecord<T>(raw: string, guard: (value: unknown) => value is T): T | undefined {
  const parsed: unknown = JSON.parse(raw);
  return guard(parsed) ? parsed : undefined;
}
