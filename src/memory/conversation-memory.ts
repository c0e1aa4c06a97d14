import Redis from 'ioredis';
import { Conversation, ConversationStore, Message } from './types';
import { isConversation, isMessage, parseRecord } from './record-schemas';
import { env } from '../config/env';
import { logger } from '../observability/logger';

/** The Redis commands the conversation store issues; an ioredis client satisfies it. */
export interface ConversationRedis {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  rpush(key: string, value: string): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
}

/**
 * Redis-backed conversation store.
 *
 *   <prefix>conv:<id>                 conversation JSON
 *   <prefix>conv:<id>:messages        append-only list of message JSON
 *   <prefix>user:<tenant>:<user>      sorted set of conversation ids by start time
 */
export class RedisConversationStore implements ConversationStore {
  private redis: ConversationRedis;
  private prefix: string;

  constructor(redis: ConversationRedis, keyPrefix: string = env.redis.keyPrefix) {
    this.redis = redis;
    this.prefix = keyPrefix;
  }

  private key(conversationId: string): string {
    return `${this.prefix}conv:${conversationId}`;
  }

  private messagesKey(conversationId: string): string {
    return `${this.prefix}conv:${conversationId}:messages`;
  }

  private userKey(tenantId: string, userId: string): string {
    return `${this.prefix}user:${tenantId}:${userId}`;
  }

  async getConversation(conversationId: string): Promise<Conversation | null> {
    const raw = await this.redis.get(this.key(conversationId));
    if (!raw) return null;
    const record = parseRecord(raw, isConversation);
    if (!record) {
      logger.error({ conversationId }, 'Stored conversation failed validation');
      return null;
    }
    return record;
  }

  async saveConversation(conversation: Conversation): Promise<void> {
    await this.redis.set(this.key(conversation.id), JSON.stringify(conversation));
    // Re-adding an existing member keeps the set unchanged
    await this.redis.zadd(this.userKey(conversation.tenantId, conversation.userId), Date.parse(conversation.startedAt), conversation.id);
  }

  async appendMessage(message: Message): Promise<void> {
    await this.redis.rpush(this.messagesKey(message.conversationId), JSON.stringify(message));
  }

  async getMessages(conversationId: string, limit?: number): Promise<Message[]> {
    const start = limit === undefined ? 0 : -Math.max(limit, 0);
    if (limit === 0) return [];
    const rows = await this.redis.lrange(this.messagesKey(conversationId), start, -1);
    const messages: Message[] = [];
    for (const row of rows) {
      const message = parseRecord(row, isMessage);
      if (message) messages.push(message);
      else logger.error({ conversationId }, 'Stored message failed validation');
    }
    return messages;
  }

  async listByUser(tenantId: string, userId: string): Promise<Conversation[]> {
    const ids = await this.redis.zrevrange(this.userKey(tenantId, userId), 0, -1);
    const conversations: Conversation[] = [];
    for (const id of ids) {
      const conversation = await this.getConversation(id);
      if (conversation && conversation.tenantId === tenantId) conversations.push(conversation);
    }
    return conversations;
  }
}

/**
 * In-memory conversation store (dev/test fallback).
 */
export class InMemoryConversationStore implements ConversationStore {
  private conversations: Map<string, Conversation> = new Map();
  private messages: Map<string, Message[]> = new Map();

  async getConversation(conversationId: string): Promise<Conversation | null> {
    const found = this.conversations.get(conversationId);
    return found ? structuredClone(found) : null;
  }

  async saveConversation(conversation: Conversation): Promise<void> {
    this.conversations.set(conversation.id, structuredClone(conversation));
  }

  async appendMessage(message: Message): Promise<void> {
    const list = this.messages.get(message.conversationId) ?? [];
    list.push(structuredClone(message));
    this.messages.set(message.conversationId, list);
  }

  async getMessages(conversationId: string, limit?: number): Promise<Message[]> {
    const list = this.messages.get(conversationId) ?? [];
    const slice = limit === undefined ? list : limit <= 0 ? [] : list.slice(-limit);
    return slice.map((m) => structuredClone(m));
  }

  async listByUser(tenantId: string, userId: string): Promise<Conversation[]> {
    return Array.from(this.conversations.values())
      .filter((c) => c.tenantId === tenantId && c.userId === userId)
      .sort((a, b) => Date.parse(b.startedAt) - Date.parse(a.startedAt))
      .map((c) => structuredClone(c));
  }
}

/**
 * Create the appropriate store based on environment.
 */
export function createConversationStore(redis?: Redis): ConversationStore {
  if (redis) {
    return new RedisConversationStore(redis);
  }
  logger.warn('Using in-memory conversation store (no Redis)');
  return new InMemoryConversationStore();
}
