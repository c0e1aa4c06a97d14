/**
 * Conversation State Manager
 *
 * The only writer of conversation status, resolved_at and escalation
 * fields. Messages are appended in arrival order with strictly increasing
 * timestamps; nothing already stored is ever changed or removed.
 */

import { v4 as uuidv4 } from 'uuid';
import { Conversation, ConversationStore, Message, MessageMetadata, Sender } from '../memory/types';
import { EscalationReason } from '../escalation/types';
import { TicketRegistry } from '../ticketing/ticket-registry';
import { StateMachine, stateMachine } from './state-machine';
import { ConversationNotFoundError, InvalidStateError, InvalidTurnInputError, isTerminal } from './types';
import { logger } from '../observability/logger';

export interface OpenConversationParams {
  tenantId: string;
  kbId: string;
  userId: string;
}

export interface LoadedConversation {
  conversation: Conversation;
  created: boolean;
  /** Terminal conversation the caller referenced, replaced by a fresh one */
  supersededId?: string;
}

export class ConversationStateManager {
  private readonly log = logger.child({ component: 'state-manager' });

  constructor(
    private readonly store: ConversationStore,
    private readonly tickets: TicketRegistry,
    private readonly machine: StateMachine = stateMachine,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async openConversation(params: OpenConversationParams): Promise<Conversation> {
    const startedAt = this.now();
    const conversation: Conversation = {
      id: this.tickets.newConversationId(),
      tenantId: params.tenantId,
      kbId: params.kbId,
      userId: params.userId,
      status: 'ongoing',
      ticketNumber: await this.tickets.issue(params.tenantId),
      startedAt: startedAt.toISOString(),
      resolvedAt: null,
      escalation: {},
      pendingContactRequest: null,
      satisfactionScore: null,
      resolutionTimeSeconds: null,
      lastMessageAt: 0,
      messageCount: 0,
    };
    await this.store.saveConversation(conversation);
    this.log.info({ conversationId: conversation.id, tenantId: params.tenantId, ticketNumber: conversation.ticketNumber }, 'Conversation opened');
    return conversation;
  }

  /** Conversation visible to `tenantId`, or null. */
  async get(tenantId: string, conversationId: string): Promise<Conversation | null> {
    const conversation = await this.store.getConversation(conversationId);
    if (!conversation || conversation.tenantId !== tenantId) return null;
    return conversation;
  }

  async require(tenantId: string, conversationId: string): Promise<Conversation> {
    const conversation = await this.get(tenantId, conversationId);
    if (!conversation) throw new ConversationNotFoundError(conversationId);
    return conversation;
  }

  /**
   * The conversation a turn belongs to. A terminal conversation is never
   * reopened: the turn starts a fresh one instead.
   */
  async loadOrCreate(params: OpenConversationParams & { conversationId?: string }): Promise<LoadedConversation> {
    if (!params.conversationId) {
      return { conversation: await this.openConversation(params), created: true };
    }

    const existing = await this.require(params.tenantId, params.conversationId);
    if (existing.kbId !== params.kbId) {
      throw new InvalidTurnInputError('kb_id does not match the conversation');
    }
    if (existing.userId !== params.userId) {
      throw new InvalidTurnInputError('user_id does not match the conversation');
    }
    if (isTerminal(existing.status)) {
      const fresh = await this.openConversation(params);
      this.log.info({ previous: existing.id, conversationId: fresh.id }, 'Terminal conversation referenced; started a new one');
      return { conversation: fresh, created: true, supersededId: existing.id };
    }
    return { conversation: existing, created: false };
  }

  async appendMessage(
    conversation: Conversation,
    sender: Sender,
    content: string,
    metadata?: MessageMetadata,
  ): Promise<Message> {
    const timestamp = Math.max(this.now().getTime(), conversation.lastMessageAt + 1);
    const message: Message = {
      id: uuidv4(),
      conversationId: conversation.id,
      sender,
      content,
      timestamp: new Date(timestamp).toISOString(),
      ...(metadata ? { metadata } : {}),
    };
    await this.store.appendMessage(message);
    conversation.lastMessageAt = timestamp;
    conversation.messageCount += 1;
    await this.store.saveConversation(conversation);
    return message;
  }

  recentMessages(conversationId: string, window: number): Promise<Message[]> {
    return this.store.getMessages(conversationId, window);
  }

  allMessages(conversationId: string): Promise<Message[]> {
    return this.store.getMessages(conversationId);
  }

  listByUser(tenantId: string, userId: string): Promise<Conversation[]> {
    return this.store.listByUser(tenantId, userId);
  }

  async requestContact(conversation: Conversation, reason: EscalationReason): Promise<void> {
    conversation.pendingContactRequest = { reason, requestedAt: this.now().toISOString() };
    await this.store.saveConversation(conversation);
  }

  async recordContact(conversation: Conversation, email: string): Promise<void> {
    conversation.escalation = { ...conversation.escalation, contactEmail: email };
    await this.store.saveConversation(conversation);
  }

  /** ongoing → escalated. Returns false when the conversation cannot escalate. */
  async escalate(conversation: Conversation, reason: EscalationReason, by: 'ai' | 'agent' = 'ai'): Promise<boolean> {
    const { newState, event } = this.machine.transition(conversation.id, conversation.status, 'escalated', reason);
    if (!event) return false;

    conversation.status = newState;
    conversation.escalation = {
      ...conversation.escalation,
      reason,
      escalatedAt: this.now().toISOString(),
      escalatedBy: by,
    };
    conversation.pendingContactRequest = null;
    await this.store.saveConversation(conversation);
    return true;
  }

  /**
   * ongoing → resolved_ai, escalated → resolved_human. Resolving a
   * conversation that is already resolved changes nothing.
   */
  async resolve(tenantId: string, conversationId: string, satisfactionScore?: number): Promise<Conversation> {
    if (satisfactionScore !== undefined && (!Number.isInteger(satisfactionScore) || satisfactionScore < 1 || satisfactionScore > 5)) {
      throw new InvalidTurnInputError('satisfaction_score must be an integer from 1 to 5');
    }

    const conversation = await this.require(tenantId, conversationId);
    const target = this.machine.resolutionTarget(conversation.status);
    if (!target) return conversation;

    const { newState, event } = this.machine.transition(conversation.id, conversation.status, target, 'resolve');
    if (!event) return conversation;

    const resolution = this.tickets.resolution(conversation.startedAt, this.now(), satisfactionScore);
    conversation.status = newState;
    conversation.resolvedAt = resolution.resolvedAt;
    conversation.resolutionTimeSeconds = resolution.resolutionTimeSeconds;
    conversation.satisfactionScore = resolution.satisfactionScore;
    conversation.pendingContactRequest = null;
    await this.store.saveConversation(conversation);
    return conversation;
  }

  /** Human agent reply; only while the conversation is escalated. */
  async addAgentMessage(tenantId: string, conversationId: string, content: string): Promise<Message> {
    const conversation = await this.require(tenantId, conversationId);
    if (conversation.status !== 'escalated') {
      throw new InvalidStateError(`Agent messages require an escalated conversation (status is ${conversation.status})`);
    }
    return this.appendMessage(conversation, 'agent', content);
  }
}
