import { EscalationReason } from '../escalation/types';

export type ConversationStatus = 'ongoing' | 'resolved_ai' | 'resolved_human' | 'escalated';

export type Sender = 'user' | 'ai' | 'agent';

export interface EscalationInfo {
  reason?: EscalationReason;
  escalatedAt?: string;
  escalatedBy?: 'ai' | 'agent';
  contactEmail?: string;
}

/** Set when a soft trigger fired without a contact address on file */
export interface PendingContactRequest {
  reason: EscalationReason;
  requestedAt: string;
}

export interface Conversation {
  id: string;
  tenantId: string;
  kbId: string;
  userId: string;
  status: ConversationStatus;
  /** Assigned once at creation, never changed */
  ticketNumber: string;
  startedAt: string;
  /** Set iff status is resolved_ai or resolved_human */
  resolvedAt: string | null;
  escalation: EscalationInfo;
  pendingContactRequest: PendingContactRequest | null;
  satisfactionScore: number | null;
  resolutionTimeSeconds: number | null;
  /** Epoch ms of the newest message; message timestamps strictly increase past it */
  lastMessageAt: number;
  messageCount: number;
}

export interface MessageSource {
  title: string;
  excerpt: string;
  similarity: number;
  url: string | null;
}

export interface MessageMetadata {
  confidence?: number;
  route?: string;
  sources?: MessageSource[];
}

/** Append-only; never mutated or deleted once stored. */
export interface Message {
  id: string;
  conversationId: string;
  sender: Sender;
  content: string;
  /** ISO timestamp, strictly increasing within a conversation */
  timestamp: string;
  metadata?: MessageMetadata;
}

export interface ConversationStore {
  getConversation(conversationId: string): Promise<Conversation | null>;
  saveConversation(conversation: Conversation): Promise<void>;
  appendMessage(message: Message): Promise<void>;
  /** Messages in arrival order; with `limit`, only the newest `limit` */
  getMessages(conversationId: string, limit?: number): Promise<Message[]>;
  /** A user's conversations in one tenant, newest first */
  listByUser(tenantId: string, userId: string): Promise<Conversation[]>;
}
