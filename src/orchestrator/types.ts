import { ConversationStatus } from '../memory/types';

/** Allowed status edges. Terminal states accept no automatic transitions. */
export const STATE_TRANSITIONS: Record<ConversationStatus, readonly ConversationStatus[]> = {
  ongoing: ['resolved_ai', 'escalated'],
  escalated: ['resolved_human'],
  resolved_ai: [],
  resolved_human: [],
};

export const TERMINAL_STATUSES: ReadonlySet<ConversationStatus> = new Set<ConversationStatus>(['resolved_ai', 'resolved_human']);

export function isTerminal(status: ConversationStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface StateTransitionEvent {
  conversationId: string;
  from: ConversationStatus;
  to: ConversationStatus;
  reason: string;
  timestamp: number;
}

/** Inbound turn, as accepted from the HTTP layer. */
export interface TurnInput {
  tenantId: string;
  conversationId?: string;
  kbId: string;
  userId: string;
  message: string;
  requestId?: string;
}

export interface SourceView {
  title: string;
  excerpt: string;
  similarity: number;
  url: string | null;
}

export interface TurnResponse {
  conversation_id: string;
  ticket_number: string;
  ai_response: string;
  sources: SourceView[];
  confidence: number;
  handoff_triggered: boolean;
  /** Seconds, two decimals */
  response_time: number;
}

export class InvalidTurnInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTurnInputError';
  }
}

export class ConversationNotFoundError extends Error {
  constructor(readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`);
    this.name = 'ConversationNotFoundError';
  }
}

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}
