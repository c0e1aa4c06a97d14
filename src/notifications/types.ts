import { Conversation } from '../memory/types';
import { EscalationReason } from '../escalation/types';

export interface EscalationDetails {
  /** The user message that triggered the handoff */
  query: string;
  /** Formatted knowledge context the answer was drafted from, if any */
  context: string;
}

/** Tells the human team that a conversation needs them. */
export interface NotificationService {
  notifyEscalation(conversation: Conversation, reason: EscalationReason, details: EscalationDetails): Promise<void>;
}

/** Body POSTed to the escalation webhook */
export interface EscalationPayload {
  event: 'conversation.escalated';
  conversation_id: string;
  tenant_id: string;
  ticket_number: string;
  user_id: string;
  kb_id: string;
  reason: EscalationReason;
  reason_label: string;
  contact_email: string | null;
  query: string;
  context: string;
  escalated_at: string;
}
