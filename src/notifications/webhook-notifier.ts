import { Conversation } from '../memory/types';
import { ESCALATION_REASON_LABELS, EscalationReason } from '../escalation/types';
import { HttpStatusError } from '../knowledge/embedding-service';
import { ResilienceLayer } from '../resilience/resilience-layer';
import { logger } from '../observability/logger';
import { EscalationDetails, EscalationPayload, NotificationService } from './types';

/** Context excerpt sent with a notification */
export const NOTIFICATION_CONTEXT_CHARS = 500;

export function buildEscalationPayload(
  conversation: Conversation,
  reason: EscalationReason,
  details: EscalationDetails,
): EscalationPayload {
  return {
    event: 'conversation.escalated',
    conversation_id: conversation.id,
    tenant_id: conversation.tenantId,
    ticket_number: conversation.ticketNumber,
    user_id: conversation.userId,
    kb_id: conversation.kbId,
    reason,
    reason_label: ESCALATION_REASON_LABELS[reason],
    contact_email: conversation.escalation.contactEmail ?? null,
    query: details.query,
    context: details.context.slice(0, NOTIFICATION_CONTEXT_CHARS),
    escalated_at: conversation.escalation.escalatedAt ?? new Date().toISOString(),
  };
}

export class WebhookNotifier implements NotificationService {
  private readonly log = logger.child({ component: 'webhook-notifier' });

  constructor(
    private readonly url: string,
    private readonly resilience: ResilienceLayer,
    private readonly timeoutMs = 5000,
  ) {}

  async notifyEscalation(conversation: Conversation, reason: EscalationReason, details: EscalationDetails): Promise<void> {
    const payload = buildEscalationPayload(conversation, reason, details);

    await this.resilience.execute(
      'notification',
      async (signal) => {
        const res = await fetch(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
          signal,
        });
        if (!res.ok) {
          throw new HttpStatusError(res.status, `Escalation webhook ${res.status}`);
        }
      },
      { timeoutMs: this.timeoutMs },
    );

    this.log.info({ conversationId: conversation.id, ticketNumber: conversation.ticketNumber, reason }, 'Escalation notification sent');
  }
}
