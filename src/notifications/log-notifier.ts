import { Conversation } from '../memory/types';
import { EscalationReason } from '../escalation/types';
import { logger } from '../observability/logger';
import { EscalationDetails, NotificationService } from './types';
import { buildEscalationPayload } from './webhook-notifier';

/** Used when no webhook is configured: the escalation only shows up in the logs. */
export class LogNotifier implements NotificationService {
  private readonly log = logger.child({ component: 'log-notifier' });

  async notifyEscalation(conversation: Conversation, reason: EscalationReason, details: EscalationDetails): Promise<void> {
    const { context: _context, ...payload } = buildEscalationPayload(conversation, reason, details);
    this.log.warn(payload, 'Conversation escalated to the human team');
  }
}
