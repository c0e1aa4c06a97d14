/**
 * Confidence & Escalation Evaluator
 *
 * Any one trigger escalates. Reasons are checked in priority order:
 *
 * | Reason                        | Fires when                                         |
 * |-------------------------------|----------------------------------------------------|
 * | service_degraded              | generation was unavailable                         |
 * | policy_violation              | review verdict was reject                          |
 * | explicit_request              | the user asked for a human                         |
 * | repeated_unresolved_question  | same kb question ≥ repeatThreshold times           |
 * | low_confidence                | confidence < confidenceThreshold                   |
 * | no_knowledge_match            | kb_query, zero chunks, confidence < noMatchThreshold |
 */

import { AnswerCandidate } from '../agent/types';
import { Message } from '../memory/types';
import { EscalationDecision, EscalationPolicy, EscalationReason, HARD_TRIGGERS } from './types';
import { questionSimilarity } from './similarity';
import { logger } from '../observability/logger';
import { escalations } from '../observability/metrics';

export const DEFAULT_ESCALATION_POLICY: EscalationPolicy = {
  confidenceThreshold: 0.5,
  noMatchThreshold: 0.65,
  repeatThreshold: 3,
  duplicateSimilarity: 0.8,
  duplicateWindow: 20,
};

export type HistoryEntry = Pick<Message, 'sender' | 'content'>;

export class EscalationEvaluator {
  private readonly log = logger.child({ component: 'escalation-evaluator' });
  private readonly policy: EscalationPolicy;

  constructor(policy?: Partial<EscalationPolicy>) {
    this.policy = { ...DEFAULT_ESCALATION_POLICY, ...policy };
  }

  /**
   * @param history earlier messages of the conversation, oldest first, not
   *   including the current question
   * @param contactEmail address already on file for the conversation
   */
  evaluate(
    candidate: AnswerCandidate,
    history: HistoryEntry[],
    contactEmail?: string,
    policyOverride?: Partial<EscalationPolicy>,
  ): EscalationDecision {
    const policy = policyOverride ? { ...this.policy, ...policyOverride } : this.policy;
    const reason = this.findReason(candidate, history, policy);
    if (!reason) return { trigger: false };

    const collectContact = !HARD_TRIGGERS.has(reason) && !contactEmail;
    escalations.inc({ reason, collect_contact: String(collectContact) });
    this.log.info({ reason, collectContact, confidence: candidate.confidence, route: candidate.route }, 'Escalation triggered');
    return { trigger: true, reason, collectContact };
  }

  /** Earlier user messages that ask the same thing as `question` */
  countRepeats(question: string, history: HistoryEntry[], policy: EscalationPolicy = this.policy): number {
    return history
      .filter((m) => m.sender === 'user')
      .slice(-policy.duplicateWindow)
      .filter((m) => questionSimilarity(m.content, question) >= policy.duplicateSimilarity)
      .length;
  }

  private findReason(candidate: AnswerCandidate, history: HistoryEntry[], policy: EscalationPolicy): EscalationReason | undefined {
    if (candidate.failure === 'service_degraded') return 'service_degraded';
    if (candidate.verdict === 'reject' || candidate.failure === 'policy_violation') return 'policy_violation';
    if (candidate.route === 'escalation_request') return 'explicit_request';

    // Fixed, non-generated answers (math errors) carry no confidence signal
    if (!candidate.generated) return undefined;

    if (candidate.route === 'kb_query' && this.countRepeats(candidate.question, history, policy) + 1 >= policy.repeatThreshold) {
      return 'repeated_unresolved_question';
    }
    if (candidate.confidence < policy.confidenceThreshold) return 'low_confidence';
    if (candidate.route === 'kb_query' && candidate.retrievedCount === 0 && candidate.confidence < policy.noMatchThreshold) {
      return 'no_knowledge_match';
    }
    return undefined;
  }
}
