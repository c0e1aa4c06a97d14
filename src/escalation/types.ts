export type EscalationReason =
  | 'policy_violation'
  | 'service_degraded'
  | 'explicit_request'
  | 'repeated_unresolved_question'
  | 'low_confidence'
  | 'no_knowledge_match';

export const ESCALATION_REASON_LABELS: Record<EscalationReason, string> = {
  policy_violation: 'policy violation',
  service_degraded: 'service degraded',
  explicit_request: 'explicit request for a human',
  repeated_unresolved_question: 'repeated unresolved question',
  low_confidence: 'low confidence',
  no_knowledge_match: 'no knowledge match',
};

/**
 * Hard triggers hand off immediately; soft ones first collect a contact
 * address when none is on file.
 */
export const HARD_TRIGGERS: ReadonlySet<EscalationReason> = new Set<EscalationReason>(['policy_violation', 'service_degraded']);

export interface EscalationPolicy {
  /** Escalate below this confidence */
  confidenceThreshold: number;
  /** Stricter threshold for kb_query turns that retrieved nothing */
  noMatchThreshold: number;
  /** Near-duplicate user questions (including the current one) that trigger escalation */
  repeatThreshold: number;
  /** Token-set similarity at or above which two questions count as the same */
  duplicateSimilarity: number;
  /** Most recent earlier user messages compared against the current one */
  duplicateWindow: number;
}

export type EscalationDecision =
  | { trigger: false }
  | {
      trigger: true;
      reason: EscalationReason;
      /** Ask for an email before handing off */
      collectContact: boolean;
    };
