import { EscalationPolicy } from '../escalation/types';

export interface RetrievalSettings {
  topK: number;
  maxContextChars: number;
}

/** Tenant configuration */
export interface TenantConfig {
  tenantId: string;
  escalation: EscalationPolicy;
  retrieval: RetrievalSettings;
  /** Earlier messages passed to generation as history */
  historyWindow: number;
  /** Phrases that count as asking for a human, matched on word boundaries */
  humanRequestPhrases: string[];
  promptVersion: string;
}

/** Shape of config/tenants/*.json; anything omitted comes from the built-in default */
export interface TenantConfigFile {
  tenantId: string;
  escalation?: Partial<EscalationPolicy>;
  retrieval?: Partial<RetrievalSettings>;
  historyWindow?: number;
  humanRequestPhrases?: string[];
  promptVersion?: string;
}
