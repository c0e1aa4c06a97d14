import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  defaultTenantId: optional('DEFAULT_TENANT_ID', 'default'),

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 1024),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0.2),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 1024),
    temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0.2),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 1024),
    temperature: optionalFloat('GEMINI_TEMPERATURE', 0.2),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'openai'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
    tertiaryProvider: optional('LLM_TERTIARY_PROVIDER', ''),
  },

  embeddings: {
    model: optional('EMBEDDING_MODEL', 'text-embedding-3-small'),
    baseUrl: optional('EMBEDDING_BASE_URL', 'https://api.openai.com'),
    apiKey: optional('EMBEDDING_API_KEY', optional('OPENAI_API_KEY', '')),
    dimension: optionalInt('EMBEDDING_DIMENSION', 1536),
  },

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'rag:'),
  },

  retrieval: {
    topK: optionalInt('RETRIEVAL_TOP_K', 5),
    maxContextChars: optionalInt('RETRIEVAL_MAX_CONTEXT_CHARS', 8000),
    historyWindow: optionalInt('HISTORY_WINDOW', 10),
  },

  resilience: {
    maxAttempts: optionalInt('RETRY_MAX_ATTEMPTS', 3),
    baseDelayMs: optionalInt('RETRY_BASE_DELAY_MS', 1000),
    multiplier: optionalFloat('RETRY_MULTIPLIER', 2),
    jitter: optionalFloat('RETRY_JITTER', 0.2),
    breakerThreshold: optionalInt('BREAKER_FAILURE_THRESHOLD', 5),
    breakerCooldownMs: optionalInt('BREAKER_COOLDOWN_MS', 60000),
    retrievalTimeoutMs: optionalInt('RETRIEVAL_TIMEOUT_MS', 10000),
    generationTimeoutMs: optionalInt('GENERATION_TIMEOUT_MS', 20000),
  },

  escalation: {
    confidenceThreshold: optionalFloat('ESCALATION_CONFIDENCE_THRESHOLD', 0.5),
    noMatchThreshold: optionalFloat('ESCALATION_NO_MATCH_THRESHOLD', 0.65),
    repeatThreshold: optionalInt('ESCALATION_REPEAT_THRESHOLD', 3),
    duplicateSimilarity: optionalFloat('ESCALATION_DUPLICATE_SIMILARITY', 0.8),
    duplicateWindow: optionalInt('ESCALATION_DUPLICATE_WINDOW', 20),
  },

  tickets: {
    prefix: optional('TICKET_PREFIX', 'CHAT-'),
    length: optionalInt('TICKET_LENGTH', 8),
    maxAttempts: optionalInt('TICKET_MAX_ATTEMPTS', 10),
  },

  notifications: {
    webhookUrl: optional('ESCALATION_WEBHOOK_URL', ''),
    timeoutMs: optionalInt('ESCALATION_WEBHOOK_TIMEOUT_MS', 5000),
  },

  knowledge: {
    seedDir: optional('KNOWLEDGE_SEED_DIR', ''),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;
