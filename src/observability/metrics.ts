import client from 'prom-client';

export const register = new client.Registry();
client.collectDefaultMetrics({ register, prefix: 'rag_' });

// ───── HTTP ─────
export const httpRequestDuration = new client.Histogram({
  name: 'rag_http_request_duration_seconds',
  help: 'HTTP request latency',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [register],
});

// ───── Resilience ─────
export const dependencyCalls = new client.Counter({
  name: 'rag_dependency_calls_total',
  help: 'External dependency call outcomes',
  labelNames: ['dependency', 'outcome'],
  registers: [register],
});

export const circuitBreakerState = new client.Gauge({
  name: 'rag_circuit_breaker_state',
  help: 'Circuit breaker state per dependency (0=closed, 1=half_open, 2=open)',
  labelNames: ['dependency'],
  registers: [register],
});

// ───── LLM ─────
export const llmRequestDuration = new client.Histogram({
  name: 'rag_llm_request_duration_seconds',
  help: 'LLM provider call latency',
  labelNames: ['provider', 'status'],
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20],
  registers: [register],
});

export const llmTokenUsage = new client.Counter({
  name: 'rag_llm_tokens_total',
  help: 'Tokens consumed per provider',
  labelNames: ['provider', 'token_type'],
  registers: [register],
});

// ───── Turns ─────
export const turnsProcessed = new client.Counter({
  name: 'rag_turns_total',
  help: 'Conversation turns processed, by route',
  labelNames: ['route'],
  registers: [register],
});

export const turnDuration = new client.Histogram({
  name: 'rag_turn_duration_seconds',
  help: 'End-to-end turn latency',
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 40],
  registers: [register],
});

export const reviewVerdicts = new client.Counter({
  name: 'rag_review_verdicts_total',
  help: 'Review agent verdicts',
  labelNames: ['verdict'],
  registers: [register],
});

export const escalations = new client.Counter({
  name: 'rag_escalations_total',
  help: 'Escalation triggers, by reason and whether contact collection was required',
  labelNames: ['reason', 'collect_contact'],
  registers: [register],
});

export const stateTransitions = new client.Counter({
  name: 'rag_state_transitions_total',
  help: 'Conversation status transitions',
  labelNames: ['from', 'to'],
  registers: [register],
});

export const ticketOperations = new client.Counter({
  name: 'rag_ticket_operations_total',
  help: 'Ticket registry operations',
  labelNames: ['operation', 'outcome'],
  registers: [register],
});

export const retrievalChunks = new client.Histogram({
  name: 'rag_retrieval_chunks',
  help: 'Chunks returned per retrieval',
  buckets: [0, 1, 2, 3, 5, 8, 13],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
