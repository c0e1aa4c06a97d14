/**
 * Conversation Engine
 *
 * Runs one user turn end to end: resolve the conversation, record the
 * message, generate and review an answer, decide on escalation, record the
 * reply. Turns of one conversation are serialized; different
 * conversations run concurrently.
 */

import type { Logger } from 'pino';
import { Conversation, Message } from '../memory/types';
import { LLMMessage } from '../llm/types';
import { ContextEntry } from '../knowledge/context-assembler';
import { GenerationOrchestrator } from '../agent/generation-orchestrator';
import { AnswerCandidate } from '../agent/types';
import { EscalationEvaluator } from '../escalation/escalation-evaluator';
import { EscalationDecision, EscalationReason } from '../escalation/types';
import { NotificationService } from '../notifications/types';
import { TenantConfig } from '../config/types';
import { getDefaultFallback, getStaticFallback } from '../resilience/static-fallbacks';
import { ConversationStateManager, LoadedConversation } from './state-manager';
import { KeyedMutex } from './turn-lock';
import { ConversationNotFoundError, InvalidTurnInputError, SourceView, TurnInput, TurnResponse } from './types';
import { childLogger, logger } from '../observability/logger';
import { createTraceContext, endSpan, spanDurations, startSpan, TraceContext } from '../observability/trace';
import { turnDuration, turnsProcessed } from '../observability/metrics';

/** Characters of chunk content shown per source */
export const SOURCE_EXCERPT_CHARS = 200;

export const MAX_MESSAGE_CHARS = 4000;

export interface TenantConfigSource {
  get(tenantId: string): TenantConfig;
}

export interface ConversationEngineDeps {
  state: ConversationStateManager;
  generation: GenerationOrchestrator;
  evaluator: EscalationEvaluator;
  notifier: NotificationService;
  tenants: TenantConfigSource;
  locks?: KeyedMutex;
  now?: () => number;
}

interface TurnOutcome {
  text: string;
  handoff: boolean;
}

export class ConversationEngine {
  private readonly state: ConversationStateManager;
  private readonly generation: GenerationOrchestrator;
  private readonly evaluator: EscalationEvaluator;
  private readonly notifier: NotificationService;
  private readonly tenants: TenantConfigSource;
  private readonly locks: KeyedMutex;
  private readonly now: () => number;

  constructor(deps: ConversationEngineDeps) {
    this.state = deps.state;
    this.generation = deps.generation;
    this.evaluator = deps.evaluator;
    this.notifier = deps.notifier;
    this.tenants = deps.tenants;
    this.locks = deps.locks ?? new KeyedMutex();
    this.now = deps.now ?? Date.now;
  }

  async handleTurn(input: TurnInput): Promise<TurnResponse> {
    const message = input.message.trim();
    if (!message) throw new InvalidTurnInputError('message must not be empty');
    if (message.length > MAX_MESSAGE_CHARS) {
      throw new InvalidTurnInputError(`message must be at most ${MAX_MESSAGE_CHARS} characters`);
    }
    if (!input.kbId.trim()) throw new InvalidTurnInputError('kb_id must not be empty');
    if (!input.userId.trim()) throw new InvalidTurnInputError('user_id must not be empty');

    const turn = (): Promise<TurnResponse> => this.runTurn({ ...input, message });
    if (!input.conversationId) return turn();
    return this.locks.runExclusive(lockKey(input.tenantId, input.conversationId), turn);
  }

  /**
   * Resolve a conversation. Runs under the same lock as turns, so a turn in
   * flight finishes (and persists) before the status becomes terminal.
   */
  resolve(tenantId: string, conversationId: string, satisfactionScore?: number): Promise<Conversation> {
    return this.locks.runExclusive(lockKey(tenantId, conversationId), () =>
      this.state.resolve(tenantId, conversationId, satisfactionScore),
    );
  }

  /** Human agent reply, serialized with the conversation's turns. */
  addAgentMessage(tenantId: string, conversationId: string, content: string): Promise<Message> {
    return this.locks.runExclusive(lockKey(tenantId, conversationId), () =>
      this.state.addAgentMessage(tenantId, conversationId, content),
    );
  }

  private async runTurn(input: TurnInput): Promise<TurnResponse> {
    const startedAt = this.now();
    const trace = createTraceContext({ requestId: input.requestId, tenantId: input.tenantId, kbId: input.kbId });
    const log = childLogger(trace.requestId, { tenantId: input.tenantId });

    const spanLoad = startSpan(trace, 'turn.load');
    let loaded: LoadedConversation;
    try {
      loaded = await this.state.loadOrCreate({
        conversationId: input.conversationId,
        tenantId: input.tenantId,
        kbId: input.kbId,
        userId: input.userId,
      });
      endSpan(spanLoad);
    } catch (err) {
      endSpan(spanLoad, 'error');
      if (err instanceof InvalidTurnInputError || err instanceof ConversationNotFoundError) throw err;

      // No conversation to record against: answer, but nothing is persisted
      log.error({ err, conversationId: input.conversationId }, 'Could not load or open conversation; answering with fallback');
      const elapsedMs = this.now() - startedAt;
      turnsProcessed.inc({ route: 'error' });
      turnDuration.observe(elapsedMs / 1000);
      return {
        conversation_id: input.conversationId ?? '',
        ticket_number: '',
        ai_response: getDefaultFallback(),
        sources: [],
        confidence: 0,
        handoff_triggered: true,
        response_time: toSeconds(elapsedMs),
      };
    }
    const { conversation, supersededId } = loaded;
    trace.conversationId = conversation.id;
    if (supersededId) log.info({ supersededId, conversationId: conversation.id }, 'Turn moved to a new conversation');

    let route = 'unknown';
    let confidence = 0;
    let sources: SourceView[] = [];
    let outcome: TurnOutcome;

    try {
      const tenant = this.tenants.get(input.tenantId);
      const earlier = await this.state.recentMessages(
        conversation.id,
        Math.max(tenant.historyWindow, tenant.escalation.duplicateWindow * 2),
      );
      await this.state.appendMessage(conversation, 'user', input.message);

      const result = await this.generation.run({
        message: input.message,
        history: toLlmHistory(earlier.slice(-tenant.historyWindow)),
        kbId: conversation.kbId,
        pendingContactRequest: conversation.pendingContactRequest !== null,
        humanRequestPhrases: tenant.humanRequestPhrases,
        topK: tenant.retrieval.topK,
        maxContextChars: tenant.retrieval.maxContextChars,
        promptVersion: tenant.promptVersion,
        trace,
      });
      const { candidate } = result;
      route = candidate.route;
      confidence = candidate.confidence;
      sources = candidate.sources.map(toSourceView);

      const spanEscalation = startSpan(trace, 'escalation.evaluate');
      if (result.route.kind === 'contact_provided') {
        outcome = await this.completeContactRequest(conversation, result.route.email, input.message, result.context.text, candidate);
      } else {
        const decision = this.evaluator.evaluate(candidate, earlier, conversation.escalation.contactEmail, tenant.escalation);
        outcome = await this.applyDecision(conversation, decision, candidate, input.message, result.context.text, log);
      }
      endSpan(spanEscalation);

      const spanPersist = startSpan(trace, 'turn.persist');
      await this.state.appendMessage(conversation, 'ai', outcome.text, { confidence, route, sources });
      endSpan(spanPersist);
    } catch (err) {
      log.error({ err, conversationId: conversation.id }, 'Turn failed; answering with fallback');
      route = 'error';
      confidence = 0;
      sources = [];
      outcome = { text: getDefaultFallback(), handoff: true };
      await this.recordFallback(conversation, outcome.text, input.message, trace);
    }

    const elapsedMs = this.now() - startedAt;
    turnsProcessed.inc({ route });
    turnDuration.observe(elapsedMs / 1000);
    log.info(
      {
        conversationId: conversation.id,
        ticketNumber: conversation.ticketNumber,
        route,
        confidence,
        handoff: outcome.handoff,
        status: conversation.status,
        elapsedMs,
        spans: spanDurations(trace),
      },
      'Turn completed',
    );

    return {
      conversation_id: conversation.id,
      ticket_number: conversation.ticketNumber,
      ai_response: outcome.text,
      sources,
      confidence,
      handoff_triggered: outcome.handoff,
      response_time: toSeconds(elapsedMs),
    };
  }

  /** The user answered a contact request: hand off with the reason that asked for it. */
  private async completeContactRequest(
    conversation: Conversation,
    email: string,
    query: string,
    context: string,
    candidate: AnswerCandidate,
  ): Promise<TurnOutcome> {
    const reason: EscalationReason = conversation.pendingContactRequest?.reason ?? 'explicit_request';
    await this.state.recordContact(conversation, email);
    if (await this.state.escalate(conversation, reason)) {
      this.notify(conversation, reason, query, context);
    }
    return { text: candidate.text, handoff: true };
  }

  private async applyDecision(
    conversation: Conversation,
    decision: EscalationDecision,
    candidate: AnswerCandidate,
    query: string,
    context: string,
    log: Logger,
  ): Promise<TurnOutcome> {
    if (!decision.trigger) return { text: candidate.text, handoff: false };

    // The human team already has it; the answer stands
    if (conversation.status === 'escalated') return { text: candidate.text, handoff: true };

    if (decision.collectContact) {
      await this.state.requestContact(conversation, decision.reason);
      log.info({ conversationId: conversation.id, reason: decision.reason }, 'Asking for a contact address before handoff');
      const prompt = getStaticFallback('collect_email');
      return { text: candidate.generated ? `${candidate.text}\n\n${prompt}` : prompt, handoff: true };
    }

    if (await this.state.escalate(conversation, decision.reason)) {
      this.notify(conversation, decision.reason, query, context);
    }
    return { text: candidate.text, handoff: true };
  }

  private notify(conversation: Conversation, reason: EscalationReason, query: string, context: string): void {
    const snapshot = structuredClone(conversation);
    void this.notifier
      .notifyEscalation(snapshot, reason, { query, context })
      .catch((err: unknown) => {
        logger.error({ err, conversationId: snapshot.id, reason }, 'Escalation notification failed');
      });
  }

  private async recordFallback(conversation: Conversation, text: string, query: string, trace: TraceContext): Promise<void> {
    try {
      if (await this.state.escalate(conversation, 'service_degraded')) {
        this.notify(conversation, 'service_degraded', query, '');
      }
      await this.state.appendMessage(conversation, 'ai', text, { confidence: 0, route: 'error', sources: [] });
    } catch (err) {
      logger.error({ err, requestId: trace.requestId, conversationId: conversation.id }, 'Failed to record fallback answer');
    }
  }
}

function lockKey(tenantId: string, conversationId: string): string {
  return `${tenantId}:${conversationId}`;
}

/** Seconds, two decimals */
function toSeconds(ms: number): number {
  return Math.round(ms / 10) / 100;
}

function toLlmHistory(messages: Message[]): LLMMessage[] {
  return messages.map((m): LLMMessage => ({
    role: m.sender === 'user' ? 'user' : 'assistant',
    content: m.content,
  }));
}

export function toSourceView(entry: ContextEntry): SourceView {
  const content = entry.chunk.content.trim();
  return {
    title: entry.chunk.metadata.title,
    excerpt: content.length > SOURCE_EXCERPT_CHARS ? `${content.slice(0, SOURCE_EXCERPT_CHARS)}...` : content,
    similarity: entry.chunk.similarity,
    url: entry.chunk.metadata.url ?? null,
  };
}
