/**
 * Generation Orchestrator
 *
 * One turn walks routing → drafting → reviewing → finalized. The route is a
 * tagged union handled by an explicit switch; knowledge retrieval happens
 * only for kb_query turns. A draft never becomes final without a review,
 * and any generation failure yields the fixed degraded answer instead.
 */

import {
  AnswerCandidate,
  GenerationOutput,
  GenerationPrompt,
  GenerationProvider,
  RouteDecision,
  ToolInvocation,
  TurnPhase,
} from './types';
import { routeMessage } from './message-router';
import { evaluateExpression, formatNumber } from './math-evaluator';
import { assembleContext, ContextEntry, EMPTY_CONTEXT, FormattedContext } from '../knowledge/context-assembler';
import { RetrievalCoordinator } from '../knowledge/retrieval-coordinator';
import { LLMMessage } from '../llm/types';
import { ResilienceLayer } from '../resilience/resilience-layer';
import { classifyError, PolicyViolationError } from '../resilience/errors';
import { getStaticFallback } from '../resilience/static-fallbacks';
import { TraceContext, withSpan } from '../observability/trace';
import { logger } from '../observability/logger';
import { reviewVerdicts } from '../observability/metrics';

export interface GenerationRequest {
  message: string;
  history: LLMMessage[];
  kbId: string;
  pendingContactRequest: boolean;
  humanRequestPhrases: string[];
  topK: number;
  maxContextChars: number;
  promptVersion?: string;
  trace?: TraceContext;
}

export interface GenerationResult {
  route: RouteDecision;
  candidate: AnswerCandidate;
  context: FormattedContext;
  /** Phases visited, in order; always ends with 'finalized' */
  phases: TurnPhase[];
}

export interface GenerationOrchestratorOptions {
  generationTimeoutMs: number;
}

class PhaseTracker {
  readonly phases: TurnPhase[] = ['routing'];

  enter(phase: TurnPhase): void {
    this.phases.push(phase);
  }
}

export class GenerationOrchestrator {
  private readonly log = logger.child({ component: 'generation-orchestrator' });

  constructor(
    private readonly primary: GenerationProvider,
    private readonly reviewer: GenerationProvider,
    private readonly retrieval: RetrievalCoordinator,
    private readonly resilience: ResilienceLayer,
    private readonly options: GenerationOrchestratorOptions = { generationTimeoutMs: 20_000 },
  ) {}

  async run(request: GenerationRequest): Promise<GenerationResult> {
    const tracker = new PhaseTracker();
    const route = routeMessage(request.message, {
      pendingContactRequest: request.pendingContactRequest,
      humanRequestPhrases: request.humanRequestPhrases,
    });

    const finish = (candidate: AnswerCandidate, context: FormattedContext = EMPTY_CONTEXT): GenerationResult => {
      tracker.enter('finalized');
      return { route, candidate, context, phases: tracker.phases };
    };

    switch (route.kind) {
      case 'contact_provided':
        return finish(this.fixed(request.message, route.kind, getStaticFallback('handoff_confirmed')));

      case 'escalation_request':
        return finish(this.fixed(request.message, route.kind, getStaticFallback('handoff')));

      case 'math_query': {
        const result = evaluateExpression(route.expression);
        if (!result.ok) {
          this.log.info({ error: result.error }, 'Math expression rejected');
          return finish(this.fixed(request.message, route.kind, getStaticFallback('math_error'), [
            { tool: 'calculate', input: route.expression, error: result.message },
          ]));
        }
        const tools: ToolInvocation[] = [{ tool: 'calculate', input: route.expression, output: formatNumber(result.value) }];
        return finish(await this.generate(request, route, EMPTY_CONTEXT, tools, 0, tracker));
      }

      case 'conversational':
        return finish(await this.generate(request, route, EMPTY_CONTEXT, [], 0, tracker));

      case 'kb_query': {
        const chunks = await this.traced(request.trace, 'retrieval', () =>
          this.retrieval.retrieve(request.message, request.kbId, request.topK),
        );
        // Zero chunks: answered conversationally, with an empty context
        const context = chunks.length > 0 ? assembleContext(chunks, request.maxContextChars) : EMPTY_CONTEXT;
        const candidate = await this.generate(request, route, context, [], chunks.length, tracker);
        return finish(candidate, context);
      }
    }
  }

  private async generate(
    request: GenerationRequest,
    route: RouteDecision,
    context: FormattedContext,
    tools: ToolInvocation[],
    retrievedCount: number,
    tracker: PhaseTracker,
  ): Promise<AnswerCandidate> {
    const base = {
      question: request.message,
      route: route.kind,
      tools,
      retrievedCount,
      generated: true,
    };
    const prompt: GenerationPrompt = {
      message: request.message,
      context: context.entries.length > 0 ? context : undefined,
      tools,
      promptVersion: request.promptVersion,
    };

    let draft: GenerationOutput;
    let review: GenerationOutput;
    try {
      tracker.enter('drafting');
      draft = await this.traced(request.trace, 'generation.draft', () =>
        this.call(this.primary, prompt, request.history),
      );

      tracker.enter('reviewing');
      review = await this.traced(request.trace, 'generation.review', () =>
        this.call(this.reviewer, { ...prompt, draft }, request.history),
      );
    } catch (raw) {
      const err = classifyError(raw);
      this.log.warn({ err: err.message, kind: err.kind, dependency: err.dependency }, 'Generation unavailable; returning degraded answer');
      return {
        ...base,
        text: getStaticFallback('degraded'),
        confidence: 0,
        verdict: 'reject',
        sources: [],
        failure: 'service_degraded',
      };
    }

    const verdict = review.verdict ?? 'reject';
    reviewVerdicts.inc({ verdict });

    if (verdict === 'pass') {
      return {
        ...base,
        text: draft.text,
        confidence: clamp(draft.confidence),
        verdict,
        sources: citedEntries(context, draft.citations),
      };
    }

    if (verdict === 'rewrite' && review.text) {
      const citations = review.citations.length > 0 ? review.citations : draft.citations;
      return {
        ...base,
        text: review.text,
        confidence: Math.min(clamp(draft.confidence), clamp(review.confidence)),
        verdict,
        sources: citedEntries(context, citations),
      };
    }

    const violation = new PolicyViolationError(review.reason ?? 'Draft rejected by review', 'generation');
    this.log.warn({ err: violation.message, verdict }, 'Review rejected draft');
    return {
      ...base,
      text: getStaticFallback('refusal'),
      confidence: 0,
      verdict: 'reject',
      sources: [],
      failure: 'policy_violation',
    };
  }

  private call(provider: GenerationProvider, prompt: GenerationPrompt, history: LLMMessage[]): Promise<GenerationOutput> {
    return this.resilience.execute(
      'generation',
      (signal) => provider.generate(prompt, history, signal),
      { timeoutMs: this.options.generationTimeoutMs },
    );
  }

  private fixed(question: string, route: RouteDecision['kind'], text: string, tools: ToolInvocation[] = []): AnswerCandidate {
    return {
      question,
      route,
      text,
      confidence: 1,
      verdict: 'pass',
      tools,
      sources: [],
      retrievedCount: 0,
      generated: false,
    };
  }

  private traced<T>(trace: TraceContext | undefined, name: string, fn: () => Promise<T>): Promise<T> {
    return trace ? withSpan(trace, name, fn) : fn();
  }
}

function clamp(value: number): number {
  return Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;
}

/** Context entries named by `citations`, in context order. Unknown indices are ignored. */
export function citedEntries(context: FormattedContext, citations: number[]): ContextEntry[] {
  const cited = new Set(citations);
  return context.entries.filter((entry) => cited.has(entry.index));
}
