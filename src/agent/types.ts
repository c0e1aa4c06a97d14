import { ContextEntry, FormattedContext } from '../knowledge/context-assembler';
import { LLMMessage } from '../llm/types';

export type AgentRole = 'primary' | 'reviewer';

export type ReviewVerdict = 'pass' | 'rewrite' | 'reject';

export type TurnPhase = 'routing' | 'drafting' | 'reviewing' | 'finalized';

/** Router output. Consumed by an explicit switch, never by type dispatch. */
export type RouteDecision =
  | { kind: 'conversational' }
  | { kind: 'kb_query' }
  | { kind: 'math_query'; expression: string }
  | { kind: 'escalation_request' }
  | { kind: 'contact_provided'; email: string };

export type RouteKind = RouteDecision['kind'];

export interface ToolInvocation {
  tool: 'calculate';
  input: string;
  output?: string;
  error?: string;
}

/** Everything one generation call needs besides the conversation history. */
export interface GenerationPrompt {
  message: string;
  /** Assembled knowledge context; absent for conversational turns */
  context?: FormattedContext;
  tools: ToolInvocation[];
  /** The primary agent's output, given to the reviewer */
  draft?: GenerationOutput;
  promptVersion?: string;
}

/**
 * Parsed output of one generation call. `citations` are 1-based context
 * indices; reviewer calls also carry a verdict.
 */
export interface GenerationOutput {
  text: string;
  confidence: number;
  citations: number[];
  verdict?: ReviewVerdict;
  reason?: string;
}

/**
 * A generation capability. The primary and the review agent are two
 * instances of this interface with different prompts.
 */
export interface GenerationProvider {
  generate(prompt: GenerationPrompt, history: LLMMessage[], signal?: AbortSignal): Promise<GenerationOutput>;
}

export type CandidateFailure = 'service_degraded' | 'policy_violation';

/** The finalized answer for one turn. */
export interface AnswerCandidate {
  question: string;
  route: RouteKind;
  text: string;
  confidence: number;
  verdict: ReviewVerdict;
  tools: ToolInvocation[];
  /** Context entries the final answer cites */
  sources: ContextEntry[];
  /** Chunks retrieved for a kb_query turn (0 for every other route) */
  retrievedCount: number;
  /** False for fixed texts that never went through generation */
  generated: boolean;
  failure?: CandidateFailure;
}
