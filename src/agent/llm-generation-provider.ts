import { AgentRole, GenerationOutput, GenerationPrompt, GenerationProvider } from './types';
import { parseDraft, parseReview } from './response-contract';
import { PromptManager } from './prompt-manager';
import { LLMCompletionRequest, LLMCompletionResponse, LLMMessage } from '../llm/types';
import { logger } from '../observability/logger';

export interface CompletionRouter {
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

export interface GenerationSettings {
  temperature: number;
  maxTokens: number;
}

/**
 * GenerationProvider backed by the model router. The same class serves the
 * primary and the review agent; only the role (and so the system prompt and
 * the response contract) differs.
 */
export class LlmGenerationProvider implements GenerationProvider {
  private readonly log = logger.child({ component: 'generation' });

  constructor(
    private readonly router: CompletionRouter,
    private readonly role: AgentRole,
    private readonly prompts: PromptManager,
    private readonly settings: GenerationSettings = { temperature: 0.2, maxTokens: 1024 },
  ) {}

  async generate(prompt: GenerationPrompt, history: LLMMessage[], signal?: AbortSignal): Promise<GenerationOutput> {
    const messages: LLMMessage[] = [
      { role: 'system', content: this.prompts.instructions(this.role, prompt.promptVersion) },
      ...history,
      { role: 'user', content: this.role === 'primary' ? buildDraftRequest(prompt) : buildReviewRequest(prompt) },
    ];

    const completion = await this.router.complete({
      messages,
      temperature: this.role === 'reviewer' ? 0 : this.settings.temperature,
      maxTokens: this.settings.maxTokens,
      jsonMode: true,
      signal,
    });

    this.log.debug({
      role: this.role,
      provider: completion.provider,
      model: completion.model,
      latencyMs: completion.latencyMs,
      tokens: completion.usage.totalTokens,
    }, 'Generation completed');

    return this.role === 'primary' ? parseDraft(completion.content) : parseReview(completion.content);
  }
}

function contextSection(prompt: GenerationPrompt): string[] {
  const parts: string[] = [];
  if (prompt.context && prompt.context.entries.length > 0) {
    parts.push('--- CONTEXT ---', prompt.context.text, '');
  }
  if (prompt.tools.length > 0) {
    parts.push('--- TOOL RESULTS ---');
    for (const call of prompt.tools) {
      parts.push(`${call.tool}(${call.input}) = ${call.output ?? `error: ${call.error ?? 'unknown'}`}`);
    }
    parts.push('');
  }
  return parts;
}

export function buildDraftRequest(prompt: GenerationPrompt): string {
  return [...contextSection(prompt), '--- QUESTION ---', prompt.message].join('\n');
}

export function buildReviewRequest(prompt: GenerationPrompt): string {
  const draft = prompt.draft;
  return [
    ...contextSection(prompt),
    '--- QUESTION ---',
    prompt.message,
    '',
    '--- DRAFT ANSWER ---',
    draft?.text ?? '',
    '',
    `Draft confidence: ${draft?.confidence ?? 0}`,
    `Draft citations: ${draft && draft.citations.length > 0 ? draft.citations.map((c) => `[${c}]`).join(' ') : 'none'}`,
  ].join('\n');
}
