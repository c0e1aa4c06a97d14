import Anthropic from '@anthropic-ai/sdk';
import {
  LLMMessage,
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';

/**
 * Anthropic Claude provider adapter.
 *
 * 1. System message is passed as a separate `system` parameter, NOT in the messages array.
 * 2. Messages must strictly alternate user/assistant. Consecutive same-role messages are merged.
 * 3. JSON mode: instruction appended to the system prompt; a missing leading `{` is restored.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    let systemPrompt = '';
    const nonSystemMessages: LLMMessage[] = [];

    for (const msg of request.messages) {
      if (msg.role === 'system') {
        systemPrompt += (systemPrompt ? '\n\n' : '') + msg.content;
      } else {
        nonSystemMessages.push(msg);
      }
    }

    const claudeMessages: Array<{ role: 'user' | 'assistant'; content: string }> =
      mergeConsecutiveRoles(nonSystemMessages).map((m) => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content,
      }));

    // Claude requires the first message to come from the user
    if (claudeMessages.length > 0 && claudeMessages[0].role !== 'user') {
      claudeMessages.unshift({ role: 'user', content: '(conversation start)' });
    }

    if (request.jsonMode) {
      systemPrompt +=
        '\n\nRespond with valid JSON only. No markdown fences, no preamble, no explanation outside the JSON. Start your response with {';
    }

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: systemPrompt || undefined,
        messages: claudeMessages,
      },
      { signal: request.signal },
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new Error('Anthropic returned no text content');
    }

    let content = textBlock.text;
    if (request.jsonMode && !content.trimStart().startsWith('{')) {
      content = '{' + content;
    }

    return {
      content,
      model: response.model ?? this.model,
      provider: 'anthropic',
      usage: {
        promptTokens: response.usage?.input_tokens ?? 0,
        completionTokens: response.usage?.output_tokens ?? 0,
        totalTokens: (response.usage?.input_tokens ?? 0) + (response.usage?.output_tokens ?? 0),
      },
      latencyMs: Date.now() - start,
    };
  }
}

/** Merge consecutive same-role messages; Claude requires strict alternation. */
export function mergeConsecutiveRoles(messages: LLMMessage[]): LLMMessage[] {
  const merged: LLMMessage[] = [];

  for (const curr of messages) {
    const prev = merged[merged.length - 1];
    if (prev && prev.role === curr.role) {
      prev.content += '\n\n' + curr.content;
    } else {
      merged.push({ ...curr });
    }
  }

  return merged;
}
