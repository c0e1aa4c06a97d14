import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import {
  LLMMessage,
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';
import { mergeConsecutiveRoles } from './anthropic-provider';

/**
 * Google Gemini provider adapter.
 *
 * 1. System instruction is a separate parameter, not in the messages array.
 * 2. Role mapping: 'assistant' → 'model', 'user' stays 'user'.
 * 3. JSON mode via `generationConfig: { responseMimeType: 'application/json' }`.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const systemInstruction = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const model = this.genAI.getGenerativeModel({
      model: this.model,
      systemInstruction: systemInstruction || undefined,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
        ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
      },
    });

    const contents = buildContents(request.messages.filter((m) => m.role !== 'system'));
    const result = await model.generateContent({ contents }, { signal: request.signal });
    const response = result.response;
    const content = response.text();

    if (!content) {
      throw new Error('Gemini returned empty response');
    }

    const usageMetadata = response.usageMetadata;

    return {
      content,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usageMetadata?.promptTokenCount ?? 0,
        completionTokens: usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: usageMetadata?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }
}

/** Gemini uses 'user' and 'model' roles with parts: [{ text }], starting with 'user'. */
function buildContents(messages: LLMMessage[]): Content[] {
  const contents: Content[] = mergeConsecutiveRoles(
    messages.map((m) => ({ role: m.role === 'assistant' ? 'assistant' : 'user', content: m.content })),
  ).map((m) => ({
    role: m.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: m.content }],
  }));

  if (contents.length > 0 && contents[0].role !== 'user') {
    contents.unshift({ role: 'user', parts: [{ text: '(conversation start)' }] });
  }

  return contents;
}
