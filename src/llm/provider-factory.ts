import { LLMProvider, LLMProviderName, LLMProviderConfig } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

const PROVIDER_NAMES: readonly LLMProviderName[] = ['openai', 'anthropic', 'gemini'];

export function isProviderName(value: string): value is LLMProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Create a single LLM provider by name.
 */
export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build all configured providers from environment configuration.
 * Only creates providers whose API keys are set.
 */
export function buildProviders(envConfig: Record<LLMProviderName, LLMProviderConfig>): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of PROVIDER_NAMES) {
    const config = envConfig[name];
    if (!config.apiKey) continue;
    providers.set(name, createProvider(name, config));
    log.info({ provider: name, model: config.model }, 'LLM provider initialized');
  }

  if (providers.size === 0) {
    throw new Error(
      'No LLM providers configured. Set at least one of: OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY',
    );
  }

  return providers;
}
