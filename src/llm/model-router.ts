import {
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
} from './types';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmTokenUsage } from '../observability/metrics';

/**
 * Model Router: priority failover across configured LLM providers.
 *
 * Tries primary → secondary → tertiary in order. The circuit breaker and
 * retry budget live one level up, in the resilience layer, which treats
 * the router as the single "generation" dependency.
 */
export class ModelRouter {
  private readonly order: LLMProviderName[];
  private log = logger.child({ component: 'model-router' });

  constructor(config: ModelRouterConfig, private readonly providers: Map<LLMProviderName, LLMProvider>) {
    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }

    const chain = [config.primaryProvider, config.secondaryProvider, config.tertiaryProvider];
    this.order = chain.filter(
      (name, i): name is LLMProviderName => !!name && providers.has(name) && chain.indexOf(name) === i,
    );

    this.log.info({ order: this.order }, 'Model router initialized');
  }

  /**
   * Send the request down the failover chain. When every provider fails the
   * last provider's error is rethrown unchanged so its status can be classified.
   */
  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    let lastError: unknown;

    for (let i = 0; i < this.order.length; i++) {
      const providerName = this.order[i];
      const provider = this.providers.get(providerName);
      if (!provider) continue;
      if (request.signal?.aborted) break;

      const timer = llmRequestDuration.startTimer({ provider: providerName });

      try {
        const response = await provider.complete(request);
        timer({ status: 'success' });

        llmTokenUsage.inc({ provider: providerName, token_type: 'prompt' }, response.usage.promptTokens);
        llmTokenUsage.inc({ provider: providerName, token_type: 'completion' }, response.usage.completionTokens);

        if (i > 0) {
          this.log.info({ from: this.order[i - 1], to: providerName }, 'Successful failover to next provider');
        }

        return response;
      } catch (err) {
        timer({ status: 'error' });
        lastError = err;
        this.log.warn(
          { provider: providerName, err: err instanceof Error ? err.message : String(err), attempt: i + 1, total: this.order.length },
          'Provider failed, trying next',
        );
      }
    }

    throw lastError ?? new Error('No LLM provider available');
  }

  get providerOrder(): readonly LLMProviderName[] {
    return this.order;
  }
}
