import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { ConfigService } from './config/config-service';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createConversationStore } from './memory/conversation-memory';
import { createTicketNumberStore } from './ticketing/ticket-number-store';
import { TicketRegistry } from './ticketing/ticket-registry';
import { ConversationEngine } from './orchestrator/orchestrator';
import { ConversationStateManager } from './orchestrator/state-manager';
import { GenerationOrchestrator } from './agent/generation-orchestrator';
import { LlmGenerationProvider } from './agent/llm-generation-provider';
import { PromptManager } from './agent/prompt-manager';
import { EscalationEvaluator } from './escalation/escalation-evaluator';
import { buildProviders, isProviderName } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { LLMProviderName } from './llm/types';
import { OpenAIEmbeddingProvider } from './knowledge/embedding-service';
import { InMemoryVectorStore } from './knowledge/vector-store';
import { RetrievalCoordinator } from './knowledge/retrieval-coordinator';
import { readSeedDocuments, seedVectorStore } from './knowledge/knowledge-loader';
import { BreakerRegistry } from './resilience/breaker-registry';
import { ResilienceLayer } from './resilience/resilience-layer';
import { NotificationService } from './notifications/types';
import { WebhookNotifier } from './notifications/webhook-notifier';
import { LogNotifier } from './notifications/log-notifier';
import { registerQueryRoutes, queryErrorHandler } from './channels/query-routes';
import { registerHealthRoutes } from './health/health-routes';

export const DEPENDENCIES = ['embedding', 'vector_store', 'generation', 'notification'];

export interface ServerDeps {
  engine: ConversationEngine;
  state: ConversationStateManager;
  breakers: BreakerRegistry;
  redis?: Redis;
  defaultTenantId?: string;
  enableMetrics?: boolean;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
}

/** HTTP surface over already-built services. */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.setErrorHandler(queryErrorHandler);

  registerHealthRoutes(app, {
    redis: deps.redis,
    breakers: deps.breakers,
    enableMetrics: deps.enableMetrics ?? env.observability.enableMetrics,
  });
  registerQueryRoutes(app, {
    engine: deps.engine,
    state: deps.state,
    defaultTenantId: deps.defaultTenantId ?? env.defaultTenantId,
  });

  return app;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) {
    logger.info('REDIS_URL not set; using in-memory stores');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function providerName(value: string): LLMProviderName | undefined {
  return isProviderName(value) ? value : undefined;
}

export async function buildApp(): Promise<AppContext> {
  const redis = await connectRedis();

  // ───── Resilience ─────
  const breakers = new BreakerRegistry(DEPENDENCIES, {
    failureThreshold: env.resilience.breakerThreshold,
    cooldownMs: env.resilience.breakerCooldownMs,
  });
  const resilience = new ResilienceLayer(breakers, {
    policy: {
      maxAttempts: env.resilience.maxAttempts,
      baseDelayMs: env.resilience.baseDelayMs,
      multiplier: env.resilience.multiplier,
      jitter: env.resilience.jitter,
    },
  });

  // ───── Build Multi-LLM Provider Stack ─────
  const providers = buildProviders({ openai: env.openai, anthropic: env.anthropic, gemini: env.gemini });
  const primaryProvider = providerName(env.llm.primaryProvider);
  if (!primaryProvider) {
    throw new Error(`Unknown LLM_PRIMARY_PROVIDER "${env.llm.primaryProvider}"`);
  }
  const modelRouter = new ModelRouter(
    {
      primaryProvider,
      secondaryProvider: providerName(env.llm.secondaryProvider),
      tertiaryProvider: providerName(env.llm.tertiaryProvider),
    },
    providers,
  );
  const prompts = new PromptManager();
  logger.info({ order: modelRouter.providerOrder, providerCount: providers.size }, 'Multi-LLM stack initialized');

  // ───── Knowledge ─────
  const embeddings = new OpenAIEmbeddingProvider({
    apiKey: env.embeddings.apiKey,
    model: env.embeddings.model,
    baseUrl: env.embeddings.baseUrl,
    dimension: env.embeddings.dimension,
  });
  const vectorStore = new InMemoryVectorStore();
  if (env.knowledge.seedDir) {
    try {
      const chunks = await seedVectorStore(vectorStore, embeddings, readSeedDocuments(env.knowledge.seedDir));
      logger.info({ chunks, dir: env.knowledge.seedDir }, 'Knowledge seed loaded');
    } catch (err) {
      logger.warn({ err }, 'Knowledge seeding failed; starting with an empty vector store');
    }
  }
  const retrieval = new RetrievalCoordinator(embeddings, vectorStore, resilience, {
    topK: env.retrieval.topK,
    timeoutMs: env.resilience.retrievalTimeoutMs,
  });

  // ───── Conversation core ─────
  const generation = new GenerationOrchestrator(
    new LlmGenerationProvider(modelRouter, 'primary', prompts),
    new LlmGenerationProvider(modelRouter, 'reviewer', prompts),
    retrieval,
    resilience,
    { generationTimeoutMs: env.resilience.generationTimeoutMs },
  );
  const tickets = new TicketRegistry(createTicketNumberStore(redis), {
    prefix: env.tickets.prefix,
    length: env.tickets.length,
    maxAttempts: env.tickets.maxAttempts,
  });
  const state = new ConversationStateManager(createConversationStore(redis), tickets);
  const notifier: NotificationService = env.notifications.webhookUrl
    ? new WebhookNotifier(env.notifications.webhookUrl, resilience, env.notifications.timeoutMs)
    : new LogNotifier();

  const engine = new ConversationEngine({
    state,
    generation,
    evaluator: new EscalationEvaluator(),
    notifier,
    tenants: new ConfigService(),
  });

  const app = await buildServer({ engine, state, breakers, redis });
  logger.info({ tenantDefault: env.defaultTenantId, webhook: Boolean(env.notifications.webhookUrl) }, 'Conversation engine initialized');

  return { app, redis };
}
