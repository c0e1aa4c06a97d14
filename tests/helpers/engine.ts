import { ConversationEngine } from '../../src/orchestrator/orchestrator';
import { ConversationStateManager } from '../../src/orchestrator/state-manager';
import { InMemoryConversationStore } from '../../src/memory/conversation-memory';
import { InMemoryTicketNumberStore } from '../../src/ticketing/ticket-number-store';
import { TicketRegistry } from '../../src/ticketing/ticket-registry';
import { GenerationOrchestrator } from '../../src/agent/generation-orchestrator';
import { RetrievalCoordinator } from '../../src/knowledge/retrieval-coordinator';
import { InMemoryVectorStore } from '../../src/knowledge/vector-store';
import { EscalationEvaluator } from '../../src/escalation/escalation-evaluator';
import { ConfigService } from '../../src/config/config-service';
import { BreakerRegistry } from '../../src/resilience/breaker-registry';
import { TicketNumberStore } from '../../src/ticketing/types';
import {
  instantResilience,
  KeywordEmbeddingProvider,
  RecordingNotifier,
  review,
  ScriptedGenerationProvider,
  ScriptStep,
} from './fakes';

export interface TestEngine {
  engine: ConversationEngine;
  state: ConversationStateManager;
  store: InMemoryConversationStore;
  breakers: BreakerRegistry;
  notifier: RecordingNotifier;
  primary: ScriptedGenerationProvider;
}

export interface TestEngineOptions {
  ticketStore?: TicketNumberStore;
}

/** Engine over in-memory stores and a two-document knowledge base `kb-1`. */
export function buildTestEngine(
  primarySteps: ScriptStep[] | ScriptedGenerationProvider,
  reviewerSteps: ScriptStep[] = [review('pass', 0.9)],
  options: TestEngineOptions = {},
): TestEngine {
  const embeddings = new KeywordEmbeddingProvider(['refund', 'shipping']);
  const vectors = new InMemoryVectorStore();
  vectors.addEntries('kb-1', [
    {
      id: 'refunds',
      content: 'A refund is issued within 5 days.',
      embedding: embeddings.vector('refund'),
      metadata: { title: 'Refund policy', url: 'https://help.example.com/refunds' },
    },
    {
      id: 'shipping',
      content: 'Shipping takes 3 days.',
      embedding: embeddings.vector('shipping'),
      metadata: { title: 'Shipping' },
    },
  ]);

  const breakers = new BreakerRegistry(['embedding', 'vector_store', 'generation', 'notification']);
  const resilience = instantResilience(breakers);
  const primary = primarySteps instanceof ScriptedGenerationProvider ? primarySteps : new ScriptedGenerationProvider(primarySteps);
  const store = new InMemoryConversationStore();
  const state = new ConversationStateManager(store, new TicketRegistry(options.ticketStore ?? new InMemoryTicketNumberStore()));
  const notifier = new RecordingNotifier();

  const engine = new ConversationEngine({
    state,
    generation: new GenerationOrchestrator(
      primary,
      new ScriptedGenerationProvider(reviewerSteps),
      new RetrievalCoordinator(embeddings, vectors, resilience),
      resilience,
      { generationTimeoutMs: 1000 },
    ),
    evaluator: new EscalationEvaluator(),
    notifier,
    tenants: { get: (tenantId) => ConfigService.builtInDefault(tenantId) },
  });

  return { engine, state, store, breakers, notifier, primary };
}
