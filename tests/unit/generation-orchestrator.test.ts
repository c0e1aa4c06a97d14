import { GenerationOrchestrator, GenerationRequest } from '../../src/agent/generation-orchestrator';
import { RetrievalCoordinator } from '../../src/knowledge/retrieval-coordinator';
import { InMemoryVectorStore } from '../../src/knowledge/vector-store';
import { DEFAULT_HUMAN_REQUEST_PHRASES } from '../../src/config/config-service';
import { getStaticFallback } from '../../src/resilience/static-fallbacks';
import { ResilienceLayer } from '../../src/resilience/resilience-layer';
import { createTraceContext } from '../../src/observability/trace';
import {
  draft,
  HttpError,
  instantResilience,
  KeywordEmbeddingProvider,
  review,
  ScriptedGenerationProvider,
  ScriptStep,
} from '../helpers/fakes';

const KEYWORDS = ['refund', 'shipping'];

describe('GenerationOrchestrator', () => {
  let embeddings: KeywordEmbeddingProvider;
  let store: InMemoryVectorStore;
  let resilience: ResilienceLayer;

  const request = (message: string, overrides: Partial<GenerationRequest> = {}): GenerationRequest => ({
    message,
    history: [],
    kbId: 'kb-1',
    pendingContactRequest: false,
    humanRequestPhrases: DEFAULT_HUMAN_REQUEST_PHRASES,
    topK: 5,
    maxContextChars: 8000,
    ...overrides,
  });

  const build = (primarySteps: ScriptStep[], reviewerSteps: ScriptStep[]) => {
    const primary = new ScriptedGenerationProvider(primarySteps);
    const reviewer = new ScriptedGenerationProvider(reviewerSteps);
    const retrieval = new RetrievalCoordinator(embeddings, store, resilience);
    const orchestrator = new GenerationOrchestrator(primary, reviewer, retrieval, resilience, { generationTimeoutMs: 1000 });
    return { primary, reviewer, orchestrator };
  };

  beforeEach(() => {
    embeddings = new KeywordEmbeddingProvider(KEYWORDS);
    store = new InMemoryVectorStore();
    resilience = instantResilience();
    store.addEntries('kb-1', [
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
  });

  it('should draft from retrieved context and return the draft when review passes', async () => {
    const { primary, reviewer, orchestrator } = build(
      [draft('Refunds arrive within 5 days [1].', 0.85, [1])],
      [review('pass', 0.9)],
    );

    const result = await orchestrator.run(request('How long does a refund take?'));

    expect(result.route).toEqual({ kind: 'kb_query' });
    expect(result.phases).toEqual(['routing', 'drafting', 'reviewing', 'finalized']);
    expect(result.candidate.text).toBe('Refunds arrive within 5 days [1].');
    expect(result.candidate.confidence).toBe(0.85);
    expect(result.candidate.verdict).toBe('pass');
    expect(result.candidate.retrievedCount).toBe(2);
    expect(result.candidate.sources.map((s) => s.chunk.id)).toEqual(['refunds']);
    expect(primary.prompts[0]?.context?.entries.map((e) => e.chunk.id)).toEqual(['refunds', 'shipping']);
    expect(reviewer.prompts[0]?.draft?.text).toBe('Refunds arrive within 5 days [1].');
  });

  it('should use the rewritten answer and the lower confidence on rewrite', async () => {
    const { orchestrator } = build(
      [draft('Refunds take a while.', 0.8, [1])],
      [review('rewrite', 0.6, 'Refunds are issued within 5 days.')],
    );

    const { candidate } = await orchestrator.run(request('refund timing?'));
    expect(candidate.text).toBe('Refunds are issued within 5 days.');
    expect(candidate.confidence).toBe(0.6);
    expect(candidate.verdict).toBe('rewrite');
    expect(candidate.sources.map((s) => s.chunk.id)).toEqual(['refunds']);
  });

  it('should treat a rewrite without replacement text as a rejection', async () => {
    const { orchestrator } = build([draft('Something.', 0.8)], [review('rewrite', 0.6, '')]);

    const { candidate } = await orchestrator.run(request('refund timing?'));
    expect(candidate.verdict).toBe('reject');
    expect(candidate.failure).toBe('policy_violation');
  });

  it('should replace a rejected draft with the fixed refusal', async () => {
    const { orchestrator } = build([draft('Unsafe advice.', 0.9, [1])], [review('reject', 0.9)]);

    const { candidate } = await orchestrator.run(request('refund timing?'));
    expect(candidate.text).toBe(getStaticFallback('refusal'));
    expect(candidate.confidence).toBe(0);
    expect(candidate.failure).toBe('policy_violation');
    expect(candidate.sources).toEqual([]);
  });

  it('should return the degraded answer when generation is unavailable', async () => {
    const { primary, orchestrator } = build([new HttpError(503)], [review('pass', 1)]);

    const { candidate } = await orchestrator.run(request('refund timing?'));
    expect(candidate.text).toBe(getStaticFallback('degraded'));
    expect(candidate.confidence).toBe(0);
    expect(candidate.failure).toBe('service_degraded');
    expect(primary.prompts).toHaveLength(3);
  });

  it('should never return an unreviewed draft when the reviewer fails', async () => {
    const { orchestrator } = build([draft('Unreviewed.', 0.9)], [new HttpError(400)]);

    const { candidate } = await orchestrator.run(request('refund timing?'));
    expect(candidate.text).not.toBe('Unreviewed.');
    expect(candidate.failure).toBe('service_degraded');
  });

  it('should answer without context when retrieval finds nothing', async () => {
    const { primary, orchestrator } = build([draft('I am not sure.', 0.3)], [review('pass', 0.3)]);

    const { candidate, context } = await orchestrator.run(request('refund timing?', { kbId: 'kb-empty' }));
    expect(candidate.route).toBe('kb_query');
    expect(candidate.retrievedCount).toBe(0);
    expect(context.entries).toEqual([]);
    expect(primary.prompts[0]?.context).toBeUndefined();
  });

  it('should answer without context when retrieval fails', async () => {
    embeddings.failWith = new HttpError(500);
    const { orchestrator } = build([draft('General answer.', 0.7)], [review('pass', 0.7)]);

    const { candidate } = await orchestrator.run(request('refund timing?'));
    expect(candidate.text).toBe('General answer.');
    expect(candidate.retrievedCount).toBe(0);
  });

  it('should skip retrieval for small talk', async () => {
    const { orchestrator } = build([draft('Hello! How can I help?', 0.95)], [review('pass', 0.95)]);

    const { candidate } = await orchestrator.run(request('hello'));
    expect(candidate.route).toBe('conversational');
    expect(embeddings.calls).toBe(0);
  });

  it('should hand calculator output to generation for math questions', async () => {
    const { primary, orchestrator } = build(
      [(prompt) => draft(`The answer is ${prompt.tools[0]?.output ?? '?'}.`, 1)],
      [review('pass', 1)],
    );

    const { candidate } = await orchestrator.run(request('What is 25 * 4?'));
    expect(candidate.route).toBe('math_query');
    expect(candidate.tools).toEqual([{ tool: 'calculate', input: '25 * 4', output: '100' }]);
    expect(candidate.text).toBe('The answer is 100.');
    expect(primary.prompts[0]?.context).toBeUndefined();
  });

  it('should answer invalid math with the fixed error text without calling generation', async () => {
    const { primary, orchestrator } = build([draft('unused', 1)], [review('pass', 1)]);

    const { candidate, phases } = await orchestrator.run(request('what is 5 / 0'));
    expect(candidate.text).toBe(getStaticFallback('math_error'));
    expect(candidate.generated).toBe(false);
    expect(candidate.tools[0]?.error).toBe('Division by zero');
    expect(primary.prompts).toHaveLength(0);
    expect(phases).toEqual(['routing', 'finalized']);
  });

  it('should answer explicit human requests with the handoff text', async () => {
    const { primary, orchestrator } = build([draft('unused', 1)], [review('pass', 1)]);

    const { route, candidate } = await orchestrator.run(request('Please get me a live agent'));
    expect(route).toEqual({ kind: 'escalation_request' });
    expect(candidate.text).toBe(getStaticFallback('handoff'));
    expect(primary.prompts).toHaveLength(0);
  });

  it('should confirm a contact address given after a contact request', async () => {
    const { orchestrator } = build([draft('unused', 1)], [review('pass', 1)]);

    const { route, candidate } = await orchestrator.run(request('me@example.com', { pendingContactRequest: true }));
    expect(route).toEqual({ kind: 'contact_provided', email: 'me@example.com' });
    expect(candidate.text).toBe(getStaticFallback('handoff_confirmed'));
  });

  it('should record retrieval and generation spans on the trace', async () => {
    const { orchestrator } = build([draft('ok', 0.9, [1])], [review('pass', 0.9)]);
    const trace = createTraceContext({ requestId: 'req-1' });

    await orchestrator.run(request('refund timing?', { trace }));
    expect(trace.spans.map((s) => s.name)).toEqual(['retrieval', 'generation.draft', 'generation.review']);
    expect(trace.spans.every((s) => s.status === 'ok')).toBe(true);
  });
});
