/**
 * Retrieval Coordinator
 *
 * question → query embedding → nearest chunks inside one knowledge base.
 * Any failure that escapes the resilience layer degrades to an empty
 * result: a retrieval outage turns the turn conversational, it never
 * fails it.
 */

import { EmbeddingProvider, RetrievedChunk, VectorStore } from './types';
import { ResilienceLayer } from '../resilience/resilience-layer';
import { logger } from '../observability/logger';
import { retrievalChunks } from '../observability/metrics';

export interface RetrievalOptions {
  topK: number;
  timeoutMs: number;
}

export class RetrievalCoordinator {
  private readonly log = logger.child({ component: 'retrieval' });

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly store: VectorStore,
    private readonly resilience: ResilienceLayer,
    private readonly options: RetrievalOptions = { topK: 5, timeoutMs: 10_000 },
  ) {}

  async retrieve(question: string, kbId: string, topK: number = this.options.topK): Promise<RetrievedChunk[]> {
    const timeoutMs = this.options.timeoutMs;

    try {
      const vector = await this.resilience.execute(
        'embedding',
        (signal) => this.embeddings.embed(question, signal),
        { timeoutMs },
      );

      const results = await this.resilience.execute(
        'vector_store',
        (signal) => this.store.search(vector, kbId, topK, signal),
        { timeoutMs },
      );

      // Tenant isolation: anything outside the requested knowledge base is discarded
      const scoped = results.filter((chunk) => chunk.kbId === kbId);
      if (scoped.length !== results.length) {
        this.log.error({ kbId, dropped: results.length - scoped.length }, 'Vector store returned chunks from another knowledge base');
      }

      const ranked = scoped
        .map((chunk) => ({ ...chunk, similarity: Math.min(1, Math.max(0, chunk.similarity)) }))
        .sort((a, b) => b.similarity - a.similarity || a.sequence - b.sequence)
        .slice(0, topK);

      retrievalChunks.observe(ranked.length);
      return ranked;
    } catch (err) {
      this.log.warn({ err, kbId }, 'Retrieval failed; continuing without knowledge context');
      retrievalChunks.observe(0);
      return [];
    }
  }
}
