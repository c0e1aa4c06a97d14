/**
 * In-Memory Vector Store: cosine similarity search scoped per knowledge base.
 *
 * Brute-force scan; fine for development corpora and tests. Production
 * deployments put a real index behind the same VectorStore interface.
 */

import { ChunkMetadata, RetrievedChunk, VectorStore } from './types';

export interface VectorEntry {
  id: string;
  embedding: number[];
  content: string;
  metadata: ChunkMetadata;
}

interface StoredEntry extends VectorEntry {
  kbId: string;
  sequence: number;
}

export class InMemoryVectorStore implements VectorStore {
  private entries: StoredEntry[] = [];
  private nextSequence = 0;

  /** Add entries to a knowledge base, in order */
  addEntries(kbId: string, entries: VectorEntry[]): void {
    for (const entry of entries) {
      this.entries.push({ ...entry, kbId, sequence: this.nextSequence++ });
    }
  }

  /** Drop one knowledge base (for re-indexing) */
  clear(kbId: string): void {
    this.entries = this.entries.filter((e) => e.kbId !== kbId);
  }

  get size(): number {
    return this.entries.length;
  }

  async search(vector: number[], kbId: string, topK: number): Promise<RetrievedChunk[]> {
    if (topK <= 0) return [];

    return this.entries
      .filter((entry) => entry.kbId === kbId)
      .map((entry) => ({ entry, score: cosineSimilarity(vector, entry.embedding) }))
      .sort((a, b) => b.score - a.score || a.entry.sequence - b.entry.sequence)
      .slice(0, topK)
      .map(({ entry, score }) => ({
        id: entry.id,
        kbId: entry.kbId,
        content: entry.content,
        similarity: score,
        sequence: entry.sequence,
        metadata: entry.metadata,
      }));
  }
}

/** Cosine similarity clamped to [0, 1]; mismatched or zero vectors score 0 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return Math.min(1, Math.max(0, dotProduct / denominator));
}
