/** Where a chunk came from. Rendered alongside the excerpt and in sources. */
export interface ChunkMetadata {
  title: string;
  filename?: string;
  /** Page, section or heading path inside the source document */
  locator?: string;
  url?: string;
}

/**
 * A retrievable unit of source text. Produced fresh per turn, never cached.
 * `sequence` is the insertion order inside the store and breaks similarity ties.
 */
export interface RetrievedChunk {
  id: string;
  kbId: string;
  content: string;
  /** Cosine similarity clamped to [0, 1] */
  similarity: number;
  sequence: number;
  metadata: ChunkMetadata;
}

export interface EmbeddingProvider {
  /** Embed a single text string */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  /** Batch embed multiple text strings, preserving order */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  /** Embedding dimension */
  readonly dimension: number;
}

export interface VectorStore {
  /** Nearest chunks within `kbId` only, most similar first. */
  search(vector: number[], kbId: string, topK: number, signal?: AbortSignal): Promise<RetrievedChunk[]>;
}

/** Development seed document, one per entry of a knowledge/<kbId>.yaml file */
export interface SeedDocument {
  title: string;
  filename?: string;
  url?: string;
  sections: Array<{ locator?: string; content: string }>;
}
