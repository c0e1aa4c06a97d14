/**
 * Embedding Service: OpenAI-compatible embeddings over HTTP.
 *
 * Single-query embedding for retrieval and batch embedding for seeding.
 * Non-2xx responses are thrown with their status so the resilience layer
 * can tell transient from permanent failures.
 */

import Ajv, { JSONSchemaType } from 'ajv';
import { EmbeddingProvider } from './types';
import { PermanentError } from '../resilience/errors';
import { logger } from '../observability/logger';

interface EmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>;
}

const EMBEDDING_RESPONSE_SCHEMA: JSONSchemaType<EmbeddingResponse> = {
  type: 'object',
  properties: {
    data: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          embedding: { type: 'array', items: { type: 'number' } },
          index: { type: 'integer' },
        },
        required: ['embedding', 'index'],
      },
    },
  },
  required: ['data'],
};

const ajv = new Ajv();
const isEmbeddingResponse = ajv.compile(EMBEDDING_RESPONSE_SCHEMA);

export class HttpStatusError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  dimension: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimension: number;
  private readonly batchSize = 100;

  constructor(private readonly options: OpenAIEmbeddingOptions) {
    this.dimension = options.dimension;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], signal);
    if (!vector) throw new PermanentError('Embedding API returned no vector', 'embedding');
    return vector;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (!this.options.apiKey) {
      throw new PermanentError('Embedding API key not configured', 'embedding');
    }

    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);

      const response = await fetch(`${this.options.baseUrl}/v1/embeddings`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model: this.options.model, input: batch }),
        signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        logger.error({ status: response.status, body: errorBody.slice(0, 500) }, 'Embedding API error');
        throw new HttpStatusError(response.status, `Embedding API error: ${response.status}`);
      }

      const body: unknown = await response.json();
      if (!isEmbeddingResponse(body)) {
        throw new PermanentError('Malformed embedding API response', 'embedding');
      }

      // Sort by index to maintain order
      const sorted = [...body.data].sort((a, b) => a.index - b.index);
      for (const item of sorted) {
        allEmbeddings.push(item.embedding);
      }
    }

    return allEmbeddings;
  }
}
