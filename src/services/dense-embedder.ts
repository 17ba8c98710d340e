/**
 * Dense Embedder
 *
 * Produces dense vectors for documents and queries. The pipeline only relies
 * on `DenseEmbedder`; `HttpDenseEmbedder` talks to an OpenAI-compatible
 * `/embeddings` endpoint.
 */

import { z } from 'zod';
import { InputError } from '../lib/errors.js';

/**
 * How the text will be used; models may embed documents and queries
 * differently
 */
export type EmbeddingTaskType = 'RETRIEVAL_DOCUMENT' | 'RETRIEVAL_QUERY';

export interface EmbedOptions {
  taskType: EmbeddingTaskType;
  /** Requested output dimensionality */
  dimensionality: number;
}

export interface DenseEmbedder {
  /**
   * Embed texts, one vector per text in input order
   */
  embed(texts: readonly string[], options: EmbedOptions): Promise<number[][]>;
}

export interface HttpEmbedderConfig {
  /** Full URL of the embeddings endpoint */
  endpoint: string;
  model: string;
  apiKey?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative().optional(),
      embedding: z.array(z.number()),
    })
  ),
});

/**
 * Embedder backed by an OpenAI-compatible HTTP endpoint
 */
export class HttpDenseEmbedder implements DenseEmbedder {
  constructor(private readonly config: HttpEmbedderConfig) {}

  async embed(texts: readonly string[], options: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (!this.config.endpoint) {
      throw new InputError(
        'config',
        'Embedding endpoint is not configured (embedding.endpoint or EMBEDDING_ENDPOINT)',
        'embedding.endpoint'
      );
    }

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await fetch(this.config.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: this.config.model,
        input: texts,
        dimensions: options.dimensionality,
        task_type: options.taskType,
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs ?? 60000),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Embedding request failed with ${response.status}: ${body.slice(0, 200)}`);
    }

    const parsed = EmbeddingResponseSchema.parse(await response.json());
    const ordered = [...parsed.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return ordered.map((item) => item.embedding);
  }
}
