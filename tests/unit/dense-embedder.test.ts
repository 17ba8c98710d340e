/**
 * Tests for the HTTP embedder against a stubbed fetch
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { InputError } from '../../src/lib/errors.js';
import { HttpDenseEmbedder } from '../../src/services/dense-embedder.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('HttpDenseEmbedder', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts texts and returns vectors in input order', async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const embedder = new HttpDenseEmbedder({
      endpoint: 'http://embedder.test/v1/embeddings',
      model: 'test-model',
      apiKey: 'test-secret',
    });
    const vectors = await embedder.embed(['first', 'second'], { taskType: 'RETRIEVAL_QUERY', dimensionality: 2 });

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetchMock).toHaveBeenCalledWith(
      'http://embedder.test/v1/embeddings',
      expect.objectContaining({
        method: 'POST',
        headers: { 'content-type': 'application/json', authorization: 'Bearer test-secret' },
        body: JSON.stringify({
          model: 'test-model',
          input: ['first', 'second'],
          dimensions: 2,
          task_type: 'RETRIEVAL_QUERY',
        }),
      })
    );
  });

  it('reports the status of a failed request', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota exceeded', { status: 429 })));

    const embedder = new HttpDenseEmbedder({ endpoint: 'http://embedder.test/v1/embeddings', model: 'test-model' });

    await expect(embedder.embed(['text'], { taskType: 'RETRIEVAL_DOCUMENT', dimensionality: 2 })).rejects.toThrow(
      'Embedding request failed with 429: quota exceeded'
    );
  });

  it('needs an endpoint only when there is text to embed', async () => {
    const embedder = new HttpDenseEmbedder({ endpoint: '', model: 'test-model' });
    const options = { taskType: 'RETRIEVAL_DOCUMENT' as const, dimensionality: 2 };

    expect(await embedder.embed([], options)).toEqual([]);
    await expect(embedder.embed(['text'], options)).rejects.toThrow(
      'Embedding endpoint is not configured (embedding.endpoint or EMBEDDING_ENDPOINT)'
    );
    await expect(embedder.embed(['text'], options)).rejects.toBeInstanceOf(InputError);
  });
});
