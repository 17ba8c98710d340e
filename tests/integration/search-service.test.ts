/**
 * Integration tests for text, vector and hybrid search
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { CollaboratorFailure, InputError } from '../../src/lib/errors.js';
import { assemble } from '../../src/services/datapoint-assembler.js';
import { HttpDenseEmbedder } from '../../src/services/dense-embedder.js';
import { IndexUpdater } from '../../src/services/index-updates.js';
import { SearchService, buildNamespaceFilters } from '../../src/services/search-service.js';
import { SqliteVectorIndex } from '../../src/services/vector-search-service.js';
import {
  FakeEmbedder,
  InMemoryBlobStore,
  createTestConfig,
} from '../helpers/pipeline-test-helper.js';

const config = createTestConfig({
  resourceNames: { endpointId: 'endpoint-1', deployedIndexId: 'products' },
  batchPaths: { batchRoot: 'batches' },
});

describe('buildNamespaceFilters', () => {
  it('accepts the allow and deny aliases', () => {
    expect(
      buildNamespaceFilters([
        { namespace: 'color', allow_list: ['red', 2] },
        { name: 'size', allow: 'm', deny_tokens: ['xl'] },
      ])
    ).toEqual([
      { namespace: 'color', allow: ['red', '2'], deny: [] },
      { namespace: 'size', allow: ['m'], deny: ['xl'] },
    ]);
  });

  it('drops clauses without a namespace', () => {
    expect(buildNamespaceFilters([{ allow: ['red'] }, 'color', null])).toEqual([]);
  });

  it('returns no filters when none are given', () => {
    expect(buildNamespaceFilters(undefined)).toEqual([]);
  });
});

describe('SearchService', () => {
  let store: InMemoryBlobStore;
  let index: SqliteVectorIndex;
  let embedder: FakeEmbedder;
  let search: SearchService;

  beforeEach(async () => {
    store = new InMemoryBlobStore({
      'batches/part-00000.json': '{"id":"lamp-1","embedding":[0,1],"embedding_metadata":{"title":"Lamp"}}\n',
    });
    index = new SqliteVectorIndex(new Database(':memory:'), store, {
      distanceMeasure: 'DOT_PRODUCT',
      rrfK: 60,
      rrfAlpha: 0.5,
    });
    await index.upsertDatapoints('products', [
      assemble({ id: 'lamp-1', denseVector: [0, 1] })._unsafeUnwrap(),
      assemble({
        id: 'desk-1',
        denseVector: [1, 0],
        metadata: { title: 'Desk' },
        restricts: [{ namespace: 'color', allow: ['red'], deny: [] }],
      })._unsafeUnwrap(),
    ]);
    embedder = new FakeEmbedder({ lamp: [0, 5] });
    search = new SearchService({ embedder, service: index, store, config });
  });

  afterEach(() => {
    index.close();
  });

  it('embeds text queries and backfills missing metadata', async () => {
    const result = await search.search({ queryType: 'text', query: 'lamp', topK: 5 });

    expect(result._unsafeUnwrap()).toEqual({
      query: 'lamp',
      queryType: 'text',
      numRecommendations: 2,
      results: [
        { id: 'lamp-1', score: 1, metadata: { title: 'Lamp' } },
        { id: 'desk-1', score: 0, metadata: { title: 'Desk' } },
      ],
      backfilled: 1,
      skipped: [],
    });
    expect(embedder.calls).toEqual([
      { texts: ['lamp'], options: { taskType: 'RETRIEVAL_QUERY', dimensionality: 768 } },
    ]);
  });

  it('treats queries as vectors by default', async () => {
    const result = await search.search({ query: [1, 0], topK: 1 });

    expect(result._unsafeUnwrap().results).toEqual([{ id: 'desk-1', score: 1, metadata: { title: 'Desk' } }]);
    expect(embedder.calls).toHaveLength(0);
  });

  it('matches the query type case-insensitively', async () => {
    const result = await search.search({ queryType: 'VECTOR', query: [0, 1] });

    expect(result._unsafeUnwrap().queryType).toBe('vector');
  });

  it('skips backfill without a metadata prefix', async () => {
    const bare = new SearchService({
      embedder,
      service: index,
      store,
      config: createTestConfig({ resourceNames: { endpointId: 'endpoint-1', deployedIndexId: 'products' } }),
    });

    const result = await bare.search({ query: [0, 1], topK: 1 });

    expect(result._unsafeUnwrap()).toMatchObject({
      results: [{ id: 'lamp-1', score: 1, metadata: null }],
      backfilled: 0,
    });
  });

  it('passes restrict clauses as filters', async () => {
    const findNeighbors = vi.spyOn(index, 'findNeighbors');

    const result = await search.search({
      query: [0, 1],
      restricts: [{ name: 'color', allow_tokens: ['red'] }],
    });

    expect(result._unsafeUnwrap().results.map((r) => r.id)).toEqual(['desk-1']);
    expect(findNeighbors).toHaveBeenCalledWith(
      expect.objectContaining({ filters: [{ namespace: 'color', allow: ['red'], deny: [] }] })
    );
  });

  it('adds a sparse query vector for hybrid text queries', async () => {
    const findNeighbors = vi.spyOn(index, 'findNeighbors');

    const result = await search.search({ queryType: 'text', query: 'lamp', hybrid: true });

    expect(result.isOk()).toBe(true);
    expect(findNeighbors.mock.calls[0]?.[0].sparseVector?.values).toEqual([1]);
  });

  it('rejects hybrid vector queries', async () => {
    const result = await search.search({ query: [1, 0], hybrid: true });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(InputError);
    expect(error).toMatchObject({ stage: 'query', field: 'hybrid' });
  });

  it('rejects a vector given for a text query', async () => {
    const result = await search.search({ queryType: 'text', query: [1, 0] });

    expect(result._unsafeUnwrapErr().message).toBe("query must be a string when queryType is 'text'");
  });

  it('rejects text given for a vector query', async () => {
    const result = await search.search({ queryType: 'vector', query: 'lamp' });

    expect(result._unsafeUnwrapErr().message).toBe(
      "query must be a non-empty list of numbers when queryType is 'vector'"
    );
  });

  it('rejects non-finite query vectors', async () => {
    const result = await search.search({ query: [1, Number.NaN] });

    expect(result._unsafeUnwrapErr().message).toBe('query vector must contain only finite numbers');
  });

  it('rejects unknown query types', async () => {
    const result = await search.search({ queryType: 'image', query: 'lamp' });

    expect(result._unsafeUnwrapErr().message).toBe("queryType must be 'text' or 'vector'");
  });

  it('rejects a non-positive topK', async () => {
    const result = await search.search({ query: [1, 0], topK: 0 });

    expect(result._unsafeUnwrapErr().message).toBe('topK must be a positive integer, got 0');
  });

  it('requires endpoint and deployed index ids', async () => {
    const bare = new SearchService({ embedder, service: index, store, config: createTestConfig() });

    const result = await bare.search({ query: [1, 0] });

    expect(result._unsafeUnwrapErr().message).toBe('endpointId and deployedIndexId are required');
  });

  it('propagates embedder failures', async () => {
    const cause = new Error('embedder offline');
    const failing = new SearchService({ embedder: new FakeEmbedder({}, cause), service: index, store, config });

    const result = await failing.search({ queryType: 'text', query: 'lamp' });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(CollaboratorFailure);
    expect(error.stage).toBe('embed');
    expect(error.cause).toBe(cause);
  });

  it('reports a missing embedding endpoint as a configuration error', async () => {
    const unconfigured = new SearchService({
      embedder: new HttpDenseEmbedder({ endpoint: '', model: 'test-model' }),
      service: index,
      store,
      config,
    });

    const result = await unconfigured.search({ queryType: 'text', query: 'lamp' });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(InputError);
    expect(error.stage).toBe('config');
  });
});

describe('SearchService with a deployed index named apart from its index', () => {
  const deployedConfig = createTestConfig({
    resourceNames: { indexId: 'products-index', endpointId: 'endpoint-1', deployedIndexId: 'products-deployed' },
  });

  let index: SqliteVectorIndex;

  beforeEach(() => {
    index = new SqliteVectorIndex(new Database(':memory:'), null, {
      distanceMeasure: 'DOT_PRODUCT',
      rrfK: 60,
      rrfAlpha: 0.5,
    });
  });

  afterEach(() => {
    index.close();
  });

  it('finds entries upserted into the configured index', async () => {
    const store = new InMemoryBlobStore();
    const updater = new IndexUpdater({ service: index, store, config: deployedConfig });
    const upserted = await updater.streamingUpdate({ datapoints: [{ id: 'lamp-1', embedding: [0, 1] }] });
    expect(upserted._unsafeUnwrap().upserted).toBe(1);

    const search = new SearchService({ embedder: new FakeEmbedder(), service: index, store, config: deployedConfig });
    const result = await search.search({ queryType: 'vector', query: [0, 1] });

    expect(result._unsafeUnwrap()).toMatchObject({
      numRecommendations: 1,
      results: [{ id: 'lamp-1', score: 1, metadata: null }],
    });
  });

  it('searches the index named in the request', async () => {
    await index.upsertDatapoints('other-index', [assemble({ id: 'desk-1', denseVector: [1, 0] })._unsafeUnwrap()]);
    const search = new SearchService({
      embedder: new FakeEmbedder(),
      service: index,
      store: null,
      config: deployedConfig,
    });

    const result = await search.search({ query: [1, 0], indexId: 'other-index' });

    expect(result._unsafeUnwrap().results.map((r) => r.id)).toEqual(['desk-1']);
  });
});
