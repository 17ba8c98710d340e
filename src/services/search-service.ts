/**
 * Search Service
 *
 * Turns a text or vector query into a nearest-neighbor request, optionally
 * hybrid with a sparse query vector, and merges the neighbors into results
 * with metadata backfilled from the blob store.
 *
 * @module search-service
 */

import { DEFAULT_TOP_K } from '../constants/pipeline-constants.js';
import { isFiniteVector, normalizeVector } from '../lib/embedding-utils.js';
import { CollaboratorFailure, InputError, type PipelineError, type SkippedUnit, toCollaboratorFailure } from '../lib/errors.js';
import { isPlainObject } from '../lib/jsonl.js';
import { logger } from '../lib/logger.js';
import { Result, ResultAsync, err, ok } from '../lib/result-types.js';
import type { TermBucketVector } from '../models/index-entry.js';
import type { NeighborResult } from '../models/neighbor-result.js';
import type { PipelineConfig } from '../models/pipeline-config.js';
import type { BlobStore } from './blob-store.js';
import type { DenseEmbedder } from './dense-embedder.js';
import { ResultMerger } from './result-merger.js';
import { SparseEncoder } from './sparse-encoder.js';
import type { NamespaceFilter, VectorSearchService } from './vector-search-service.js';

export type QueryType = 'text' | 'vector';

export interface SearchRequest {
  endpointId?: string;
  deployedIndexId?: string;
  /** Index served by the deployment; defaults to `resourceNames.indexId`, then the deployed index id */
  indexId?: string;
  /** `text` or `vector`, case-insensitive; defaults to `vector` */
  queryType?: string;
  /** A string for text queries, a list of numbers for vector queries */
  query: unknown;
  topK?: number;
  /** Add a BM25 query vector; text queries only */
  hybrid?: boolean;
  /** Filter clauses: `namespace` (or `name`) with allow and deny tokens */
  restricts?: readonly unknown[];
  /** Defaults to `batchPaths.batchRoot` */
  metadataPrefix?: string;
}

export interface SearchResponse {
  query: string | number[];
  queryType: QueryType;
  numRecommendations: number;
  results: NeighborResult[];
  backfilled: number;
  skipped: SkippedUnit[];
}

export interface SearchServiceDeps {
  embedder: DenseEmbedder;
  service: VectorSearchService;
  store: BlobStore | null;
  config: Readonly<PipelineConfig>;
}

type ValidatedQuery =
  | { queryType: 'text'; query: string }
  | { queryType: 'vector'; query: number[] };

interface ValidatedRequest {
  endpointId: string;
  deployedIndexId: string;
  indexId: string;
  topK: number;
  query: ValidatedQuery;
}

const ALLOW_KEYS = ['allow', 'allow_list', 'allow_tokens'] as const;
const DENY_KEYS = ['deny', 'deny_list', 'deny_tokens'] as const;

/**
 * First non-empty token list among the given keys
 */
function tokensOf(clause: Record<string, unknown>, keys: readonly string[]): string[] {
  for (const key of keys) {
    const value = clause[key];
    if (Array.isArray(value) && value.length > 0) {
      return value.map((token) => String(token));
    }
    if (typeof value === 'string' && value) {
      return [value];
    }
  }
  return [];
}

/**
 * Build query filters from restrict clauses; clauses without a namespace are
 * dropped
 */
export function buildNamespaceFilters(restricts: readonly unknown[] | undefined): NamespaceFilter[] {
  const filters: NamespaceFilter[] = [];

  for (const clause of restricts ?? []) {
    if (!isPlainObject(clause)) continue;

    const namespace = clause.namespace || clause.name;
    if (typeof namespace !== 'string' || !namespace) continue;

    filters.push({
      namespace,
      allow: tokensOf(clause, ALLOW_KEYS),
      deny: tokensOf(clause, DENY_KEYS),
    });
  }

  return filters;
}

function validateQuery(queryType: string | undefined, query: unknown): Result<ValidatedQuery, InputError> {
  const type = (queryType || 'vector').toLowerCase();

  if (type === 'text') {
    if (typeof query !== 'string') {
      return err(new InputError('query', "query must be a string when queryType is 'text'", 'query'));
    }
    return ok({ queryType: 'text', query });
  }

  if (type === 'vector') {
    const invalid = new InputError(
      'query',
      "query must be a non-empty list of numbers when queryType is 'vector'",
      'query'
    );
    if (!Array.isArray(query)) return err(invalid);

    const values: unknown[] = query;
    if (values.length === 0 || !values.every((v): v is number => typeof v === 'number')) {
      return err(invalid);
    }
    if (!isFiniteVector(values)) {
      return err(new InputError('query', 'query vector must contain only finite numbers', 'query'));
    }
    return ok({ queryType: 'vector', query: [...values] });
  }

  return err(new InputError('query', "queryType must be 'text' or 'vector'", 'queryType'));
}

export class SearchService {
  private readonly encoder: SparseEncoder;
  private readonly merger: ResultMerger;

  constructor(private readonly deps: SearchServiceDeps) {
    const { config } = deps;
    this.encoder = new SparseEncoder(config.sparse.bucketCount, { k1: config.sparse.k1, b: config.sparse.b });
    this.merger = new ResultMerger(deps.store, { concurrency: config.search.backfillConcurrency });
  }

  private validate(request: SearchRequest): Result<ValidatedRequest, InputError> {
    const { resourceNames } = this.deps.config;
    const endpointId = request.endpointId || resourceNames.endpointId;
    const deployedIndexId = request.deployedIndexId || resourceNames.deployedIndexId;
    if (!endpointId || !deployedIndexId) {
      return err(new InputError('search', 'endpointId and deployedIndexId are required'));
    }
    const indexId = request.indexId || resourceNames.indexId || deployedIndexId;

    const topK = request.topK ?? DEFAULT_TOP_K;
    if (!Number.isInteger(topK) || topK <= 0) {
      return err(new InputError('search', `topK must be a positive integer, got ${topK}`, 'topK'));
    }

    return validateQuery(request.queryType, request.query).andThen((query) => {
      if (request.hybrid && query.queryType === 'vector') {
        return err(new InputError('query', 'hybrid search needs a text query to encode sparsely', 'hybrid'));
      }
      return ok({ endpointId, deployedIndexId, indexId, topK, query });
    });
  }

  /**
   * Time a stage and log it when it crosses the slow threshold
   */
  private async timed<T>(operation: string, run: () => Promise<T>, itemCount?: number): Promise<T> {
    const threshold = this.deps.config.search.slowThresholdMs;
    const started = performance.now();
    try {
      return await run();
    } finally {
      const duration = performance.now() - started;
      logger.debug(`[search] ${operation}`, { duration_ms: Math.round(duration) });
      if (duration > threshold) {
        logger.logSlowOperation(operation, duration, threshold, { itemCount });
      }
    }
  }

  private async denseQuery(query: ValidatedQuery): Promise<Result<number[], PipelineError>> {
    if (query.queryType === 'vector') {
      return ok(query.query);
    }

    const { embedding } = this.deps.config;
    const embedded = await ResultAsync.fromPromise(
      this.timed('embed query', () =>
        this.deps.embedder.embed([query.query], {
          taskType: 'RETRIEVAL_QUERY',
          dimensionality: embedding.outputDimensionality,
        })
      ),
      toCollaboratorFailure('embed', 'embed query')
    );

    return embedded.andThen((vectors) => {
      const [vector] = vectors;
      if (vector === undefined || vector.length === 0) {
        return err(toCollaboratorFailure('embed', 'embed query')(new Error('embedder returned no vector')));
      }
      return ok(normalizeVector(vector));
    });
  }

  /**
   * Run a query end to end
   */
  async search(request: SearchRequest): Promise<Result<SearchResponse, PipelineError>> {
    const validated = this.validate(request);
    if (validated.isErr()) return err(validated.error);
    const { deployedIndexId, indexId, topK, query } = validated.value;

    const dense = await this.denseQuery(query);
    if (dense.isErr()) {
      if (dense.error instanceof CollaboratorFailure) {
        logger.logCollaboratorFailure(dense.error.stage, 'embed query', dense.error.cause);
      }
      return err(dense.error);
    }

    let sparseVector: TermBucketVector | undefined;
    if (request.hybrid && query.queryType === 'text') {
      const encoded = this.encoder.encodeQuery(query.query);
      if (encoded.isErr()) return err(encoded.error);
      sparseVector = encoded.value;
    }

    const filters = buildNamespaceFilters(request.restricts);
    const neighbors = await ResultAsync.fromPromise(
      this.timed(
        'find neighbors',
        () =>
          this.deps.service.findNeighbors({
            indexId,
            deployedIndexId,
            denseVector: dense.value,
            sparseVector,
            topK,
            filters: filters.length > 0 ? filters : undefined,
            returnFullDatapoint: true,
          }),
        topK
      ),
      toCollaboratorFailure('query', `find neighbors in ${deployedIndexId}`)
    );
    if (neighbors.isErr()) {
      logger.logCollaboratorFailure('query', `find neighbors in ${deployedIndexId}`, neighbors.error.cause ?? neighbors.error);
      return err(neighbors.error);
    }

    const metadataPrefix = request.metadataPrefix || this.deps.config.batchPaths.batchRoot || undefined;
    const merged = await this.timed(
      'merge results',
      () => this.merger.merge(neighbors.value, metadataPrefix),
      neighbors.value.length
    );
    if (merged.isErr()) return err(merged.error);

    const { results, backfilled, skipped } = merged.value;
    return ok({
      query: query.query,
      queryType: query.queryType,
      numRecommendations: results.length,
      results,
      backfilled,
      skipped,
    });
  }
}
