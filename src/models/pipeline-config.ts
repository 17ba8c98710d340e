/**
 * Pipeline configuration schema
 *
 * Field selections drive record projection; scalar parameters drive sparse
 * encoding and search. Loaded once per process and frozen.
 *
 * @module pipeline-config
 */

import { z } from 'zod';
import {
  DEFAULT_BM25_B,
  DEFAULT_BM25_K1,
  DEFAULT_EMBEDDING_DIMENSIONALITY,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_RRF_ALPHA,
  DEFAULT_RRF_K,
  DEFAULT_SLOW_THRESHOLD_MS,
  DEFAULT_SPARSE_BUCKET_COUNT,
  DEFAULT_TIMESTAMP_FIELDS,
} from '../constants/pipeline-constants.js';

const fieldList = z.array(z.string().min(1));

export const DistanceMeasureSchema = z.enum(['DOT_PRODUCT', 'COSINE', 'SQUARED_L2']);

export type DistanceMeasure = z.infer<typeof DistanceMeasureSchema>;

export const PipelineConfigSchema = z.object({
  projectId: z.string().default(''),
  region: z.string().default('us-central1'),
  /** Root directory of the blob store */
  storageRoot: z.string().default('.vector-pipeline/store'),
  filters: z
    .object({
      restrictsFields: fieldList.default([]),
      numericRestrictsFields: fieldList.default([]),
      timestampFields: fieldList.default([...DEFAULT_TIMESTAMP_FIELDS]),
    })
    .default({}),
  embedding: z
    .object({
      textFields: fieldList.default([]),
      metadataFields: fieldList.default([]),
      modelName: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
      outputDimensionality: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONALITY),
      /** OpenAI-compatible embeddings endpoint */
      endpoint: z.string().default(''),
    })
    .default({}),
  sparse: z
    .object({
      bucketCount: z.number().int().positive().default(DEFAULT_SPARSE_BUCKET_COUNT),
      k1: z.number().nonnegative().default(DEFAULT_BM25_K1),
      b: z.number().min(0).max(1).default(DEFAULT_BM25_B),
    })
    .default({}),
  resourceNames: z
    .object({
      indexId: z.string().default(''),
      endpointId: z.string().default(''),
      deployedIndexId: z.string().default(''),
    })
    .default({}),
  batchPaths: z
    .object({
      batchRoot: z.string().default(''),
      deleteRoot: z.string().default(''),
    })
    .default({}),
  search: z
    .object({
      distanceMeasure: DistanceMeasureSchema.default('DOT_PRODUCT'),
      slowThresholdMs: z.number().int().positive().default(DEFAULT_SLOW_THRESHOLD_MS),
      rrfK: z.number().positive().default(DEFAULT_RRF_K),
      rrfAlpha: z.number().min(0).max(1).default(DEFAULT_RRF_ALPHA),
      /** Shards of the metadata store scanned at once during backfill */
      backfillConcurrency: z.number().int().positive().default(1),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Raw file contents before defaults are applied */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * Field selection used by record projection
 */
export interface FieldSelection {
  textFields: readonly string[];
  metadataFields: readonly string[];
  restrictsFields: readonly string[];
  numericRestrictsFields: readonly string[];
  timestampFields: readonly string[];
}

export function fieldSelectionOf(config: PipelineConfig): FieldSelection {
  return {
    textFields: config.embedding.textFields,
    metadataFields: config.embedding.metadataFields,
    restrictsFields: config.filters.restrictsFields,
    numericRestrictsFields: config.filters.numericRestrictsFields,
    timestampFields: config.filters.timestampFields,
  };
}
