/**
 * Embedding Pipeline
 *
 * One embedding run: read records, embed their text densely (and sparsely
 * over the whole batch), assemble index entries and write them as one
 * line-delimited object under the output prefix.
 */

import { EMBEDDING_OUTPUT_FILE } from '../constants/pipeline-constants.js';
import { asNonEmptyText, normalizeVector } from '../lib/embedding-utils.js';
import {
  CollaboratorFailure,
  InputError,
  type PipelineError,
  type SkippedUnit,
  toCollaboratorFailure,
} from '../lib/errors.js';
import { toJsonl } from '../lib/jsonl.js';
import { logger } from '../lib/logger.js';
import { Result, ResultAsync, err, ok } from '../lib/result-types.js';
import type { IndexEntry, TermBucketVector } from '../models/index-entry.js';
import { fieldSelectionOf, type PipelineConfig } from '../models/pipeline-config.js';
import type { SourceRecord } from '../models/source-record.js';
import { normalizePrefix, type BlobStore } from './blob-store.js';
import { assemble, serialize } from './datapoint-assembler.js';
import type { DenseEmbedder } from './dense-embedder.js';
import { RecordProjector } from './record-projector.js';
import type { RecordSource } from './record-source.js';
import { SparseEncoder } from './sparse-encoder.js';

export interface EmbedRequest {
  runId: string;
  table: string;
  where: string;
  /** Defaults to `batchPaths.batchRoot` */
  outputPrefix?: string;
  /** Defaults to `embedding.outputDimensionality` */
  dimension?: number;
  /** Attach BM25 sparse vectors (default true) */
  useBm25?: boolean;
}

export interface EmbedResult {
  status: 'EMBEDDED';
  runId: string;
  outputPrefix: string;
  outputFile: string;
  rowCount: number;
  written: number;
  skipped: SkippedUnit[];
}

export interface EmbeddingPipelineDeps {
  source: RecordSource;
  embedder: DenseEmbedder;
  store: BlobStore;
  config: Readonly<PipelineConfig>;
}

async function collect(source: RecordSource, table: string, where: string): Promise<SourceRecord[]> {
  const records: SourceRecord[] = [];
  for await (const record of source.readRecords(table, where)) {
    records.push(record);
  }
  return records;
}

export class EmbeddingPipeline {
  private readonly projector: RecordProjector;
  private readonly encoder: SparseEncoder;

  constructor(private readonly deps: EmbeddingPipelineDeps) {
    const { config } = deps;
    this.projector = new RecordProjector(fieldSelectionOf(config));
    this.encoder = new SparseEncoder(config.sparse.bucketCount, { k1: config.sparse.k1, b: config.sparse.b });
  }

  private validate(request: EmbedRequest): Result<{ prefix: string; dimension: number }, InputError> {
    if (!request.runId.trim()) {
      return err(new InputError('source', 'runId is required', 'runId'));
    }
    if (!request.table.trim()) {
      return err(new InputError('source', 'table is required', 'table'));
    }

    const prefix = request.outputPrefix || this.deps.config.batchPaths.batchRoot;
    if (!prefix) {
      return err(new InputError('write', 'An output prefix is required for embedding output', 'outputPrefix'));
    }

    const dimension = request.dimension ?? this.deps.config.embedding.outputDimensionality;
    if (!Number.isInteger(dimension) || dimension <= 0) {
      return err(new InputError('embed', `dimension must be a positive integer, got ${dimension}`, 'dimension'));
    }

    return ok({ prefix, dimension });
  }

  private async embedTexts(texts: string[], dimension: number): Promise<Result<number[][], PipelineError>> {
    const started = performance.now();
    const embedded = await ResultAsync.fromPromise(
      this.deps.embedder.embed(texts, { taskType: 'RETRIEVAL_DOCUMENT', dimensionality: dimension }),
      toCollaboratorFailure('embed', 'embed documents')
    );
    const duration = performance.now() - started;
    if (duration > this.deps.config.search.slowThresholdMs) {
      logger.logSlowOperation('embed documents', duration, this.deps.config.search.slowThresholdMs, {
        itemCount: texts.length,
      });
    }

    return embedded.andThen((vectors) => {
      if (vectors.length !== texts.length) {
        return err(
          new CollaboratorFailure(
            'embed',
            'embed documents',
            new Error(`expected ${texts.length} embeddings, got ${vectors.length}`)
          )
        );
      }
      return ok(vectors.map(normalizeVector));
    });
  }

  /**
   * Run one embedding batch end to end
   */
  async embedRecords(request: EmbedRequest): Promise<Result<EmbedResult, PipelineError>> {
    const validated = this.validate(request);
    if (validated.isErr()) return err(validated.error);
    const { prefix, dimension } = validated.value;

    const records = await ResultAsync.fromPromise(
      collect(this.deps.source, request.table, request.where),
      toCollaboratorFailure('source', `read ${request.table}`)
    );
    if (records.isErr()) {
      logger.logCollaboratorFailure('source', `read ${request.table}`, records.error.cause ?? records.error);
      return err(records.error);
    }
    const rows = records.value;

    const projected = rows.map((record) => this.projector.project(record));
    const texts = projected.map((p) => p.text);

    const dense = await this.embedTexts(texts.map(asNonEmptyText), dimension);
    if (dense.isErr()) {
      if (dense.error instanceof CollaboratorFailure) {
        logger.logCollaboratorFailure('embed', 'embed documents', dense.error.cause, { runId: request.runId });
      }
      return err(dense.error);
    }

    let sparse: TermBucketVector[] | null = null;
    if (request.useBm25 ?? true) {
      const encoded = this.encoder.encodeCorpus(texts);
      if (encoded.isErr()) return err(encoded.error);
      sparse = encoded.value;
    }

    const entries: IndexEntry[] = [];
    const skipped: SkippedUnit[] = [];

    projected.forEach((record, i) => {
      const location = `record ${i + 1}`;
      skipped.push(...record.skipped.map((unit) => ({ ...unit, location: unit.location ?? location })));

      if (record.id === null) {
        skipped.push({ stage: 'project', reason: 'record has no id', location });
        return;
      }

      const entry = assemble({
        id: record.id,
        denseVector: dense.value[i] ?? [],
        sparseVector: sparse?.[i] ?? null,
        restricts: record.restricts,
        numericRestricts: record.numericRestricts,
        metadata: record.metadata,
      });
      if (entry.isErr()) {
        skipped.push({ stage: 'assemble', reason: entry.error.message, location });
        return;
      }
      entries.push(entry.value);
    });

    for (const unit of skipped) {
      logger.logSkippedUnit(unit.stage, unit.reason, unit.location);
    }

    const key = `${normalizePrefix(prefix)}/${EMBEDDING_OUTPUT_FILE}`;
    const written = await ResultAsync.fromPromise(
      this.deps.store.write(key, toJsonl(entries.map(serialize))),
      toCollaboratorFailure('write', `write ${key}`)
    );
    if (written.isErr()) {
      logger.logCollaboratorFailure('write', `write ${key}`, written.error.cause ?? written.error);
      return err(written.error);
    }

    logger.info('Embedding run complete', {
      runId: request.runId,
      rowCount: rows.length,
      written: entries.length,
      skipped: skipped.length,
    });

    return ok({
      status: 'EMBEDDED',
      runId: request.runId,
      outputPrefix: prefix,
      outputFile: written.value,
      rowCount: rows.length,
      written: entries.length,
      skipped,
    });
  }
}
