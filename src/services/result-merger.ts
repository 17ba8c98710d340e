/**
 * Result Merger
 *
 * Normalizes raw neighbors returned by the vector search service into
 * `NeighborResult`s and backfills missing metadata from line-delimited
 * records in the blob store.
 *
 * Backfill scans shards until every requested id is found. With
 * `concurrency > 1` shards are scanned in parallel and the remaining scans
 * stop at their next line once the id set is satisfied.
 */

import {
  CollaboratorFailure,
  InputError,
  type PipelineError,
  type SkippedUnit,
} from '../lib/errors.js';
import { isPlainObject, parseJsonObjectLine } from '../lib/jsonl.js';
import { logger } from '../lib/logger.js';
import { Result, ok, err } from '../lib/result-types.js';
import type { NeighborResult, RawNeighbor } from '../models/neighbor-result.js';
import type { BlobStore } from './blob-store.js';

/**
 * Outcome of a metadata scan
 */
export interface MetadataIndexReport {
  /** id -> metadata for the ids that were found */
  found: Map<string, Record<string, unknown>>;
  /** Lines dropped because they were malformed or not objects */
  skipped: SkippedUnit[];
  /** Number of shards opened */
  shardsScanned: number;
}

export interface MetadataScanOptions {
  /** Shards scanned at once (default 1: sequential) */
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * Outcome of a merge
 */
export interface MergeReport {
  results: NeighborResult[];
  /** Results whose metadata came from the store */
  backfilled: number;
  skipped: SkippedUnit[];
}

function asIdentifier(value: unknown): string | null {
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function asMetadata(value: unknown): Record<string, unknown> | null {
  return isPlainObject(value) && Object.keys(value).length > 0 ? value : null;
}

/**
 * Read the score, preferring `distance` over `score`
 */
function readScore(neighbor: Record<string, unknown>): Result<number | null, InputError> {
  for (const field of ['distance', 'score'] as const) {
    const value = neighbor[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'number' || Number.isNaN(value)) {
      return err(new InputError('search', `Neighbor ${field} must be a number`, field));
    }
    return ok(value);
  }
  return ok(null);
}

/**
 * Decode a raw neighbor into one of the two known shapes
 *
 * A `datapoint` object makes the neighbor nested (`datapoint_id` or `id`,
 * `embedding_metadata` or `metadata`); otherwise a top-level `id` makes it
 * flat. Anything else is rejected.
 */
export function decodeNeighbor(value: unknown): Result<RawNeighbor, InputError> {
  if (!isPlainObject(value)) {
    return err(new InputError('search', 'Neighbor must be an object'));
  }

  const neighbor = value;
  return readScore(neighbor).andThen((score): Result<RawNeighbor, InputError> => {
    const flatId = asIdentifier(neighbor.id);
    const datapoint = neighbor.datapoint;

    if (isPlainObject(datapoint)) {
      const id = asIdentifier(datapoint.datapoint_id) ?? asIdentifier(datapoint.id) ?? flatId;
      if (id === null) {
        return err(new InputError('search', 'Nested neighbor has no datapoint id', 'datapoint_id'));
      }
      const metadata = asMetadata(datapoint.embedding_metadata) ?? asMetadata(datapoint.metadata);
      return ok({ kind: 'nested', id, metadata, score });
    }

    if (flatId !== null) {
      return ok({ kind: 'flat', id: flatId, score });
    }

    return err(new InputError('search', 'Unrecognized neighbor shape: no datapoint and no id'));
  });
}

export function normalizeNeighbor(raw: RawNeighbor): NeighborResult {
  switch (raw.kind) {
    case 'nested':
      return { id: raw.id, score: raw.score, metadata: raw.metadata };
    case 'flat':
      return { id: raw.id, score: raw.score, metadata: null };
  }
}

/**
 * Ids of results that still lack metadata
 */
export function collectMissingIds(results: readonly NeighborResult[]): Set<string> {
  const ids = new Set<string>();
  for (const result of results) {
    if (result.id && asMetadata(result.metadata) === null) {
      ids.add(result.id);
    }
  }
  return ids;
}

/**
 * Fill metadata for results that lack it; populated metadata is never
 * replaced
 */
export function applyBackfill(
  results: readonly NeighborResult[],
  found: ReadonlyMap<string, Record<string, unknown>>
): { results: NeighborResult[]; backfilled: number } {
  let backfilled = 0;

  const merged = results.map((result) => {
    if (asMetadata(result.metadata) !== null) return result;
    const metadata = found.get(result.id);
    if (!metadata) return result;
    backfilled++;
    return { ...result, metadata };
  });

  return { results: merged, backfilled };
}

/**
 * Scan line-delimited records under a prefix for the metadata of `ids`
 *
 * Records are `{ id, embedding_metadata }` (or `metadata`). Malformed lines
 * and non-object records are skipped; store failures end the scan.
 */
export async function buildMetadataIndex(
  store: BlobStore,
  prefix: string,
  ids: ReadonlySet<string>,
  options: MetadataScanOptions = {}
): Promise<Result<MetadataIndexReport, PipelineError>> {
  const found = new Map<string, Record<string, unknown>>();
  const skipped: SkippedUnit[] = [];
  let shardsScanned = 0;

  if (ids.size === 0) {
    return ok({ found, skipped, shardsScanned });
  }

  let shards: string[];
  try {
    shards = await store.list(prefix);
  } catch (error) {
    return err(new CollaboratorFailure('backfill', `list ${prefix}`, error));
  }

  const controller = new AbortController();
  const onExternalAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  if (options.signal?.aborted) controller.abort();

  const satisfied = () => found.size === ids.size;

  const scanShard = async (shard: string): Promise<void> => {
    shardsScanned++;
    let lineNumber = 0;

    for await (const rawLine of store.readLines(shard)) {
      if (controller.signal.aborted) return;
      lineNumber++;

      const line = rawLine.trim();
      if (!line) continue;

      const parsed = parseJsonObjectLine(line);
      if (parsed.isErr()) {
        skipped.push({ stage: 'backfill', reason: parsed.error, location: `${shard}:${lineNumber}` });
        continue;
      }

      const record = parsed.value;
      const id = asIdentifier(record.id);
      if (id === null || !ids.has(id) || found.has(id)) continue;

      const metadata = asMetadata(record.embedding_metadata) ?? asMetadata(record.metadata);
      if (metadata === null) continue;

      found.set(id, metadata);
      if (satisfied()) {
        controller.abort();
        return;
      }
    }
  };

  const queue = [...shards];
  const worker = async (): Promise<void> => {
    for (let shard = queue.shift(); shard !== undefined; shard = queue.shift()) {
      if (controller.signal.aborted) return;
      try {
        await scanShard(shard);
      } catch (error) {
        controller.abort();
        throw new CollaboratorFailure('backfill', `read ${shard}`, error);
      }
    }
  };

  const concurrency = Math.max(1, Math.min(options.concurrency ?? 1, shards.length || 1));

  try {
    await Promise.all(Array.from({ length: concurrency }, worker));
  } catch (error) {
    return err(error instanceof CollaboratorFailure ? error : new CollaboratorFailure('backfill', 'scan', error));
  } finally {
    options.signal?.removeEventListener('abort', onExternalAbort);
  }

  for (const unit of skipped) {
    logger.logSkippedUnit(unit.stage, unit.reason, unit.location);
  }

  return ok({ found, skipped, shardsScanned });
}

/**
 * Normalizes neighbors and backfills their metadata from a blob store
 */
export class ResultMerger {
  constructor(
    private readonly store: BlobStore | null,
    private readonly options: MetadataScanOptions = {}
  ) {}

  /**
   * Decode, normalize and backfill one neighbor list
   *
   * @param rawNeighbors Neighbors as returned by the vector search service
   * @param metadataPrefix Prefix holding line-delimited entries; no backfill
   *   when omitted
   */
  async merge(
    rawNeighbors: readonly unknown[],
    metadataPrefix?: string
  ): Promise<Result<MergeReport, PipelineError>> {
    const results: NeighborResult[] = [];
    for (const raw of rawNeighbors) {
      const decoded = decodeNeighbor(raw);
      if (decoded.isErr()) return err(decoded.error);
      results.push(normalizeNeighbor(decoded.value));
    }

    const missing = collectMissingIds(results);
    if (missing.size === 0 || !metadataPrefix || !this.store) {
      return ok({ results, backfilled: 0, skipped: [] });
    }

    const scan = await buildMetadataIndex(this.store, metadataPrefix, missing, this.options);
    return scan.map((report) => ({
      ...applyBackfill(results, report.found),
      skipped: report.skipped,
    }));
  }
}
