/**
 * Index Updates
 *
 * Streaming upsert and delete of individual entries, and batch update from
 * line-delimited files under a blob store prefix.
 */

import { InputError, type PipelineError, type SkippedUnit, toCollaboratorFailure } from '../lib/errors.js';
import { parseJsonObjectLine } from '../lib/jsonl.js';
import { logger } from '../lib/logger.js';
import { Result, ResultAsync, err, ok } from '../lib/result-types.js';
import type { IndexEntry } from '../models/index-entry.js';
import type { PipelineConfig } from '../models/pipeline-config.js';
import type { BlobStore } from './blob-store.js';
import { parse } from './datapoint-assembler.js';
import type { VectorSearchService } from './vector-search-service.js';

export type DatapointsSource = 'api' | 'store';

export interface StreamingUpdateRequest {
  indexId?: string;
  /** Serialized entries, used when the source is `api` */
  datapoints?: readonly unknown[];
  datapointsSource?: DatapointsSource;
  /** Prefix to read entries from, required when the source is `store` */
  datapointsPrefix?: string;
}

export interface StreamingUpdateResult {
  indexId: string;
  upserted: number;
  skipped: SkippedUnit[];
}

export interface StreamingDeleteRequest {
  indexId?: string;
  datapointIds: readonly unknown[];
}

export interface StreamingDeleteResult {
  indexId: string;
  deleted: number;
}

export interface BatchUpdateRequest {
  indexId?: string;
  /** Defaults to `batchPaths.batchRoot` */
  contentsDeltaUri?: string;
  isCompleteOverwrite?: boolean;
}

export interface BatchUpdateResult {
  status: 'STARTED';
  indexId: string;
  files: string[];
  contentsDeltaUri: string;
}

export interface IndexUpdaterDeps {
  service: VectorSearchService;
  store: BlobStore;
  config: Readonly<PipelineConfig>;
}

/**
 * A raw entry and where it came from (`key:line` or `datapoint N`)
 */
interface LocatedItem {
  item: unknown;
  location: string;
}

interface LoadedEntries {
  entries: IndexEntry[];
  skipped: SkippedUnit[];
}

export class IndexUpdater {
  constructor(private readonly deps: IndexUpdaterDeps) {}

  private resolveIndexId(
    requested: string | undefined,
    stage: 'upsert' | 'delete'
  ): Result<string, InputError> {
    const indexId = requested || this.deps.config.resourceNames.indexId;
    if (!indexId) {
      return err(new InputError(stage, 'indexId is required', 'indexId'));
    }
    return ok(indexId);
  }

  /**
   * Non-blank lines of every object under a prefix, parsed as objects
   */
  private async readStoreItems(prefix: string): Promise<{ items: LocatedItem[]; skipped: SkippedUnit[] }> {
    const items: LocatedItem[] = [];
    const skipped: SkippedUnit[] = [];

    for (const key of await this.deps.store.list(prefix)) {
      let lineNumber = 0;
      let loaded = 0;
      for await (const rawLine of this.deps.store.readLines(key)) {
        lineNumber++;
        const line = rawLine.trim();
        if (!line) continue;

        const location = `${key}:${lineNumber}`;
        const parsed = parseJsonObjectLine(line);
        if (parsed.isErr()) {
          skipped.push({ stage: 'load', reason: parsed.error, location });
          continue;
        }
        items.push({ item: parsed.value, location });
        loaded++;
      }
      logger.debug(`Loaded ${loaded} lines from ${this.deps.store.uriOf(key)}`);
    }

    return { items, skipped };
  }

  private async loadEntries(request: StreamingUpdateRequest): Promise<Result<LoadedEntries, PipelineError>> {
    const source = request.datapointsSource ?? 'api';
    let items: LocatedItem[] = (request.datapoints ?? []).map((item, i) => ({
      item,
      location: `datapoint ${i + 1}`,
    }));
    const skipped: SkippedUnit[] = [];

    if (source === 'store') {
      const prefix = request.datapointsPrefix;
      if (!prefix) {
        return err(
          new InputError('load', 'datapointsPrefix is required when datapointsSource is store', 'datapointsPrefix')
        );
      }
      const read = await ResultAsync.fromPromise(
        this.readStoreItems(prefix),
        toCollaboratorFailure('load', `read ${prefix}`)
      );
      if (read.isErr()) return err(read.error);
      items = read.value.items;
      skipped.push(...read.value.skipped);
    }

    const entries: IndexEntry[] = [];
    for (const { item, location } of items) {
      const entry = parse(item);
      if (entry.isErr()) {
        skipped.push({ stage: 'load', reason: entry.error.message, location });
        continue;
      }
      entries.push(entry.value);
    }

    return ok({ entries, skipped });
  }

  /**
   * Upsert entries from the request or the blob store
   */
  async streamingUpdate(request: StreamingUpdateRequest): Promise<Result<StreamingUpdateResult, PipelineError>> {
    const indexId = this.resolveIndexId(request.indexId, 'upsert');
    if (indexId.isErr()) return err(indexId.error);

    const loaded = await this.loadEntries(request);
    if (loaded.isErr()) return err(loaded.error);
    const { entries, skipped } = loaded.value;

    for (const unit of skipped) {
      logger.logSkippedUnit(unit.stage, unit.reason, unit.location);
    }

    const upserted = await ResultAsync.fromPromise(
      this.deps.service.upsertDatapoints(indexId.value, entries),
      toCollaboratorFailure('upsert', `upsert into ${indexId.value}`)
    );
    if (upserted.isErr()) {
      logger.logCollaboratorFailure('upsert', `upsert into ${indexId.value}`, upserted.error.cause ?? upserted.error);
      return err(upserted.error);
    }

    return ok({ indexId: indexId.value, upserted: entries.length, skipped });
  }

  /**
   * Remove entries by id; ids are stringified
   */
  async streamingDelete(request: StreamingDeleteRequest): Promise<Result<StreamingDeleteResult, PipelineError>> {
    const indexId = this.resolveIndexId(request.indexId, 'delete');
    if (indexId.isErr()) return err(indexId.error);

    const ids = request.datapointIds.map((id) => String(id));
    if (ids.length === 0) {
      return err(new InputError('delete', 'datapointIds must not be empty', 'datapointIds'));
    }

    const removed = await ResultAsync.fromPromise(
      this.deps.service.removeDatapoints(indexId.value, ids),
      toCollaboratorFailure('delete', `delete from ${indexId.value}`)
    );
    if (removed.isErr()) {
      logger.logCollaboratorFailure('delete', `delete from ${indexId.value}`, removed.error.cause ?? removed.error);
      return err(removed.error);
    }

    return ok({ indexId: indexId.value, deleted: ids.length });
  }

  /**
   * Rebuild or extend the index from every file under a prefix
   */
  async batchUpdate(request: BatchUpdateRequest): Promise<Result<BatchUpdateResult, PipelineError>> {
    const indexId = this.resolveIndexId(request.indexId, 'upsert');
    if (indexId.isErr()) return err(indexId.error);

    const prefix = request.contentsDeltaUri || this.deps.config.batchPaths.batchRoot;
    if (!prefix) {
      return err(new InputError('load', 'contentsDeltaUri is required for batch update', 'contentsDeltaUri'));
    }

    const listed = await ResultAsync.fromPromise(
      this.deps.store.list(prefix),
      toCollaboratorFailure('load', `list ${prefix}`)
    );
    if (listed.isErr()) return err(listed.error);

    const files = listed.value.map((key) => this.deps.store.uriOf(key));
    if (files.length === 0) {
      return err(new InputError('load', `No files found in ${prefix}`, 'contentsDeltaUri'));
    }
    logger.info('Batch update using files', { indexId: indexId.value, files });

    const imported = await ResultAsync.fromPromise(
      this.deps.service.importFromPrefix(indexId.value, prefix, request.isCompleteOverwrite ?? false),
      toCollaboratorFailure('upsert', `import ${prefix}`)
    );
    if (imported.isErr()) {
      logger.logCollaboratorFailure('upsert', `import ${prefix}`, imported.error.cause ?? imported.error);
      return err(imported.error);
    }
    for (const unit of imported.value.skipped) {
      logger.logSkippedUnit(unit.stage, unit.reason, unit.location);
    }

    return ok({ status: 'STARTED', indexId: indexId.value, files, contentsDeltaUri: prefix });
  }
}
