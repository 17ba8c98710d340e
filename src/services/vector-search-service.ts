/**
 * Vector Search Service
 *
 * Boundary with the index that stores entries and answers nearest-neighbor
 * queries. `SqliteVectorIndex` is a local, exhaustive implementation used by
 * the CLI and the tests: entries are kept as serialized JSON keyed by
 * (index, id) and every query scores all entries of the index.
 */

import Database from 'better-sqlite3';
import type { SkippedUnit } from '../lib/errors.js';
import {
  cosineSimilarity,
  dotProduct,
  sparseDotProduct,
  squaredL2Distance,
} from '../lib/embedding-utils.js';
import { isPlainObject, parseJsonObjectLine, toAsciiJson } from '../lib/jsonl.js';
import { emptyTermBucketVector } from '../models/index-entry.js';
import type { IndexEntry, Restriction, TermBucketVector } from '../models/index-entry.js';
import type { DistanceMeasure } from '../models/pipeline-config.js';
import type { BlobStore } from './blob-store.js';
import { parse, serialize } from './datapoint-assembler.js';

/**
 * Query-time categorical filter
 */
export interface NamespaceFilter {
  namespace: string;
  allow: string[];
  deny: string[];
}

export interface FindNeighborsQuery {
  /** Index whose entries are searched */
  indexId: string;
  /** Deployment serving the index */
  deployedIndexId: string;
  denseVector: number[];
  sparseVector?: TermBucketVector;
  topK: number;
  filters?: NamespaceFilter[];
  /** Return the stored datapoint (id, metadata, restricts) with each neighbor */
  returnFullDatapoint: boolean;
}

export interface ImportReport {
  files: string[];
  imported: number;
  skipped: SkippedUnit[];
}

export interface VectorSearchService {
  /** Insert or replace entries by id; within a batch the last entry wins */
  upsertDatapoints(indexId: string, entries: readonly IndexEntry[]): Promise<number>;
  removeDatapoints(indexId: string, ids: readonly string[]): Promise<number>;
  /** Load every line-delimited file under a prefix into the index */
  importFromPrefix(indexId: string, prefix: string, completeOverwrite: boolean): Promise<ImportReport>;
  /** Raw neighbors, best first; their shape is up to the service */
  findNeighbors(query: FindNeighborsQuery): Promise<unknown[]>;
}

export interface SqliteVectorIndexOptions {
  distanceMeasure: DistanceMeasure;
  rrfK: number;
  /** Weight of the dense rank in hybrid fusion; the sparse rank gets the rest */
  rrfAlpha: number;
}

interface Scored {
  entry: IndexEntry;
  dense: number;
  sparse: number | null;
  fused: number;
}

/**
 * Whether an entry passes every query filter
 *
 * For each filter namespace the entry's tokens are the union of its allow
 * lists in that namespace. The entry passes when it has a token in a
 * non-empty allow list and no token in the deny list.
 */
export function matchesFilters(restricts: readonly Restriction[], filters: readonly NamespaceFilter[]): boolean {
  return filters.every((filter) => {
    const tokens = new Set(
      restricts.filter((r) => r.namespace === filter.namespace).flatMap((r) => r.allow)
    );
    if (filter.allow.length > 0 && !filter.allow.some((token) => tokens.has(token))) {
      return false;
    }
    return !filter.deny.some((token) => tokens.has(token));
  });
}

/**
 * Local vector index on SQLite
 */
export class SqliteVectorIndex implements VectorSearchService {
  constructor(
    private readonly db: Database.Database,
    private readonly store: BlobStore | null,
    private readonly options: SqliteVectorIndexOptions
  ) {
    this.initialize();
  }

  static open(
    path: string,
    store: BlobStore | null,
    options: SqliteVectorIndexOptions
  ): SqliteVectorIndex {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    return new SqliteVectorIndex(db, store, options);
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS datapoints (
        index_id TEXT NOT NULL,
        id TEXT NOT NULL,
        entry TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (index_id, id)
      );
    `);
  }

  private writeEntries(indexId: string, entries: readonly IndexEntry[]): number {
    const statement = this.db.prepare(`
      INSERT INTO datapoints (index_id, id, entry, updated_at)
      VALUES (?, ?, ?, datetime('now'))
      ON CONFLICT (index_id, id) DO UPDATE SET
        entry = excluded.entry,
        updated_at = excluded.updated_at
    `);

    const upsertAll = this.db.transaction((batch: readonly IndexEntry[]) => {
      for (const entry of batch) {
        statement.run(indexId, entry.id, toAsciiJson(serialize(entry)));
      }
    });
    upsertAll(entries);

    return entries.length;
  }

  async upsertDatapoints(indexId: string, entries: readonly IndexEntry[]): Promise<number> {
    return this.writeEntries(indexId, entries);
  }

  async removeDatapoints(indexId: string, ids: readonly string[]): Promise<number> {
    const statement = this.db.prepare('DELETE FROM datapoints WHERE index_id = ? AND id = ?');
    const removeAll = this.db.transaction((batch: readonly string[]) => {
      let removed = 0;
      for (const id of batch) {
        removed += statement.run(indexId, id).changes;
      }
      return removed;
    });
    return removeAll(ids);
  }

  async importFromPrefix(indexId: string, prefix: string, completeOverwrite: boolean): Promise<ImportReport> {
    if (!this.store) {
      throw new Error('No blob store configured for imports');
    }

    const files = await this.store.list(prefix);
    const entries: IndexEntry[] = [];
    const skipped: SkippedUnit[] = [];

    for (const file of files) {
      let lineNumber = 0;
      for await (const rawLine of this.store.readLines(file)) {
        lineNumber++;
        const line = rawLine.trim();
        if (!line) continue;

        const entry = parseJsonObjectLine(line).andThen((record) => parse(record).mapErr((e) => e.message));
        if (entry.isErr()) {
          skipped.push({ stage: 'load', reason: entry.error, location: `${file}:${lineNumber}` });
          continue;
        }
        entries.push(entry.value);
      }
    }

    const replace = this.db.transaction(() => {
      if (completeOverwrite) {
        this.db.prepare('DELETE FROM datapoints WHERE index_id = ?').run(indexId);
      }
      this.writeEntries(indexId, entries);
    });
    replace();

    return { files, imported: entries.length, skipped };
  }

  /**
   * Stored entries of an index
   */
  private loadEntries(indexId: string): IndexEntry[] {
    const rows = this.db.prepare('SELECT entry FROM datapoints WHERE index_id = ?').all(indexId);
    const entries: IndexEntry[] = [];

    for (const row of rows) {
      if (!isPlainObject(row) || typeof row.entry !== 'string') continue;
      const entry = parseJsonObjectLine(row.entry).andThen((record) => parse(record).mapErr((e) => e.message));
      if (entry.isOk()) {
        entries.push(entry.value);
      }
    }
    return entries;
  }

  private denseScore(query: readonly number[], vector: readonly number[]): number {
    switch (this.options.distanceMeasure) {
      case 'DOT_PRODUCT':
        return dotProduct(query, vector);
      case 'COSINE':
        return cosineSimilarity(query, vector);
      case 'SQUARED_L2':
        return squaredL2Distance(query, vector);
    }
  }

  /**
   * Sort by dense score in the measure's own direction
   */
  private compareDense(a: Scored, b: Scored): number {
    return this.options.distanceMeasure === 'SQUARED_L2' ? a.dense - b.dense : b.dense - a.dense;
  }

  async findNeighbors(query: FindNeighborsQuery): Promise<unknown[]> {
    const candidates: Scored[] = this.loadEntries(query.indexId)
      .filter((entry) => matchesFilters(entry.restricts, query.filters ?? []))
      .map((entry) => ({
        entry,
        dense: this.denseScore(query.denseVector, entry.denseVector),
        sparse: query.sparseVector
          ? sparseDotProduct(entry.sparseVector ?? emptyTermBucketVector(), query.sparseVector)
          : null,
        fused: 0,
      }));

    let ranked = [...candidates].sort((a, b) => this.compareDense(a, b));

    if (query.sparseVector) {
      // Reciprocal Rank Fusion: alpha/(k + denseRank) + (1 - alpha)/(k + sparseRank)
      const { rrfK, rrfAlpha } = this.options;
      ranked.forEach((scored, i) => {
        scored.fused = rrfAlpha / (rrfK + i + 1);
      });
      [...candidates]
        .sort((a, b) => (b.sparse ?? 0) - (a.sparse ?? 0))
        .forEach((scored, i) => {
          scored.fused += (1 - rrfAlpha) / (rrfK + i + 1);
        });
      ranked = [...candidates].sort((a, b) => b.fused - a.fused || this.compareDense(a, b));
    }

    return ranked.slice(0, query.topK).map((scored) => this.toRawNeighbor(scored, query.returnFullDatapoint));
  }

  private toRawNeighbor(scored: Scored, full: boolean): Record<string, unknown> {
    if (!full) {
      return { id: scored.entry.id, distance: scored.dense };
    }

    const serialized = serialize(scored.entry);
    const neighbor: Record<string, unknown> = {
      datapoint: {
        datapoint_id: serialized.id,
        restricts: serialized.restricts,
        numeric_restricts: serialized.numeric_restricts,
        embedding_metadata: serialized.embedding_metadata,
        crowding_tag: serialized.crowding_tag,
      },
      distance: scored.dense,
    };
    if (scored.sparse !== null) {
      neighbor.sparse_distance = scored.sparse;
    }
    return neighbor;
  }

  close(): void {
    this.db.close();
  }
}
