/**
 * Record Source
 *
 * Tabular rows feeding an embedding run. The source is read once per run;
 * restarting means issuing the query again.
 */

import Database from 'better-sqlite3';
import { InputError } from '../lib/errors.js';
import { isPlainObject } from '../lib/jsonl.js';
import type { FieldScalar, FieldValue, SourceRecord } from '../models/source-record.js';

export interface RecordSource {
  /**
   * Rows of `table` matching `where`
   *
   * @param table Table name
   * @param where SQL condition, as written by the operator
   */
  readRecords(table: string, where: string): AsyncIterable<SourceRecord>;
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

function isScalar(value: unknown): value is FieldScalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  );
}

/**
 * SQLite has no array type; list-valued columns are stored as JSON arrays of
 * scalars and decoded here
 */
function decodeColumn(value: unknown): FieldValue | undefined {
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (typeof value === 'string' && value.startsWith('[') && value.endsWith(']')) {
    try {
      const parsed: unknown = JSON.parse(value);
      if (Array.isArray(parsed) && parsed.every(isScalar)) {
        return parsed;
      }
    } catch {
      // Not JSON: keep the text as is
      return value;
    }
    return value;
  }
  return isScalar(value) ? value : undefined;
}

export function toSourceRecord(row: Record<string, unknown>): SourceRecord {
  const record: Record<string, FieldValue | undefined> = {};
  for (const [column, value] of Object.entries(row)) {
    record[column] = decodeColumn(value);
  }
  return record;
}

/**
 * Reads rows with `SELECT * FROM "<table>" WHERE <where>` on a SQLite
 * database
 */
export class SqliteRecordSource implements RecordSource {
  constructor(private readonly db: Database.Database) {}

  static open(path: string): SqliteRecordSource {
    return new SqliteRecordSource(new Database(path, { readonly: true, fileMustExist: true }));
  }

  async *readRecords(table: string, where: string): AsyncIterable<SourceRecord> {
    if (!IDENTIFIER_RE.test(table)) {
      throw new InputError('source', `Invalid table name: ${table}`, 'table');
    }

    const quoted = table
      .split('.')
      .map((part) => `"${part}"`)
      .join('.');
    const condition = where.trim() || '1 = 1';
    const statement = this.db.prepare(`SELECT * FROM ${quoted} WHERE ${condition}`);

    for (const row of statement.iterate()) {
      if (isPlainObject(row)) {
        yield toSourceRecord(row);
      }
    }
  }

  close(): void {
    this.db.close();
  }
}
