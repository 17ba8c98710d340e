/**
 * Record Projector
 *
 * Extracts embedding text, display metadata, categorical restricts and
 * numeric restricts from a source record. Every extraction is driven by the
 * configured field lists, never by the record's own shape.
 */

import type { SkippedUnit } from '../lib/errors.js';
import type { NumericRestriction, Restriction } from '../models/index-entry.js';
import type { FieldSelection } from '../models/pipeline-config.js';
import {
  isPresent,
  stringifyScalar,
  type FieldScalar,
  type FieldValue,
  type SourceRecord,
} from '../models/source-record.js';

/**
 * A record reduced to what the index needs
 */
export interface ProjectedRecord {
  id: string | null;
  text: string;
  metadata: Record<string, unknown>;
  restricts: Restriction[];
  numericRestricts: NumericRestriction[];
  skipped: SkippedUnit[];
}

type SkipHandler = (unit: SkippedUnit) => void;

const TIMESTAMP_PATTERNS: Array<{
  pattern: RegExp;
  order: 'dmy' | 'ymd';
}> = [
  // DD/MM/YYYY HH:MM
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{1,2})$/, order: 'dmy' },
  // YYYY-MM-DD HH:MM:SS
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/, order: 'ymd' },
  // YYYY-MM-DDTHH:MM:SS
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/, order: 'ymd' },
];

/**
 * Epoch seconds for UTC calendar fields, or null when a field is out of range
 */
function utcEpochSeconds(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): number | null {
  if (hour > 23 || minute > 59 || second > 59) return null;

  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(millis);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return Math.floor(millis / 1000);
}

function parseTimestampText(text: string): number | null {
  for (const { pattern, order } of TIMESTAMP_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const parts = match.slice(1).map(Number);
    const [first = 0, second = 0, third = 0, hour = 0, minute = 0, sec = 0] = parts;
    const parsed =
      order === 'dmy'
        ? utcEpochSeconds(third, second, first, hour, minute, 0)
        : utcEpochSeconds(first, second, third, hour, minute, sec);

    if (parsed !== null) return parsed;
  }
  return null;
}

/**
 * Parse a timestamp into epoch seconds
 *
 * Numbers are taken as epoch seconds and truncated. Text is tried against
 * `DD/MM/YYYY HH:MM`, `YYYY-MM-DD HH:MM:SS` and `YYYY-MM-DDTHH:MM:SS` (UTC),
 * first match wins.
 *
 * @returns Epoch seconds, or null when the value cannot be parsed
 */
export function parseTimestamp(value: FieldValue | undefined): number | null {
  if (!isPresent(value)) return null;

  if (value instanceof Date) {
    const millis = value.getTime();
    return Number.isNaN(millis) ? null : Math.floor(millis / 1000);
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string') {
    return parseTimestampText(value.trim());
  }
  return null;
}

/**
 * Concatenate the configured text fields, newline separated
 */
export function buildText(record: SourceRecord, textFields: readonly string[]): string {
  const parts: string[] = [];

  for (const field of textFields) {
    const value = record[field];
    if (!isPresent(value)) continue;
    parts.push(
      Array.isArray(value)
        ? value.filter((item): item is Exclude<FieldScalar, null> => isPresent(item)).map(stringifyScalar).join(' ')
        : stringifyScalar(value)
    );
  }

  return parts.filter((part) => part !== '').join('\n');
}

/**
 * Convert a field value into something JSON can carry
 */
function toMetadataValue(value: FieldValue): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (Array.isArray(value)) return value.map(toMetadataValue);
  return value;
}

/**
 * Copy the configured metadata fields present in the record
 *
 * A field holding null is present and kept; a missing key is omitted.
 */
export function buildMetadata(
  record: SourceRecord,
  metadataFields: readonly string[]
): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};

  for (const field of metadataFields) {
    if (!Object.prototype.hasOwnProperty.call(record, field)) continue;
    const value = record[field];
    if (value === undefined) continue;
    metadata[field] = toMetadataValue(value);
  }

  return metadata;
}

/**
 * Build categorical restricts from the configured fields
 */
export function buildRestricts(
  record: SourceRecord,
  restrictFields: readonly string[]
): Restriction[] {
  const restricts: Restriction[] = [];

  for (const field of restrictFields) {
    const value = record[field];
    if (!isPresent(value)) continue;

    const allow = Array.isArray(value)
      ? value.filter((item): item is Exclude<FieldScalar, null> => isPresent(item)).map(stringifyScalar)
      : [stringifyScalar(value)];

    if (allow.length > 0) {
      restricts.push({ namespace: field, allow, deny: [] });
    }
  }

  return restricts;
}

/**
 * Resolve a numeric field to a number, or a reason it was dropped
 */
function resolveNumeric(
  value: FieldValue,
  isTimestamp: boolean
): { value: number; floating: boolean } | { reason: string } {
  if (isTimestamp || value instanceof Date) {
    const parsed = parseTimestamp(value);
    return parsed === null ? { reason: 'unparseable timestamp' } : { value: parsed, floating: false };
  }

  if (Array.isArray(value)) {
    return { reason: 'array value' };
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return { reason: 'non-finite number' };
    return { value, floating: !Number.isInteger(value) };
  }

  const coerced = typeof value === 'string' && value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(coerced)) {
    return { reason: 'not a number' };
  }
  return { value: coerced, floating: false };
}

/**
 * Build numeric restricts from the configured fields
 *
 * Timestamp fields go through `parseTimestamp`. Non-integer numbers become
 * float restricts; everything else is truncated to an integer restrict.
 */
export function buildNumericRestricts(
  record: SourceRecord,
  numericFields: readonly string[],
  timestampFields: readonly string[],
  onSkip?: SkipHandler
): NumericRestriction[] {
  const timestamps = new Set(timestampFields);
  const restricts: NumericRestriction[] = [];

  for (const field of numericFields) {
    const raw = record[field];
    if (!isPresent(raw)) continue;

    const resolved = resolveNumeric(raw, timestamps.has(field));
    if ('reason' in resolved) {
      onSkip?.({ stage: 'project', reason: `${field}: ${resolved.reason}` });
      continue;
    }

    restricts.push(
      resolved.floating
        ? { namespace: field, valueFloat: resolved.value }
        : { namespace: field, valueInt: Math.trunc(resolved.value) }
    );
  }

  return restricts;
}

/**
 * Projects records according to a fixed field selection
 */
export class RecordProjector {
  constructor(
    private readonly selection: FieldSelection,
    private readonly idField: string = 'id'
  ) {}

  project(record: SourceRecord): ProjectedRecord {
    const skipped: SkippedUnit[] = [];
    const rawId = record[this.idField];

    return {
      id: isPresent(rawId) && !Array.isArray(rawId) ? stringifyScalar(rawId) : null,
      text: buildText(record, this.selection.textFields),
      metadata: buildMetadata(record, this.selection.metadataFields),
      restricts: buildRestricts(record, this.selection.restrictsFields),
      numericRestricts: buildNumericRestricts(
        record,
        this.selection.numericRestrictsFields,
        this.selection.timestampFields,
        (unit) => skipped.push(unit)
      ),
      skipped,
    };
  }
}
