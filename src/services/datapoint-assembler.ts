/**
 * Datapoint Assembler
 *
 * Combines an identifier, vectors, restricts and metadata into an
 * `IndexEntry`, converts entries to their line-delimited wire form, and parses
 * wire entries back. Parsing accepts historical entries that lack any of the
 * optional fields.
 */

import { z } from 'zod';
import { InputError } from '../lib/errors.js';
import { Result, ok, err } from '../lib/result-types.js';
import { isIntRestriction } from '../models/index-entry.js';
import type {
  IndexEntry,
  NumericRestriction,
  Restriction,
  SerializedIndexEntry,
  SerializedNumericRestriction,
  SerializedRestriction,
  TermBucketVector,
} from '../models/index-entry.js';

/**
 * Parts of an index entry before validation
 */
export interface AssembleInput {
  id: string | number | bigint | null | undefined;
  denseVector: readonly number[];
  sparseVector?: TermBucketVector | null;
  restricts?: readonly Restriction[];
  numericRestricts?: readonly NumericRestriction[];
  metadata?: Record<string, unknown> | null;
  crowdingTag?: string | null;
}

/**
 * Keep only the non-zero buckets of a sparse vector; null when none remain
 */
function nonZeroSparse(vector: TermBucketVector | null | undefined): TermBucketVector | null {
  if (!vector) return null;

  const dimensions: number[] = [];
  const values: number[] = [];
  vector.dimensions.forEach((dimension, i) => {
    const value = vector.values[i];
    if (value !== undefined && value !== 0) {
      dimensions.push(dimension);
      values.push(value);
    }
  });

  return dimensions.length > 0 ? { dimensions, values } : null;
}

/**
 * Assemble and validate an index entry
 *
 * The id is coerced to a string and must not be blank; the dense vector must
 * not be empty. A sparse vector without any non-zero bucket is omitted.
 */
export function assemble(input: AssembleInput): Result<IndexEntry, InputError> {
  const id = input.id === null || input.id === undefined ? '' : String(input.id);
  if (id.trim() === '') {
    return err(new InputError('assemble', 'Datapoint id must not be empty', 'id'));
  }

  if (input.denseVector.length === 0) {
    return err(new InputError('assemble', `Datapoint ${id} has an empty dense vector`, 'denseVector'));
  }
  if (input.sparseVector && input.sparseVector.dimensions.length !== input.sparseVector.values.length) {
    return err(
      new InputError('assemble', `Datapoint ${id} has mismatched sparse dimensions and values`, 'sparseVector')
    );
  }

  const entry: IndexEntry = {
    id,
    denseVector: [...input.denseVector],
    restricts: (input.restricts ?? []).map((r) => ({
      namespace: r.namespace,
      allow: [...r.allow],
      deny: [...r.deny],
    })),
    numericRestricts: (input.numericRestricts ?? []).map((r) => ({ ...r })),
    metadata: { ...(input.metadata ?? {}) },
  };

  const sparse = nonZeroSparse(input.sparseVector);
  if (sparse) {
    entry.sparseVector = sparse;
  }
  if (input.crowdingTag) {
    entry.crowdingTag = input.crowdingTag;
  }

  return ok(entry);
}

function serializeRestriction(restriction: Restriction): SerializedRestriction {
  const serialized: SerializedRestriction = {
    namespace: restriction.namespace,
    allow: restriction.allow,
  };
  if (restriction.deny.length > 0) {
    serialized.deny = restriction.deny;
  }
  return serialized;
}

function serializeNumericRestriction(restriction: NumericRestriction): SerializedNumericRestriction {
  return isIntRestriction(restriction)
    ? { namespace: restriction.namespace, value_int: restriction.valueInt }
    : { namespace: restriction.namespace, value_float: restriction.valueFloat };
}

/**
 * Convert an entry to its wire form; empty optional fields are left out
 */
export function serialize(entry: IndexEntry): SerializedIndexEntry {
  const serialized: SerializedIndexEntry = {
    id: entry.id,
    embedding: entry.denseVector,
  };

  if (entry.sparseVector && entry.sparseVector.dimensions.length > 0) {
    serialized.sparse_embedding = entry.sparseVector;
  }
  if (entry.restricts.length > 0) {
    serialized.restricts = entry.restricts.map(serializeRestriction);
  }
  if (entry.numericRestricts.length > 0) {
    serialized.numeric_restricts = entry.numericRestricts.map(serializeNumericRestriction);
  }
  if (Object.keys(entry.metadata).length > 0) {
    serialized.embedding_metadata = entry.metadata;
  }
  if (entry.crowdingTag) {
    serialized.crowding_tag = entry.crowdingTag;
  }

  return serialized;
}

// ============================================================================
// Wire decoding
// ============================================================================

const tokenList = z.array(z.union([z.string(), z.number()]).transform(String));

const RestrictionSchema = z
  .object({
    namespace: z.string().min(1),
    allow: tokenList.nullish(),
    allow_list: tokenList.nullish(),
    deny: tokenList.nullish(),
    deny_list: tokenList.nullish(),
  })
  .transform(
    (r): Restriction => ({
      namespace: r.namespace,
      allow: r.allow ?? r.allow_list ?? [],
      deny: r.deny ?? r.deny_list ?? [],
    })
  );

const NumericRestrictionSchema = z
  .object({
    namespace: z.string().min(1),
    value_int: z.number().int().nullish(),
    value_float: z.number().nullish(),
    value_double: z.number().nullish(),
  })
  .transform((r, ctx): NumericRestriction => {
    const integer = r.value_int ?? null;
    const floating = r.value_float ?? r.value_double ?? null;

    if (integer !== null && floating === null) {
      return { namespace: r.namespace, valueInt: integer };
    }
    if (floating !== null && integer === null) {
      return { namespace: r.namespace, valueFloat: floating };
    }

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `numeric restrict ${r.namespace} must set exactly one of value_int or value_float`,
    });
    return z.NEVER;
  });

const SparseSchema = z
  .object({
    dimensions: z.array(z.number().int().nonnegative()),
    values: z.array(z.number()),
  })
  .refine((v) => v.dimensions.length === v.values.length, {
    message: 'sparse_embedding dimensions and values must have the same length',
  });

const SerializedEntrySchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  embedding: z.array(z.number()),
  sparse_embedding: SparseSchema.nullish(),
  restricts: z.array(RestrictionSchema).nullish(),
  numeric_restricts: z.array(NumericRestrictionSchema).nullish(),
  embedding_metadata: z.record(z.unknown()).nullish(),
  crowding_tag: z.string().nullish(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse a wire entry back into an `IndexEntry`
 *
 * Missing restricts, numeric restricts and metadata default to empty; a
 * missing or all-zero sparse vector is left absent.
 */
export function parse(serialized: unknown): Result<IndexEntry, InputError> {
  const decoded = SerializedEntrySchema.safeParse(serialized);
  if (!decoded.success) {
    return err(new InputError('load', `Invalid index entry: ${describeIssues(decoded.error)}`));
  }

  const data = decoded.data;
  return assemble({
    id: data.id,
    denseVector: data.embedding,
    sparseVector: data.sparse_embedding,
    restricts: data.restricts ?? [],
    numericRestricts: data.numeric_restricts ?? [],
    metadata: data.embedding_metadata,
    crowdingTag: data.crowding_tag,
  }).mapErr((error) => new InputError('load', error.message, error.field));
}
