/**
 * Index entry types
 *
 * An index entry is the unit upserted into the vector search index. The
 * in-memory form uses camelCase; `SerializedIndexEntry` is the line-delimited
 * wire form shared with the vector search service.
 */

/**
 * Sparse vector over a hashed term-bucket space, as parallel arrays.
 * `dimensions[i]` is the bucket index carrying weight `values[i]`.
 */
export interface TermBucketVector {
  dimensions: number[];
  values: number[];
}

/**
 * Categorical filter clause
 */
export interface Restriction {
  namespace: string;
  allow: string[];
  deny: string[];
}

/**
 * Numeric filter clause; exactly one of the two value kinds is set
 */
export type NumericRestriction =
  | { namespace: string; valueInt: number }
  | { namespace: string; valueFloat: number };

export interface IndexEntry {
  id: string;
  denseVector: number[];
  sparseVector?: TermBucketVector;
  restricts: Restriction[];
  numericRestricts: NumericRestriction[];
  metadata: Record<string, unknown>;
  /** Groups neighbors so a query can cap results per tag */
  crowdingTag?: string;
}

export interface SerializedRestriction {
  namespace: string;
  allow: string[];
  deny?: string[];
}

export type SerializedNumericRestriction =
  | { namespace: string; value_int: number }
  | { namespace: string; value_float: number };

/**
 * Wire form of an index entry (one JSON object per line)
 */
export interface SerializedIndexEntry {
  id: string;
  embedding: number[];
  sparse_embedding?: TermBucketVector;
  restricts?: SerializedRestriction[];
  numeric_restricts?: SerializedNumericRestriction[];
  embedding_metadata?: Record<string, unknown>;
  crowding_tag?: string;
}

export function isIntRestriction(
  restriction: NumericRestriction
): restriction is { namespace: string; valueInt: number } {
  return 'valueInt' in restriction;
}

export function emptyTermBucketVector(): TermBucketVector {
  return { dimensions: [], values: [] };
}
