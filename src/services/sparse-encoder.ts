/**
 * Sparse Encoder
 *
 * Builds BM25-weighted sparse vectors over a fixed, hashed term-bucket space.
 * Terms are hashed with FNV-1a into `bucketCount` buckets; colliding terms
 * share a bucket and their scores add up.
 *
 * Documents are scored with BM25 against statistics of the whole batch.
 * Queries are scored with raw term frequency only: corpus statistics are not
 * available at query time.
 */

import { DEFAULT_BM25_B, DEFAULT_BM25_K1 } from '../constants/pipeline-constants.js';
import { InputError } from '../lib/errors.js';
import { Result, ok, err } from '../lib/result-types.js';
import type { TermBucketVector } from '../models/index-entry.js';
import { tokenize } from './tokenizer.js';

export type { TermBucketVector };

/**
 * BM25 parameters
 */
export interface Bm25Params {
  /** Term-frequency saturation */
  k1: number;
  /** Length normalization (0 = none, 1 = full) */
  b: number;
}

/**
 * Statistics of a batch of documents, computed once before any document is
 * scored
 */
export interface CorpusStats {
  readonly documentCount: number;
  readonly averageDocumentLength: number;
  /** Number of documents containing each term at least once */
  readonly documentFrequency: ReadonlyMap<string, number>;
}

/**
 * FNV-1a hash constants (32-bit)
 */
const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

/**
 * FNV-1a hash function
 * @param str String to hash
 * @returns 32-bit hash value
 */
export function fnv1aHash(str: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  // Return unsigned 32-bit integer
  return hash >>> 0;
}

export function bucketOf(term: string, bucketCount: number): number {
  return fnv1aHash(term) % bucketCount;
}

function validateBucketCount(bucketCount: number): Result<number, InputError> {
  if (!Number.isInteger(bucketCount) || bucketCount <= 0) {
    return err(
      new InputError('encode', `bucketCount must be a positive integer, got ${bucketCount}`, 'bucketCount')
    );
  }
  return ok(bucketCount);
}

function termFrequencies(tokens: readonly string[]): Map<string, number> {
  const tf = new Map<string, number>();
  for (const token of tokens) {
    tf.set(token, (tf.get(token) ?? 0) + 1);
  }
  return tf;
}

/**
 * Collapse a bucket array into its non-zero entries, in ascending bucket order
 */
function fromBuckets(buckets: Float64Array, touched: Iterable<number>): TermBucketVector {
  const dimensions = [...new Set(touched)].filter((index) => buckets[index] !== 0).sort((a, b) => a - b);
  return {
    dimensions,
    values: dimensions.map((index) => buckets[index] ?? 0),
  };
}

/**
 * Compute document frequencies and average length over a tokenized batch
 */
export function computeCorpusStats(tokenizedDocuments: ReadonlyArray<readonly string[]>): CorpusStats {
  const documentFrequency = new Map<string, number>();
  let totalLength = 0;

  for (const tokens of tokenizedDocuments) {
    totalLength += tokens.length;
    for (const term of new Set(tokens)) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const documentCount = tokenizedDocuments.length;
  const average = documentCount > 0 ? totalLength / documentCount : 1;

  return Object.freeze({
    documentCount,
    // An all-empty batch would otherwise divide by zero
    averageDocumentLength: average > 0 ? average : 1,
    documentFrequency,
  });
}

/**
 * BM25 inverse document frequency (never negative)
 */
export function bm25Idf(documentCount: number, documentFrequency: number): number {
  return Math.log((documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5) + 1);
}

/**
 * BM25 weight of one term in one document
 */
export function bm25TermScore(
  tf: number,
  idf: number,
  documentLength: number,
  averageDocumentLength: number,
  params: Bm25Params
): number {
  const { k1, b } = params;
  const norm = k1 * (1 - b + (b * documentLength) / averageDocumentLength);
  return (idf * (tf * (k1 + 1))) / (tf + norm);
}

/**
 * Score one tokenized document against corpus statistics
 *
 * `bucketCount` is assumed valid; `encodeCorpus` checks it.
 */
export function scoreDocument(
  tokens: readonly string[],
  stats: CorpusStats,
  bucketCount: number,
  params: Bm25Params
): TermBucketVector {
  if (tokens.length === 0) {
    return { dimensions: [], values: [] };
  }

  const buckets = new Float64Array(bucketCount);
  const touched: number[] = [];

  for (const [term, tf] of termFrequencies(tokens)) {
    const df = stats.documentFrequency.get(term) ?? 0;
    const idf = bm25Idf(stats.documentCount, df);
    const score = bm25TermScore(tf, idf, tokens.length, stats.averageDocumentLength, params);
    const index = bucketOf(term, bucketCount);
    buckets[index] = (buckets[index] ?? 0) + score;
    touched.push(index);
  }

  return fromBuckets(buckets, touched);
}

/**
 * Encode a batch of documents with BM25 weights
 *
 * @param documents Raw document texts
 * @param bucketCount Size of the hashed bucket space
 * @returns One vector per document, in input order
 */
export function encodeCorpus(
  documents: readonly string[],
  bucketCount: number,
  k1: number = DEFAULT_BM25_K1,
  b: number = DEFAULT_BM25_B
): Result<TermBucketVector[], InputError> {
  return validateBucketCount(bucketCount).map((count) => {
    const tokenized = documents.map(tokenize);
    const stats = computeCorpusStats(tokenized);
    return tokenized.map((tokens) => scoreDocument(tokens, stats, count, { k1, b }));
  });
}

/**
 * Encode a query with raw term frequencies (no idf, no length normalization)
 */
export function encodeQuery(text: string, bucketCount: number): Result<TermBucketVector, InputError> {
  return validateBucketCount(bucketCount).map((count) => {
    const buckets = new Float64Array(count);
    const touched: number[] = [];

    for (const [term, tf] of termFrequencies(tokenize(text))) {
      const index = bucketOf(term, count);
      buckets[index] = (buckets[index] ?? 0) + tf;
      touched.push(index);
    }

    return fromBuckets(buckets, touched);
  });
}

/**
 * Sparse encoder bound to a bucket space and BM25 parameters
 */
export class SparseEncoder {
  constructor(
    readonly bucketCount: number,
    private readonly params: Bm25Params = { k1: DEFAULT_BM25_K1, b: DEFAULT_BM25_B }
  ) {}

  encodeCorpus(documents: readonly string[]): Result<TermBucketVector[], InputError> {
    return encodeCorpus(documents, this.bucketCount, this.params.k1, this.params.b);
  }

  encodeQuery(text: string): Result<TermBucketVector, InputError> {
    return encodeQuery(text, this.bucketCount);
  }
}
