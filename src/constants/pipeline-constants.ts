/**
 * Default values for the embedding, sparse encoding and search stages
 *
 * @module pipeline-constants
 */

/** Default size of the hashed term-bucket space (2^18) */
export const DEFAULT_SPARSE_BUCKET_COUNT = 262144;

/** BM25 term-frequency saturation */
export const DEFAULT_BM25_K1 = 1.2;

/** BM25 length normalization */
export const DEFAULT_BM25_B = 0.75;

/** Default dense embedding dimensionality */
export const DEFAULT_EMBEDDING_DIMENSIONALITY = 768;

export const DEFAULT_EMBEDDING_MODEL = 'gemini-embedding-001';

/** Numeric restrict fields parsed as timestamps unless configured otherwise */
export const DEFAULT_TIMESTAMP_FIELDS = ['created_at', 'updated_at'] as const;

export const DEFAULT_TOP_K = 10;

/** Name of the file written by an embedding run under its output prefix */
export const EMBEDDING_OUTPUT_FILE = 'part-00000.json';

/** Working directory holding config, local index and blob store */
export const PIPELINE_DIR = '.vector-pipeline';

export const CONFIG_FILE_NAME = 'config.json';

/** Operations slower than this are logged as slow_operation */
export const DEFAULT_SLOW_THRESHOLD_MS = 2000;

/** Reciprocal Rank Fusion constant k used by hybrid queries */
export const DEFAULT_RRF_K = 60;

/** Share of the fused rank given to the dense side of a hybrid query */
export const DEFAULT_RRF_ALPHA = 0.5;
