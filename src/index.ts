/**
 * vector-pipeline library entry point
 */

export * from './lib/errors.js';
export { Logger, logger } from './lib/logger.js';
export type { LogLevel, LogEntry } from './lib/logger.js';
export type { Result } from './lib/result-types.js';
export * from './models/index-entry.js';
export * from './models/neighbor-result.js';
export * from './models/source-record.js';
export * from './models/pipeline-config.js';
export { tokenize } from './services/tokenizer.js';
export { SparseEncoder, encodeCorpus, encodeQuery } from './services/sparse-encoder.js';
export { RecordProjector, parseTimestamp } from './services/record-projector.js';
export type { ProjectedRecord } from './services/record-projector.js';
export { assemble, serialize, parse } from './services/datapoint-assembler.js';
export type { AssembleInput } from './services/datapoint-assembler.js';
export { ResultMerger, buildMetadataIndex, applyBackfill } from './services/result-merger.js';
export type { MergeReport } from './services/result-merger.js';
export * from './services/blob-store.js';
export * from './services/record-source.js';
export * from './services/dense-embedder.js';
export * from './services/vector-search-service.js';
export * from './services/configuration-service.js';
export * from './services/embedding-pipeline.js';
export * from './services/index-updates.js';
export * from './services/search-service.js';
