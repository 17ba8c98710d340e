/**
 * Pipeline error taxonomy
 *
 * Input errors are surfaced to the caller and never retried. Collaborator
 * failures wrap the error raised by a record source, embedder, blob store or
 * vector search service and keep it as `cause`. Dropped units are not errors:
 * they travel as `SkippedUnit` values.
 */

/**
 * Stage of a batch or query at which an error was raised
 */
export type PipelineStage =
  | 'config'
  | 'source'
  | 'embed'
  | 'encode'
  | 'project'
  | 'assemble'
  | 'write'
  | 'load'
  | 'upsert'
  | 'delete'
  | 'query'
  | 'search'
  | 'backfill';

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /** Caller supplied something malformed */
  INPUT = 'input',
  /** An external collaborator failed */
  COLLABORATOR = 'collaborator',
}

/**
 * Base error class for pipeline errors
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.stage = stage;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed configuration, empty required field, mixed-mode query,
 * non-positive bucket count
 */
export class InputError extends PipelineError {
  readonly code = 'INPUT_ERROR';
  readonly category = ErrorCategory.INPUT;
  readonly field?: string;

  constructor(stage: PipelineStage, message: string, field?: string) {
    super(stage, message);
    this.field = field;
  }
}

/**
 * Failure of an external collaborator, propagated unchanged as `cause`
 */
export class CollaboratorFailure extends PipelineError {
  readonly code = 'COLLABORATOR_FAILURE';
  readonly category = ErrorCategory.COLLABORATOR;
  readonly operation: string;

  constructor(stage: PipelineStage, operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(stage, `${operation} failed: ${detail}`, { cause });
    this.operation = operation;
  }
}

/**
 * A unit dropped from a batch (unparseable timestamp, malformed line,
 * non-object record, invalid datapoint)
 */
export interface SkippedUnit {
  stage: PipelineStage;
  reason: string;
  /** Where the unit came from, e.g. `shard.json:12` or `record 3` */
  location?: string;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wrap an arbitrary thrown value as a collaborator failure, leaving pipeline
 * errors untouched
 */
export function toCollaboratorFailure(
  stage: PipelineStage,
  operation: string
): (error: unknown) => PipelineError {
  return (error: unknown) =>
    isPipelineError(error) ? error : new CollaboratorFailure(stage, operation, error);
}
