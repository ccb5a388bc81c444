/**
 * Dataver error types
 *
 * Every error raised by the core carries a stable `code` so callers
 * (and the CLI) can branch without matching on message text.
 */

export type DataverErrorCode =
  | 'NOT_FOUND'
  | 'AMBIGUOUS_REFERENCE'
  | 'INVALID_REFERENCE'
  | 'HAS_CHILDREN'
  | 'DANGLING_ANCESTOR'
  | 'DUPLICATE_TAG'
  | 'VALIDATION'
  | 'LOCK_TIMEOUT'
  | 'CORRUPT_STATE'
  | 'DATA_ENGINE';

export class DataverError extends Error {
  readonly code: DataverErrorCode;

  constructor(code: DataverErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A reference, id or tag that does not resolve. */
export class NotFoundError extends DataverError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

/** A `name@prefix` reference that matches more than one version. */
export class AmbiguousReferenceError extends DataverError {
  readonly reference: string;
  readonly candidates: string[];

  constructor(reference: string, candidates: string[]) {
    super(
      'AMBIGUOUS_REFERENCE',
      `Reference "${reference}" is ambiguous: matches ${candidates.length} versions (${candidates.join(', ')})`,
    );
    this.reference = reference;
    this.candidates = candidates;
  }
}

export class InvalidReferenceError extends DataverError {
  readonly reference: string;

  constructor(reference: string, reason?: string) {
    super(
      'INVALID_REFERENCE',
      `Invalid reference "${reference}"${reason ? `: ${reason}` : ''}. Use 'name:tag', 'name@hash', or a dataset id.`,
    );
    this.reference = reference;
  }
}

export class HasChildrenError extends DataverError {
  readonly datasetId: string;
  readonly childIds: string[];

  constructor(datasetId: string, childIds: string[]) {
    super(
      'HAS_CHILDREN',
      `Dataset ${datasetId} has ${childIds.length} dependent version(s): ${childIds.join(', ')}. Use force to delete anyway.`,
    );
    this.datasetId = datasetId;
    this.childIds = childIds;
  }
}

/**
 * A parent id whose record no longer exists (force-deleted).
 * Returned per entry by lineage queries, not thrown.
 */
export class DanglingAncestorError extends DataverError {
  readonly ancestorId: string;
  readonly referencedBy: string;

  constructor(ancestorId: string, referencedBy: string) {
    super(
      'DANGLING_ANCESTOR',
      `Ancestor ${ancestorId} of ${referencedBy} no longer exists`,
    );
    this.ancestorId = ancestorId;
    this.referencedBy = referencedBy;
  }
}

export class DuplicateTagError extends DataverError {
  readonly tagName: string;
  readonly label: string;
  readonly currentDatasetId: string;

  constructor(tagName: string, label: string, currentDatasetId: string) {
    super(
      'DUPLICATE_TAG',
      `Tag ${tagName}:${label} already points to ${currentDatasetId}`,
    );
    this.tagName = tagName;
    this.label = label;
    this.currentDatasetId = currentDatasetId;
  }
}

export class ValidationError extends DataverError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class LockTimeoutError extends DataverError {
  readonly lockPath: string;

  constructor(lockPath: string, timeoutMs: number) {
    super('LOCK_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for repository lock ${lockPath}`);
    this.lockPath = lockPath;
  }
}

export class CorruptStateError extends DataverError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super('CORRUPT_STATE', `Repository state at ${path} is unreadable: ${detail}`);
    this.path = path;
  }
}

/**
 * Failure inside the external data engine. The engine's own error is kept
 * as `cause`; `dataPointer` names the handle involved, when one exists.
 */
export class DataEngineError extends DataverError {
  readonly operation: string;
  readonly dataPointer: string | undefined;

  constructor(operation: string, dataPointer: string | undefined, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      'DATA_ENGINE',
      `Data engine ${operation} failed${dataPointer ? ` for ${dataPointer}` : ''}: ${detail}`,
      { cause },
    );
    this.operation = operation;
    this.dataPointer = dataPointer;
  }
}

export function isDataverError(err: unknown): err is DataverError {
  return err instanceof DataverError;
}
