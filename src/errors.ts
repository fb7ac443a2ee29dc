// src/errors.ts
// What: Error taxonomy for the memory service.
// How: Every failure the manager surfaces is a MemoryError carrying a stable code, an HTTP status for the
//      centralized Express handler, and the doc ids it concerns. Duplicates are results, not errors.

export type MemoryErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'CHUNKING_ERROR'
  | 'EXTRACTION_ERROR'
  | 'EMBEDDING_ERROR'
  | 'RETRIEVAL_UNAVAILABLE'
  | 'INDEX_OPERATION_ERROR'
  | 'INDEX_CORRUPTED'
  | 'SNAPSHOT_ERROR'
  | 'SNAPSHOT_NOT_FOUND';

export interface MemoryErrorOptions {
  docIds?: string[];
  cause?: unknown;
}

export class MemoryError extends Error {
  readonly code: MemoryErrorCode;
  readonly status: number;
  readonly docIds: string[];

  constructor(code: MemoryErrorCode, status: number, message: string, opts: MemoryErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'MemoryError';
    this.code = code;
    this.status = status;
    this.docIds = opts.docIds ?? [];
  }
}

export class ValidationError extends MemoryError {
  constructor(message: string, opts?: MemoryErrorOptions) {
    super('VALIDATION_ERROR', 400, message, opts);
    this.name = 'ValidationError';
  }
}

export class UnsupportedFileTypeError extends MemoryError {
  constructor(filename: string) {
    super('UNSUPPORTED_FILE_TYPE', 415, `Unsupported file type for ${filename}; expected PDF, TXT or DOCX`);
    this.name = 'UnsupportedFileTypeError';
  }
}

export class ChunkingError extends MemoryError {
  constructor(message: string, opts?: MemoryErrorOptions) {
    super('CHUNKING_ERROR', 422, message, opts);
    this.name = 'ChunkingError';
  }
}

export class ExtractionError extends MemoryError {
  constructor(message: string, opts?: MemoryErrorOptions) {
    super('EXTRACTION_ERROR', 422, message, opts);
    this.name = 'ExtractionError';
  }
}

export class EmbeddingError extends MemoryError {
  constructor(message: string, opts?: MemoryErrorOptions) {
    super('EMBEDDING_ERROR', 502, message, opts);
    this.name = 'EmbeddingError';
  }
}

/** Query-path embedding failure after the retry was spent. */
export class RetrievalUnavailableError extends MemoryError {
  constructor(message: string, opts?: MemoryErrorOptions) {
    super('RETRIEVAL_UNAVAILABLE', 503, message, opts);
    this.name = 'RetrievalUnavailableError';
  }
}

export class IndexOperationError extends MemoryError {
  constructor(message: string, opts?: MemoryErrorOptions) {
    super('INDEX_OPERATION_ERROR', 500, message, opts);
    this.name = 'IndexOperationError';
  }
}

export class IndexCorruptedError extends MemoryError {
  /** Set once an automatic restore has been attempted and failed. */
  readonly recovered: boolean;
  readonly snapshotId?: string;

  constructor(message: string, opts: MemoryErrorOptions & { recovered?: boolean; snapshotId?: string } = {}) {
    super('INDEX_CORRUPTED', 500, message, opts);
    this.name = 'IndexCorruptedError';
    this.recovered = opts.recovered ?? false;
    this.snapshotId = opts.snapshotId;
  }
}

export class SnapshotError extends MemoryError {
  constructor(message: string, opts?: MemoryErrorOptions) {
    super('SNAPSHOT_ERROR', 500, message, opts);
    this.name = 'SnapshotError';
  }
}

export class SnapshotNotFoundError extends MemoryError {
  constructor(ref: string) {
    super('SNAPSHOT_NOT_FOUND', 404, `Snapshot not found: ${ref}`);
    this.name = 'SnapshotNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
