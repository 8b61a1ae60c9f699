export class ChunkingConfigError extends Error {
  code = 'INVALID_CHUNKING' as const;
  constructor(message: string) {
    super(message);
    this.name = 'ChunkingConfigError';
  }
}

export class ExtractionError extends Error {
  code = 'EXTRACTION_FAILED' as const;
  constructor(
    public sourcePath: string,
    cause?: unknown,
  ) {
    super(`Could not extract text from ${sourcePath}`, { cause });
    this.name = 'ExtractionError';
  }
}

export class EmbeddingTransientError extends Error {
  code = 'EMBEDDING_TRANSIENT' as const;
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'EmbeddingTransientError';
  }
}

export class EmbeddingFatalError extends Error {
  code = 'EMBEDDING_FATAL' as const;
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'EmbeddingFatalError';
  }
}

export type EmbeddingError =
  | EmbeddingTransientError
  | EmbeddingFatalError
  | CancelledError;

export class VectorStoreError extends Error {
  code = 'VECTOR_STORE_FAILED' as const;
  constructor(
    public operation: 'upsert' | 'search' | 'delete' | 'get',
    cause?: unknown,
  ) {
    super(`Vector store ${operation} failed`, { cause });
    this.name = 'VectorStoreError';
  }
}

export class VectorStoreTimeoutError extends Error {
  code = 'VECTOR_STORE_TIMEOUT' as const;
  constructor(
    public operation: 'upsert' | 'search' | 'delete' | 'get',
    public timeoutMs: number,
  ) {
    super(`Vector store ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'VectorStoreTimeoutError';
  }
}

export class ManifestError extends Error {
  code = 'MANIFEST_WRITE_FAILED' as const;
  constructor(
    public fingerprints: string[],
    cause?: unknown,
  ) {
    super(`Manifest write failed for ${fingerprints.length} entries`, {
      cause,
    });
    this.name = 'ManifestError';
  }
}

export class CancelledError extends Error {
  code = 'CANCELLED' as const;
  constructor(message = 'Indexing run cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class ValidationError extends Error {
  code = 'VALIDATION_FAILED' as const;
  constructor(public details: string[]) {
    super('VALIDATION_FAILED');
    this.name = 'ValidationError';
  }
}

export class BusyError extends Error {
  code = 'BUSY' as const;
  constructor(public owner: string | null) {
    super('An indexing run is already in progress');
    this.name = 'BusyError';
  }
}

export function errorCode(err: unknown): string {
  if (err && typeof err === 'object' && 'code' in err) {
    const code = err.code;
    if (typeof code === 'string') return code;
  }
  return 'UNKNOWN';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
