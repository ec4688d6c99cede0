export type MemoryErrorCode =
  | "extraction_failed"
  | "embedding_failed"
  | "index_unavailable"
  | "recall_timeout"
  | "llm_unavailable";

export class MemoryError extends Error {
  constructor(
    public readonly code: MemoryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MemoryError";
  }
}

/** Upstream drafting failed; the conversation produced no memory units. */
export class ExtractionError extends MemoryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction_failed", message, options);
    this.name = "ExtractionError";
  }
}

export class EmbeddingError extends MemoryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_failed", message, options);
    this.name = "EmbeddingError";
  }
}

export type SearchModality = "dense" | "sparse";

export class IndexUnavailableError extends MemoryError {
  constructor(
    public readonly modality: SearchModality,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("index_unavailable", message, options);
    this.name = "IndexUnavailableError";
  }
}

export class RecallTimeoutError extends MemoryError {
  constructor(public readonly timeoutMs: number) {
    super("recall_timeout", `recall exceeded ${timeoutMs}ms`);
    this.name = "RecallTimeoutError";
  }
}

/** Query-time failures, distinct from a valid empty result. */
export type RetrievalError = EmbeddingError | IndexUnavailableError | RecallTimeoutError;

export function isRetrievalError(err: unknown): err is RetrievalError {
  return (
    err instanceof EmbeddingError ||
    err instanceof IndexUnavailableError ||
    err instanceof RecallTimeoutError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
