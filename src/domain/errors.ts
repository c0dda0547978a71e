export type KnowledgeBaseErrorCode =
  | "ingest_failed"
  | "unsupported_format"
  | "corrupt_file"
  | "embedding_service"
  | "judge_service"
  | "index_corruption";

export class KnowledgeBaseError extends Error {
  constructor(
    readonly code: KnowledgeBaseErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input document. User-correctable; surfaced as-is. */
export class IngestError extends KnowledgeBaseError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: "ingest_failed" | "unsupported_format" | "corrupt_file" },
  ) {
    super(options?.code ?? "ingest_failed", message, options);
  }
}

export class UnsupportedFormatError extends IngestError {
  constructor(readonly format: string, supported: readonly string[]) {
    super(`Unsupported format: ${format || "(none)"}. Allowed: ${supported.join(", ")}`, {
      code: "unsupported_format",
    });
  }
}

export class CorruptFileError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { ...options, code: "corrupt_file" });
  }
}

export class EmbeddingServiceError extends KnowledgeBaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_service", message, options);
  }
}

export class JudgeServiceError extends KnowledgeBaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("judge_service", message, options);
  }
}

/** A persisted index failed validation. Fatal for that one document only. */
export class IndexCorruptionError extends KnowledgeBaseError {
  constructor(
    readonly documentKey: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("index_corruption", message, options);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
