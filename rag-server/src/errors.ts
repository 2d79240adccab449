/**
 * Error codes surfaced by the knowledge base
 */
export enum ErrorCode {
  KNOWLEDGE_STORE_CLOSED = "KNOWLEDGE_STORE_CLOSED",
  KNOWLEDGE_STORE_CORRUPT = "KNOWLEDGE_STORE_CORRUPT",
  SOURCE_ALREADY_INDEXED = "SOURCE_ALREADY_INDEXED",
  EMPTY_DOCUMENT = "EMPTY_DOCUMENT",
  UNSUPPORTED_DOCUMENT = "UNSUPPORTED_DOCUMENT",
  INGESTION_FAILED = "INGESTION_FAILED",
  QUERY_FAILED = "QUERY_FAILED",
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
}

export class KnowledgeBaseError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "KnowledgeBaseError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export const isKnowledgeBaseError = (
  error: unknown,
  code?: ErrorCode
): error is KnowledgeBaseError =>
  error instanceof KnowledgeBaseError &&
  (code === undefined || error.code === code);
