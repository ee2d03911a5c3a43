// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "RETRIEVAL_FAILED"
  | "EMBEDDING_FAILED"
  | "GENERATION_FAILED"
  | "INVALID_SOURCE"
  | "DOCUMENT_NOT_FOUND"
  | "REQUEST_CANCELLED"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class QueryEngineError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "QueryEngineError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** Create a retrieval error */
export function retrievalError(message: string, requestId?: string, cause?: unknown): QueryEngineError {
  return new QueryEngineError({
    code: "RETRIEVAL_FAILED",
    message,
    requestId,
    cause,
  });
}

/** Create a generation error */
export function generationError(message: string, requestId?: string, cause?: unknown): QueryEngineError {
  return new QueryEngineError({
    code: "GENERATION_FAILED",
    message,
    requestId,
    cause,
  });
}

/** Rejected source selection: not owned, or not present at all. */
export function sourceError(
  code: "INVALID_SOURCE" | "DOCUMENT_NOT_FOUND",
  message: string,
  requestId?: string,
  context?: Record<string, unknown>
): QueryEngineError {
  return new QueryEngineError({
    code,
    message,
    requestId,
    context,
  });
}

export function cancelledError(requestId?: string, cause?: unknown): QueryEngineError {
  return new QueryEngineError({
    code: "REQUEST_CANCELLED",
    message: "Request was cancelled",
    requestId,
    cause,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): QueryEngineError {
  if (err instanceof QueryEngineError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new QueryEngineError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** True for the abort errors raised by AbortSignal-aware APIs. */
export function isAbortError(err: unknown): boolean {
  if (err instanceof QueryEngineError) {
    return err.code === "REQUEST_CANCELLED";
  }
  return err instanceof Error && (err.name === "AbortError" || err.name === "APIUserAbortError");
}

/** User-friendly error messages */
export function getUserMessage(error: Pick<AppError, "code">): string {
  switch (error.code) {
    case "RETRIEVAL_FAILED":
    case "EMBEDDING_FAILED":
      return "Unable to search your documents and emails at this time. Please try again.";
    case "GENERATION_FAILED":
      return "Unable to generate a response. Please try again.";
    case "INVALID_SOURCE":
      return "Invalid source selection.";
    case "DOCUMENT_NOT_FOUND":
      return "The requested document could not be found or you don't have access to it.";
    case "REQUEST_CANCELLED":
      return "The request was cancelled.";
    case "CONFIG_ERROR":
    case "VALIDATION_ERROR":
    case "UNKNOWN_ERROR":
      return "An error occurred while processing your request. Please try again.";
  }
}
