// src/lib/errors.ts
// Error taxonomy for the extraction pipeline and the review workflow.
// Every error here is deterministic for a given input; none is retryable.

export type ErrorCode =
  | "UNSUPPORTED_TYPE"
  | "PARSE_FAILURE"
  | "EMPTY_CONTENT"
  | "INVALID_ACTION"
  | "NOT_FOUND"
  | "DUPLICATE_DOCUMENT";

export class ExtractionError extends Error {
  /** Extra context surfaced in HTTP error bodies. */
  readonly details: Record<string, unknown> = {};

  constructor(
    public readonly code: ErrorCode,
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class UnsupportedTypeError extends ExtractionError {
  constructor(public readonly declaredType: string) {
    super("UNSUPPORTED_TYPE", 415, `Unsupported file type: ${declaredType}`);
    this.name = "UnsupportedTypeError";
  }
}

export class ParseFailureError extends ExtractionError {
  constructor(
    public readonly declaredType: string,
    cause: unknown
  ) {
    super(
      "PARSE_FAILURE",
      422,
      `Failed to parse ${declaredType}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    this.name = "ParseFailureError";
    this.cause = cause;
  }
}

export class EmptyContentError extends ExtractionError {
  constructor() {
    super("EMPTY_CONTENT", 422, "No text content found in document");
    this.name = "EmptyContentError";
  }
}

export class InvalidActionError extends ExtractionError {
  constructor(public readonly action: string) {
    super("INVALID_ACTION", 400, `Invalid action: ${action}`);
    this.name = "InvalidActionError";
  }
}

export class NotFoundError extends ExtractionError {
  constructor(
    public readonly resource: "Document" | "Requirement",
    public readonly identifier: string
  ) {
    super("NOT_FOUND", 404, `${resource} ${identifier} not found`);
    this.name = "NotFoundError";
  }
}

export class DuplicateDocumentError extends ExtractionError {
  constructor(
    public readonly existingDocumentId: string,
    public readonly fileSha256: string
  ) {
    super(
      "DUPLICATE_DOCUMENT",
      409,
      "Duplicate file (same SHA256 already uploaded)."
    );
    this.name = "DuplicateDocumentError";
    this.details.existing_document_id = existingDocumentId;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
