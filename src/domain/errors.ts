/**
 * Error taxonomy shared by the pipeline and its HTTP/MCP surfaces.
 *
 * Extraction and provider failures are recorded on the Source rather than thrown
 * to callers. Configuration and state errors are programming or operator errors
 * and always propagate.
 */

export type ErrorCode =
  | "EXTRACTION_FAILED"
  | "CONFIGURATION_ERROR"
  | "PROVIDER_UNAVAILABLE"
  | "PROVIDER_ERROR"
  | "INVALID_STATE"
  | "SOURCE_BUSY"
  | "CONSISTENCY_VIOLATION"
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "CANCELLED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface SerializedError {
  code: ErrorCode;
  message: string;
  details?: ErrorDetail[] | Record<string, unknown>;
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[] | Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export class ExtractionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("EXTRACTION_FAILED", message, 422, details);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIGURATION_ERROR", message, 500, details);
  }
}

/** Rate limits, timeouts, 5xx and network failures. Safe to retry. */
export class TransientProviderError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PROVIDER_UNAVAILABLE", message, 503, details);
  }
}

/** A provider rejected the request outright (bad key, bad model, 4xx). */
export class ProviderError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PROVIDER_ERROR", message, 502, details);
  }
}

export class StateError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = "INVALID_STATE",
  ) {
    super(code, message, 409, details);
  }
}

export class SourceBusyError extends StateError {
  constructor(sourceId: string) {
    super(
      `Source ${sourceId} is already being ingested.`,
      { sourceId },
      "SOURCE_BUSY",
    );
  }
}

export class ConsistencyViolation extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONSISTENCY_VIOLATION", message, 500, details);
  }
}

export class SourceNotFoundError extends AppError {
  constructor(sourceId: string) {
    super("NOT_FOUND", `Source ${sourceId} not found.`, 404, { sourceId });
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details);
  }

  static fromZodError(error: {
    issues: Array<{ path: (string | number)[]; message: string }>;
  }): ValidationError {
    const details = error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    return new ValidationError("Validation failed", details);
  }
}

export class QueryCancelledError extends AppError {
  constructor(message = "Query was cancelled.") {
    super("CANCELLED", message, 499);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}

export function toSerializedError(error: unknown): {
  statusCode: number;
  body: SerializedError;
} {
  if (error instanceof AppError) {
    return { statusCode: error.statusCode, body: error.toJSON() };
  }
  return {
    statusCode: 500,
    body: { code: "INTERNAL_ERROR", message: errorMessage(error) },
  };
}
