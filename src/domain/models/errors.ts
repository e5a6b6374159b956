export type DomainErrorType =
  | "validation" // Validation error (400)
  | "parse" // Parse error (400)
  | "not_found" // Resource not found (404)
  | "conflict" // Resource conflict (409)
  | "connection" // Document backend unavailable (503)
  | "closed" // Store not open (503)
  | "server"; // Server error (500)

export interface DomainError {
  type: DomainErrorType;
  message: string;
  details?: unknown;
}

export type ErrorStatusCode = 400 | 404 | 409 | 500 | 503;

export function getErrorStatusCode(error: DomainError | { type: string }): ErrorStatusCode {
  switch (error.type) {
    case "validation":
    case "parse":
      return 400;
    case "not_found":
      return 404;
    case "conflict":
      return 409;
    case "connection":
    case "closed":
      return 503;
    case "server":
    default:
      return 500;
  }
}

/**
 * Errors produced by the document store and its backends
 */
export type ValidationError = { type: "validation"; message: string; issues: string[]; field?: string };
export type ConnectionError = { type: "connection"; message: string; cause?: unknown };
export type ClosedError = { type: "closed"; message: string };

export type BackendError = ValidationError | ConnectionError;
export type StoreError = BackendError | ClosedError;

export function validationError(message: string, issues: string[] = [message]): ValidationError {
  return { type: "validation", message, issues };
}

export function connectionError(message: string, cause?: unknown): ConnectionError {
  return { type: "connection", message, cause };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Prefix the message of a store error with the operation that failed
 */
export function withContext<E extends StoreError>(error: E, context: string): E {
  return { ...error, message: `${context}: ${error.message}` };
}

export function storeErrorToDomainError(error: StoreError): DomainError {
  switch (error.type) {
    case "validation":
      return {
        type: "validation",
        message: error.message,
        details: error.field === undefined
          ? { issues: error.issues }
          : { issues: error.issues, field: error.field },
      };
    case "connection":
      return { type: "connection", message: error.message };
    case "closed":
      return { type: "closed", message: error.message };
  }
}
