import type { DomainError, DomainErrorType, ErrorStatusCode } from "../../../domain/models/errors.ts";
import { getErrorStatusCode } from "../../../domain/models/errors.ts";

/**
 * API error class for HTTP responses
 */
export class ApiError extends Error {
  status: ErrorStatusCode;
  details?: Record<string, unknown>;

  constructor(message: string, status: ErrorStatusCode = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.details = details;
  }
}

/**
 * Common interface for API error responses
 * @template E - Type of error details
 */
export interface ApiErrorResponse<E = Record<string, unknown>> {
  status: "error";
  message: string;
  error?: E;
}

export interface ApiSuccessResponse<D> {
  status: "success";
  data: D;
}

export function createErrorResponse<E = Record<string, unknown>>(
  message: string,
  error?: E,
): ApiErrorResponse<E> {
  return {
    status: "error",
    message,
    error,
  };
}

export function createSuccessResponse<D>(data: D): ApiSuccessResponse<D> {
  return { status: "success", data };
}

function detailsOf(error: DomainError): Record<string, unknown> {
  const details = error.details;
  if (typeof details !== "object" || details === null || Array.isArray(details)) {
    return {};
  }
  return { ...details };
}

export function domainErrorToResponse(
  error: DomainError,
): ApiErrorResponse<{ type: DomainErrorType } & Record<string, unknown>> {
  return createErrorResponse(error.message, { ...detailsOf(error), type: error.type });
}

export function domainErrorToApiError(error: DomainError): ApiError {
  return new ApiError(
    error.message,
    getErrorStatusCode(error),
    { ...detailsOf(error), type: error.type },
  );
}
