/**
 * Defines the severity levels for errors, allowing for prioritized handling.
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

/**
 * Common error codes used across the application
 */
export enum ErrorCode {
  // Generic errors
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",

  // Data errors
  DATA_PROCESSING_ERROR = "DATA_PROCESSING_ERROR",

  // Network/IO errors
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT_ERROR = "TIMEOUT_ERROR",

  // Validation specific
  VALIDATION_SCHEMA_ERROR = "VALIDATION_SCHEMA_ERROR",
}

/**
 * Base interface for all error details.
 */
export interface IErrorDetails {
  /**
   * Machine-readable error code
   */
  code: string | ErrorCode;

  /**
   * Human-readable error message
   */
  message: string;

  severity: ErrorSeverity;

  /**
   * Module name where the error originated
   */
  module?: string;

  timestamp?: number;

  /**
   * Additional context about the error
   */
  context?: Record<string, unknown>;
}

/**
 * Standardized error response for APIs.
 */
export interface StandardErrorResponse {
  success: false;
  error: IErrorDetails;
  timestamp: number;
  requestId?: string;
}

/**
 * Extended error response for HTTP-specific errors.
 */
export interface HttpErrorResponse extends StandardErrorResponse {
  statusCode: number;
  path: string;
  method: string;
}

/**
 * Creates a standardized error response
 */
export function createErrorResponse(error: IErrorDetails | Error, requestId?: string): StandardErrorResponse {
  const errorDetails: IErrorDetails =
    error instanceof Error
      ? {
          code: ErrorCode.UNKNOWN_ERROR,
          message: error.message,
          severity: ErrorSeverity.HIGH,
        }
      : error;

  return {
    success: false,
    error: {
      ...errorDetails,
      timestamp: errorDetails.timestamp || Date.now(),
    },
    timestamp: Date.now(),
    requestId,
  };
}

/**
 * Creates an HTTP error response
 */
export function createHttpErrorResponse(
  statusCode: number,
  error: IErrorDetails | Error,
  path = "/",
  method = "GET",
  requestId?: string
): HttpErrorResponse {
  return {
    ...createErrorResponse(error, requestId),
    statusCode,
    path,
    method,
  };
}
