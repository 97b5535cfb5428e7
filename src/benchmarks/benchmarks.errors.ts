import { ErrorCode, ErrorSeverity, type IErrorDetails } from "@/common/types/error-handling";
import type { BlobEncoding } from "./benchmarks.types";

/**
 * Base class for every failure of a benchmarks fetch
 */
export abstract class BenchmarksError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly severity: ErrorSeverity;
  readonly timestamp = Date.now();

  constructor(
    message: string,
    readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toErrorDetails(): IErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      module: "benchmarks",
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * The provider endpoint is missing or unusable; raised before any network activity
 */
export class BenchmarksConfigurationError extends BenchmarksError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly severity = ErrorSeverity.CRITICAL;
}

/**
 * Connection failure, timeout, cancellation or non-2xx reply
 */
export class BenchmarksTransportError extends BenchmarksError {
  readonly code: ErrorCode;
  readonly severity = ErrorSeverity.HIGH;
  readonly status: number | undefined;
  readonly timedOut: boolean;

  constructor(
    message: string,
    details: { url: string; status?: number; timedOut?: boolean; cause?: unknown }
  ) {
    super(message, { url: details.url, status: details.status, timedOut: details.timedOut ?? false }, {
      cause: details.cause,
    });
    this.status = details.status;
    this.timedOut = details.timedOut ?? false;
    this.code = this.timedOut ? ErrorCode.TIMEOUT_ERROR : ErrorCode.NETWORK_ERROR;
  }
}

/**
 * The response body does not match the provider schema
 */
export class BenchmarksSchemaError extends BenchmarksError {
  readonly code = ErrorCode.VALIDATION_SCHEMA_ERROR;
  readonly severity = ErrorSeverity.HIGH;

  constructor(
    message: string,
    readonly violations: string[] = []
  ) {
    super(message, { violations });
  }
}

/**
 * An item of a binary blob is not valid under the blob's declared encoding
 */
export class BlobDecodeError extends BenchmarksError {
  readonly code = ErrorCode.DATA_PROCESSING_ERROR;
  readonly severity = ErrorSeverity.HIGH;

  constructor(
    readonly index: number,
    readonly encoding: BlobEncoding
  ) {
    super(`Malformed ${encoding} data at binary item ${index}`, { index, encoding });
  }
}
