import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import {
  BenchmarksConfigurationError,
  BenchmarksError,
  BenchmarksTransportError,
} from "@/benchmarks/benchmarks.errors";
import { ErrorCode, ErrorSeverity, createHttpErrorResponse, type IErrorDetails } from "@/common/types/error-handling";

interface ResolvedError {
  status: number;
  details: IErrorDetails;
}

/**
 * Maps a failed benchmarks fetch to the status reported to callers
 */
export function statusForBenchmarksError(error: BenchmarksError): HttpStatus {
  if (error instanceof BenchmarksConfigurationError) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  if (error instanceof BenchmarksTransportError && error.timedOut) {
    return HttpStatus.GATEWAY_TIMEOUT;
  }
  return HttpStatus.BAD_GATEWAY;
}

function extractHttpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === "string") {
    return response;
  }
  if (typeof response === "object" && response !== null && "message" in response) {
    const { message } = response;
    if (Array.isArray(message)) {
      return message.map(String).join("; ");
    }
    if (typeof message === "string") {
      return message;
    }
  }
  return exception.message;
}

/**
 * Global exception filter rendering every failure as a standard error response
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, details } = this.resolve(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.method} ${request.url} failed with ${status}: ${details.message}`, stack);
    } else {
      this.logger.warn(`${request.method} ${request.url} rejected with ${status}: ${details.message}`);
    }

    response.status(status).json(createHttpErrorResponse(status, details, request.url, request.method));
  }

  resolve(exception: unknown): ResolvedError {
    if (exception instanceof BenchmarksError) {
      return { status: statusForBenchmarksError(exception), details: exception.toErrorDetails() };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        details: {
          code: status === HttpStatus.BAD_REQUEST ? ErrorCode.VALIDATION_ERROR : "HTTP_EXCEPTION",
          message: extractHttpExceptionMessage(exception),
          severity: status >= HttpStatus.INTERNAL_SERVER_ERROR ? ErrorSeverity.HIGH : ErrorSeverity.LOW,
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      details: {
        code: ErrorCode.UNKNOWN_ERROR,
        message: "Internal server error",
        severity: ErrorSeverity.HIGH,
      },
    };
  }
}
