/**
 * Logging type definitions: log levels and structured log context.
 */

export * from "./logging.types";
