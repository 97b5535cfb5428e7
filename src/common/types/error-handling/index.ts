/**
 * Error handling type definitions and utilities
 */

export * from "./error.types";
