import { Logger } from "@nestjs/common";
import type { Constructor, AbstractConstructor } from "../../types/services/mixins";

/**
 * Logging capabilities interface
 */
export interface LoggingCapabilities {
  logPerformance(operation: string, duration: number, threshold?: number): void;
  logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
}

/**
 * Mixin that adds a class-scoped NestJS logger and helpers around it
 */
export function WithLogging<TBase extends Constructor | AbstractConstructor>(Base: TBase) {
  return class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: Logger;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new Logger(this.constructor.name);
    }

    logPerformance(operation: string, duration: number, threshold = 1000): void {
      if (duration > threshold) {
        this.logger.warn(`Performance warning: ${operation} took ${duration}ms (threshold: ${threshold}ms)`);
      } else {
        this.logger.debug(`${operation} completed in ${duration}ms`);
      }
    }

    logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      this.logger.error(`${contextMessage}${error.message}`, error.stack, additionalData);
    }

    logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      this.logger.warn(`${contextMessage}${message}`, additionalData);
    }

    logDebug(message: string, context?: string, additionalData?: unknown): void {
      const contextMessage = context ? `[${context}] ` : "";
      this.logger.debug(`${contextMessage}${message}`, additionalData);
    }
  };
}
