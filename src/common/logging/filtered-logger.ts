import { Logger } from "@nestjs/common";
import { shouldLog, type LogLevel } from "../types/logging";

/**
 * A NestJS Logger that drops messages below the configured level
 */
export class FilteredLogger extends Logger {
  constructor(
    context: string,
    private readonly currentLogLevel: LogLevel = "log"
  ) {
    super(context);
  }

  override log(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("log", this.currentLogLevel)) {
      super.log(message, ...optionalParams);
    }
  }

  override error(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("error", this.currentLogLevel)) {
      super.error(message, ...optionalParams);
    }
  }

  override warn(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("warn", this.currentLogLevel)) {
      super.warn(message, ...optionalParams);
    }
  }

  override debug(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("debug", this.currentLogLevel)) {
      super.debug(message, ...optionalParams);
    }
  }

  override verbose(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("verbose", this.currentLogLevel)) {
      super.verbose(message, ...optionalParams);
    }
  }

  override fatal(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("fatal", this.currentLogLevel)) {
      super.fatal(message, ...optionalParams);
    }
  }
}
