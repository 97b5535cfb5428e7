/**
 * Config Service
 * Exposes the environment configuration to injectable consumers
 */

import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { ENV, type EnvironmentConfig } from "./environment.constants";

export interface ConfigurationValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

@Injectable()
export class ConfigService extends BaseService {
  constructor(private readonly env: EnvironmentConfig = ENV) {
    super();
  }

  /**
   * Base URL of the historical price updates provider, if configured
   */
  getBenchmarksEndpoint(): string | undefined {
    return this.env.BENCHMARKS.ENDPOINT;
  }

  validateConfiguration(): ConfigurationValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (this.env.APPLICATION.PORT < 1 || this.env.APPLICATION.PORT > 65535) {
      errors.push(`Invalid port: ${this.env.APPLICATION.PORT}`);
    }

    if (this.env.APPLICATION.BASE_PATH && !this.env.APPLICATION.BASE_PATH.startsWith("/")) {
      errors.push(`Base path must start with "/": ${this.env.APPLICATION.BASE_PATH}`);
    }

    if (!this.env.BENCHMARKS.ENDPOINT) {
      warnings.push("BENCHMARKS_ENDPOINT is not set; historical price updates are unavailable");
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings,
    };
  }
}
