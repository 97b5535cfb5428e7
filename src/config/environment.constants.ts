/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { LOG_LEVELS, type LogLevel } from "@/common/types/logging";

// Environment Helpers
export const ENV_HELPERS = {
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 3101, {
      min: 1,
      max: 65535,
      fieldName: "APP_PORT",
    }),
    BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", ""),
    ENABLE_API_DOCS: EnvironmentUtils.parseBoolean("ENABLE_API_DOCS", true),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: EnvironmentUtils.parseChoice<LogLevel>("LOG_LEVEL", "log", LOG_LEVELS),
  },

  // Historical price updates provider
  BENCHMARKS: {
    // No default: fetching fails with a configuration error until this is set
    ENDPOINT: EnvironmentUtils.parseOptionalUrl("BENCHMARKS_ENDPOINT"),
  },
};

export type EnvironmentConfig = typeof ENV;
