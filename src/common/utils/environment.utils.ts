/**
 * Environment variable parsing helpers.
 * Every parser falls back to its default (with a warning) instead of failing startup.
 */

interface NumericOptions {
  min?: number;
  max?: number;
  fieldName?: string;
}

export class EnvironmentUtils {
  /**
   * Parse integer from environment variable with range validation
   */
  static parseInt(key: string, defaultValue: number, options: NumericOptions = {}): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const name = options.fieldName || key;
    if (!/^-?\d+$/.test(value.trim())) {
      console.warn(`Invalid integer value "${value}" for ${name}, using default ${defaultValue}`);
      return defaultValue;
    }

    const parsed = parseInt(value, 10);

    if (options.min !== undefined && parsed < options.min) {
      console.warn(`Value ${parsed} for ${name} is below minimum ${options.min}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      console.warn(`Value ${parsed} for ${name} is above maximum ${options.max}, using default ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }

  /**
   * Parse boolean from environment variable
   */
  static parseBoolean(key: string, defaultValue: boolean, options: { fieldName?: string } = {}): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;

    const lowerValue = value.toLowerCase();
    if (lowerValue === "true" || lowerValue === "1" || lowerValue === "yes") {
      return true;
    }
    if (lowerValue === "false" || lowerValue === "0" || lowerValue === "no") {
      return false;
    }

    console.warn(`Invalid boolean value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
    return defaultValue;
  }

  /**
   * Parse string from environment variable
   */
  static parseString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
  }

  /**
   * Parse one of a fixed set of string values
   */
  static parseChoice<T extends string>(
    key: string,
    defaultValue: T,
    allowed: readonly T[],
    options: { fieldName?: string } = {}
  ): T {
    const value = process.env[key];
    if (!value) return defaultValue;

    const match = allowed.find(candidate => candidate === value.toLowerCase());
    if (match === undefined) {
      console.warn(`Value "${value}" for ${options.fieldName || key} is not one of [${allowed.join(", ")}], using default`);
      return defaultValue;
    }
    return match;
  }

  /**
   * Parse an optional absolute http(s) URL. Returns undefined when unset or invalid.
   */
  static parseOptionalUrl(key: string, options: { fieldName?: string } = {}): string | undefined {
    const value = process.env[key]?.trim();
    if (!value) return undefined;

    try {
      const url = new URL(value);
      if (url.protocol !== "http:" && url.protocol !== "https:") {
        console.warn(`Unsupported protocol "${url.protocol}" for ${options.fieldName || key}, ignoring value`);
        return undefined;
      }
      return url.toString();
    } catch {
      console.warn(`Invalid URL "${value}" for ${options.fieldName || key}, ignoring value`);
      return undefined;
    }
  }
}
