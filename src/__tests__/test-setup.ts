/**
 * Jest Test Setup
 */

import "reflect-metadata";

process.env.NODE_ENV = "test";

// Suppress console output during tests unless TEST_LOGGING is set
if (!process.env.TEST_LOGGING) {
  const silence = (): void => undefined;
  console.error = silence;
  console.warn = silence;
  console.log = silence;
  console.debug = silence;
}
