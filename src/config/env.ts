/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable, or undefined when unset or empty.
 */
export function maybeEnv(key: string): string | undefined {
  const value = process.env[key];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Parse a yes/no word: true, false, 1, 0, yes, no (case-insensitive).
 * Returns undefined for anything else.
 */
export function parseBool(value: string): boolean | undefined {
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  return undefined;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = maybeEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseBool(value);
  if (parsed === undefined) {
    throw new ConfigError(
      `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
    );
  }
  return parsed;
}
