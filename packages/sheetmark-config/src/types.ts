/**
 * Type definitions for @sheetmark/config
 */

export type ConfigValue = string | number | boolean;

export type ConfigFieldType = 'string' | 'number' | 'boolean';

export interface ConfigField {
  /** Environment variable name (default: envPrefix + KEY) */
  env?: string;

  /** Used when the variable is unset, or when it fails validation and throwing is off */
  default?: ConfigValue;

  required?: boolean;

  type?: ConfigFieldType;

  /** Return true, or a message describing the problem */
  validate?: (value: ConfigValue) => boolean | string;

  description?: string;
}

export interface ConfigSchema {
  [key: string]: ConfigField;
}

export interface ConfigOptions {
  schema: ConfigSchema;

  /** Path to .env file, relative to cwd (default: .env) */
  envFilePath?: string;

  /** Load the .env file before reading variables (default: true) */
  loadEnvFile?: boolean;

  /** Prefix for derived variable names, e.g. 'SHEETMARK_' */
  envPrefix?: string;

  /** Throw on invalid values instead of falling back to defaults (default: true) */
  throwOnValidationError?: boolean;

  /** Variable source (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: ConfigValue;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
}
