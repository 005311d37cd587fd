/**
 * Configuration Loader
 * Reads typed settings from a .env file and environment variables
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { ValidationError } from '@sheetmark/errors';
import { ConfigFieldType, ConfigOptions, ConfigSchema, ConfigValidationError, ConfigValue } from './types';
import { validateConfig } from './validators/schema-validator';

export class ConfigLoader {
  private readonly schema: ConfigSchema;
  private readonly envFilePath: string;
  private readonly loadEnvFileEnabled: boolean;
  private readonly envPrefix: string;
  private readonly throwOnValidationError: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private config: Record<string, ConfigValue | undefined> = {};
  private validationErrors: ConfigValidationError[] = [];
  private loaded = false;

  constructor(options: ConfigOptions) {
    this.schema = options.schema;
    this.envFilePath = options.envFilePath || '.env';
    this.loadEnvFileEnabled = options.loadEnvFile ?? true;
    this.envPrefix = options.envPrefix || '';
    this.throwOnValidationError = options.throwOnValidationError ?? true;
    this.env = options.env ?? process.env;
  }

  /**
   * Resolve every schema field. Subsequent calls return the cached result.
   */
  load(): Record<string, ConfigValue | undefined> {
    if (this.loaded) {
      return this.config;
    }

    // .env only populates the real process environment
    if (this.loadEnvFileEnabled && this.env === process.env) {
      dotenv.config({ path: path.resolve(process.cwd(), this.envFilePath) });
    }

    this.config = this.readEnvironment();

    const validation = validateConfig(this.config, this.schema);
    this.validationErrors = validation.errors;

    if (!validation.valid) {
      if (this.throwOnValidationError) {
        throw new ValidationError(
          `Configuration validation failed:\n${this.formatValidationErrors(validation.errors)}`,
          { fields: validation.errors.map((err) => err.field) }
        );
      }
      for (const err of validation.errors) {
        this.config[err.field] = this.schema[err.field]?.default;
      }
    }

    this.loaded = true;
    return this.config;
  }

  get(key: string): ConfigValue | undefined {
    this.assertLoaded();
    return this.config[key];
  }

  getString(key: string, fallback: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : fallback;
  }

  getNumber(key: string, fallback: number): number {
    const value = this.get(key);
    return typeof value === 'number' && !Number.isNaN(value) ? value : fallback;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : fallback;
  }

  getAll(): Record<string, ConfigValue | undefined> {
    this.assertLoaded();
    return { ...this.config };
  }

  /** Problems replaced by defaults when throwing is disabled */
  getValidationErrors(): ConfigValidationError[] {
    return [...this.validationErrors];
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new ValidationError('Configuration not loaded. Call load() first.');
    }
  }

  private readEnvironment(): Record<string, ConfigValue | undefined> {
    const result: Record<string, ConfigValue | undefined> = {};

    for (const [key, field] of Object.entries(this.schema)) {
      const envVar = field.env || this.envPrefix + toEnvName(key);
      const raw = this.env[envVar];

      if (raw === undefined || raw === '') {
        result[key] = field.default;
      } else {
        result[key] = autoTransform(raw, field.type);
      }
    }

    return result;
  }

  private formatValidationErrors(errors: ConfigValidationError[]): string {
    return errors.map((err) => `  - ${err.field}: ${err.message}`).join('\n');
  }
}

/** chunkRows -> CHUNK_ROWS */
export function toEnvName(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
}

function autoTransform(value: string, type?: ConfigFieldType): ConfigValue {
  switch (type) {
    case 'number':
      return Number(value.trim());
    case 'boolean':
      return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
    default:
      return value;
  }
}

export function createConfigLoader(options: ConfigOptions): ConfigLoader {
  return new ConfigLoader(options);
}

export function loadConfig(options: ConfigOptions): Record<string, ConfigValue | undefined> {
  return new ConfigLoader(options).load();
}
