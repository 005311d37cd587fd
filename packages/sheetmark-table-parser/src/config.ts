/**
 * Environment configuration for the table parser.
 * Every value can be overridden per call; these are the process defaults.
 */

import { ConfigLoader, ConfigSchema } from '@sheetmark/config';
import type { LogLevel } from '@sheetmark/logger';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const configSchema: ConfigSchema = {
  logLevel: {
    type: 'string',
    default: 'info',
    validate: (value) => LOG_LEVELS.some((level) => level === value) || 'Invalid log level',
  },
  chunkRows: { type: 'number', default: 256, description: 'Body rows per HTML fragment; 0 disables chunking' },
  preserveStyles: { type: 'boolean', default: false },
  cleanIllegalChars: { type: 'boolean', default: true },
  includeEmptyRows: { type: 'boolean', default: false },
  imagesDir: { type: 'string', default: './images' },
  stageTimeoutMs: {
    type: 'number',
    default: 60000,
    validate: (value) => (typeof value === 'number' && value >= 0) || 'Must be >= 0',
  },
  batchConcurrency: {
    type: 'number',
    default: 4,
    validate: (value) => (typeof value === 'number' && value >= 1) || 'Must be >= 1',
  },
};

export interface TableParserConfig {
  logLevel: LogLevel;
  chunkRows: number;
  preserveStyles: boolean;
  cleanIllegalChars: boolean;
  includeEmptyRows: boolean;
  imagesDir: string;
  stageTimeoutMs: number;
  batchConcurrency: number;
}

function toLogLevel(value: string): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

/**
 * Read SHEETMARK_* variables. Invalid values fall back to their defaults.
 */
export function loadTableParserConfig(env: NodeJS.ProcessEnv = process.env): TableParserConfig {
  const loader = new ConfigLoader({
    schema: configSchema,
    envPrefix: 'SHEETMARK_',
    throwOnValidationError: false,
    env,
    loadEnvFile: env === process.env,
  });
  loader.load();

  return {
    logLevel: toLogLevel(loader.getString('logLevel', 'info')),
    chunkRows: Math.trunc(loader.getNumber('chunkRows', 256)),
    preserveStyles: loader.getBoolean('preserveStyles', false),
    cleanIllegalChars: loader.getBoolean('cleanIllegalChars', true),
    includeEmptyRows: loader.getBoolean('includeEmptyRows', false),
    imagesDir: loader.getString('imagesDir', './images'),
    stageTimeoutMs: loader.getNumber('stageTimeoutMs', 60000),
    batchConcurrency: Math.trunc(loader.getNumber('batchConcurrency', 4)),
  };
}

export const config = loadTableParserConfig();
