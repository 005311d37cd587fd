/**
 * Type definitions for @sheetmark/logger
 */

import type winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LoggerConfig {
  /** Component or package name stamped on every entry */
  service: string;

  /** Minimum level (default: 'info') */
  level?: LogLevel;

  /** Console transport (default: true) */
  enableConsole?: boolean;

  /** Plain file transport (default: false) */
  enableFile?: boolean;

  /** File path for the file transports (default: 'logs/{service}.log') */
  filePath?: string;

  /** Daily rotating file transport (default: false) */
  enableDailyRotate?: boolean;

  /** Retention for rotated files (default: '14d') */
  maxFiles?: string;

  /** Size limit per rotated file (default: '20m') */
  maxSize?: string;

  /** Output format (default: 'json' in production, 'pretty' elsewhere) */
  format?: LogFormat;

  /** Drop every entry; used by tests and embedding hosts */
  silent?: boolean;

  /** Extra fields merged into every entry */
  metadata?: LogMetadata;

  /** Default: process.env.NODE_ENV */
  environment?: string;

  /** Default: process.env.SHEETMARK_VERSION */
  version?: string;
}

export interface LogMetadata {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /** Logger that adds `metadata` to everything it writes */
  child(metadata: LogMetadata): Logger;

  /** Underlying winston instance */
  getWinstonLogger(): winston.Logger;
}
