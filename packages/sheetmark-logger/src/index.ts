/**
 * @sheetmark/logger
 */

export { createLogger, flattenErrorMetadata } from './logger';
export type { Logger, LoggerConfig, LogMetadata, LogLevel, LogFormat } from './types';
