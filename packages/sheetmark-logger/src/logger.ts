/**
 * Winston-backed logger factory shared by every sheetmark package
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { Logger, LoggerConfig, LogMetadata } from './types';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

/**
 * Replace an `error` field holding an Error with its message and stack,
 * so both survive JSON serialization.
 */
export function flattenErrorMetadata(metadata?: LogMetadata): LogMetadata | undefined {
  if (metadata?.error instanceof Error) {
    return {
      ...metadata,
      error: metadata.error.message,
      stack: metadata.error.stack,
    };
  }
  return metadata;
}

function buildFormat(useJson: boolean): winston.Logform.Format {
  if (useJson) {
    return combine(errors({ stack: true }), timestamp(), json());
  }

  return combine(
    errors({ stack: true }),
    colorize(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    printf(({ timestamp: time, level, message, service, component, ...meta }) => {
      const componentPart = typeof component === 'string' ? `[${component}] ` : '';
      const metaPart = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(time)} [${level}] [${String(service)}] ${componentPart}${String(message)}${metaPart}`;
    })
  );
}

function buildTransports(config: LoggerConfig): winston.transport[] {
  const {
    service,
    enableConsole = true,
    enableFile = false,
    enableDailyRotate = false,
    filePath,
    maxFiles = '14d',
    maxSize = '20m',
  } = config;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console());
  }

  if (enableFile) {
    transports.push(new winston.transports.File({
      filename: filePath || `logs/${service}.log`,
      maxsize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  if (enableDailyRotate) {
    transports.push(new DailyRotateFile({
      filename: filePath || `logs/${service}-%DATE%.log`,
      datePattern: 'YYYY-MM-DD',
      maxSize,
      maxFiles,
      zippedArchive: true,
    }));
  }

  return transports;
}

function wrap(target: winston.Logger): Logger {
  return {
    debug(message, metadata) {
      target.debug(message, metadata);
    },
    info(message, metadata) {
      target.info(message, metadata);
    },
    warn(message, metadata) {
      target.warn(message, flattenErrorMetadata(metadata));
    },
    error(message, metadata) {
      target.error(message, flattenErrorMetadata(metadata));
    },
    child(metadata) {
      return wrap(target.child(metadata));
    },
    getWinstonLogger() {
      return target;
    },
  };
}

/**
 * Create a logger with the standard sheetmark format and transports
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    service,
    level = 'info',
    format: logFormat,
    silent = false,
    metadata = {},
    environment = process.env.NODE_ENV || 'development',
    version = process.env.SHEETMARK_VERSION || '1.0.0',
  } = config;

  const useJson = logFormat === 'json' || (logFormat === undefined && environment === 'production');

  const winstonLogger = winston.createLogger({
    level,
    silent,
    format: buildFormat(useJson),
    defaultMeta: { service, environment, version, ...metadata },
    transports: buildTransports(config),
    exitOnError: false,
  });

  return wrap(winstonLogger);
}
