/**
 * Base Error Class
 * Every error raised by sheetmark packages extends this class
 */

import { v4 as uuidv4 } from 'uuid';

export type ErrorContext = Record<string, unknown>;

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface SerializedError {
  error: string;
  message: string;
  errorId: string;
  timestamp: string;
  severity: ErrorSeverity;
  suggestion?: string;
  context?: ErrorContext;
}

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;

  readonly context?: ErrorContext;
  readonly errorId: string;
  readonly timestamp: Date;
  readonly isOperational: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    context?: ErrorContext,
    suggestion?: string,
    isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    this.errorId = uuidv4();
    this.timestamp = new Date();
    this.isOperational = isOperational;
    this.context = context;
    this.suggestion = suggestion;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      error: this.code,
      message: this.message,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      severity: this.severity,
      suggestion: this.suggestion,
      context: process.env.NODE_ENV === 'production' ? undefined : this.context
    };
  }
}
