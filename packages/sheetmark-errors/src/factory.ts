/**
 * Error Factory
 * Shorthand constructors and normalisation of unknown thrown values
 */

import { AppError, ErrorContext } from './base-error';
import {
  ConversionFault,
  FeatureExtractionFault,
  InternalError,
  LoadError,
  StageFailure,
  ValidationError,
} from './errors';

export class ErrorFactory {
  static unreadable(source: string, attempts: StageFailure[]): LoadError {
    const detail = attempts.map((a) => `${a.engine}: ${a.message}`).join('; ');
    return new LoadError(
      'Unreadable',
      detail ? `Unable to load ${source} (${detail})` : `Unable to load ${source}`,
      attempts,
      { source }
    );
  }

  static featureFault(provider: string, cause: unknown, sheet?: string): FeatureExtractionFault {
    return new FeatureExtractionFault(provider, cause, sheet);
  }

  static conversion(message: string, context?: ErrorContext): ConversionFault {
    return new ConversionFault(message, context);
  }

  static validation(message: string, context?: ErrorContext): ValidationError {
    return new ValidationError(message, context);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything thrown into an AppError, keeping AppErrors as they are
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes('validation') || message.includes('invalid')) {
      return new ValidationError(error.message, { originalError: error.name });
    }
    return new InternalError(error.message, { originalError: error.name });
  }

  return new InternalError('An unexpected error occurred', { error: String(error) });
}
