/**
 * @sheetmark/errors
 */

export { AppError, ErrorSeverity } from './base-error';
export type { ErrorContext, SerializedError } from './base-error';
export {
  LoadError,
  FeatureExtractionFault,
  ConversionFault,
  ValidationError,
  InternalError,
} from './errors';
export type { LoadFailureKind, StageFailure } from './errors';
export { ErrorFactory, isAppError, isOperationalError, errorMessage, toAppError } from './factory';
