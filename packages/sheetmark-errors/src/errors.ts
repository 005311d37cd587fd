/**
 * Domain errors for document loading, scoring and conversion
 */

import { AppError, ErrorContext, ErrorSeverity } from './base-error';

export type LoadFailureKind = 'Unreadable' | 'CorruptFile' | 'UnsupportedFeature' | 'EncodingError';

/** One failed loader stage, kept for diagnostics */
export interface StageFailure {
  engine: string;
  kind: LoadFailureKind;
  message: string;
}

const LOAD_SUGGESTIONS: Record<LoadFailureKind, string> = {
  Unreadable: 'Check that the file exists and is a spreadsheet or CSV document',
  CorruptFile: 'Re-save the workbook from a spreadsheet application and try again',
  UnsupportedFeature: 'Save the workbook as .xlsx without protection or encryption',
  EncodingError: 'Save the file as UTF-8 text',
};

export class LoadError extends AppError {
  readonly code = 'LOAD_ERROR';
  readonly severity = ErrorSeverity.HIGH;
  readonly kind: LoadFailureKind;
  readonly attempts: StageFailure[];

  constructor(kind: LoadFailureKind, message: string, attempts: StageFailure[] = [], context?: ErrorContext) {
    super(message, { ...context, kind, attempts }, LOAD_SUGGESTIONS[kind]);
    this.kind = kind;
    this.attempts = attempts;
  }
}

/**
 * Raised inside a feature provider. The scoring engine records it and
 * treats the feature as absent.
 */
export class FeatureExtractionFault extends AppError {
  readonly code = 'FEATURE_EXTRACTION_FAULT';
  readonly severity = ErrorSeverity.LOW;
  readonly provider: string;
  readonly sheet?: string;

  constructor(provider: string, cause: unknown, sheet?: string) {
    const where = sheet === undefined ? '' : ` on sheet "${sheet}"`;
    super(
      `Feature provider "${provider}" failed${where}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { provider, sheet }
    );
    this.provider = provider;
    this.sheet = sheet;
  }
}

/** Malformed merge topology handed to a converter */
export class ConversionFault extends AppError {
  readonly code = 'CONVERSION_FAULT';
  readonly severity = ErrorSeverity.CRITICAL;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Merge regions must lie inside the sheet and must not overlap', false);
  }
}

export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = ErrorSeverity.LOW;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Check the parameters and try again');
  }
}

export class InternalError extends AppError {
  readonly code = 'INTERNAL_ERROR';
  readonly severity = ErrorSeverity.HIGH;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'An unexpected error occurred', false);
  }
}
