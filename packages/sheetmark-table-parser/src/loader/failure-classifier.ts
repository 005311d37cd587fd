import { TimeoutError } from '@sheetmark/resilience';
import { LoadError, LoadFailureKind, StageFailure, errorMessage } from '@sheetmark/errors';

const ENCODING_PATTERN = /encod|charset|decod|utf-?(8|16)|invalid character|malformed/i;
const UNSUPPORTED_PATTERN = /password|encrypt|protect|not supported|unsupported|xlsb|strict open ?xml|macro/i;

/**
 * Map a stage's thrown value onto a load-failure kind. Anything that is
 * neither an encoding nor a known unsupported-feature failure is treated
 * as a damaged file.
 */
export function classifyStageFailure(error: unknown): LoadFailureKind {
  if (error instanceof LoadError && error.kind !== 'Unreadable') {
    return error.kind;
  }
  if (error instanceof TimeoutError) {
    return 'CorruptFile';
  }

  const message = errorMessage(error);
  if (UNSUPPORTED_PATTERN.test(message)) return 'UnsupportedFeature';
  if (ENCODING_PATTERN.test(message)) return 'EncodingError';
  return 'CorruptFile';
}

export function toStageFailure(engine: string, error: unknown): StageFailure {
  return { engine, kind: classifyStageFailure(error), message: errorMessage(error) };
}
