import {
  AppError,
  ConversionFault,
  ErrorFactory,
  ErrorSeverity,
  FeatureExtractionFault,
  InternalError,
  LoadError,
  ValidationError,
  errorMessage,
  isAppError,
  isOperationalError,
  toAppError,
} from '../index';

describe('LoadError', () => {
  it('carries the failure kind and stage attempts', () => {
    const attempts = [{ engine: 'exceljs', kind: 'CorruptFile' as const, message: 'bad zip' }];
    const error = new LoadError('Unreadable', 'nothing worked', attempts);

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('LoadError');
    expect(error.code).toBe('LOAD_ERROR');
    expect(error.kind).toBe('Unreadable');
    expect(error.attempts).toBe(attempts);
    expect(error.severity).toBe(ErrorSeverity.HIGH);
    expect(error.errorId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('serializes to JSON with its suggestion', () => {
    const json = new LoadError('EncodingError', 'cannot decode').toJSON();

    expect(json.error).toBe('LOAD_ERROR');
    expect(json.message).toBe('cannot decode');
    expect(json.suggestion).toBe('Save the file as UTF-8 text');
    expect(json.context).toEqual({ kind: 'EncodingError', attempts: [] });
  });
});

describe('ErrorFactory', () => {
  it('joins stage messages into the unreadable message', () => {
    const error = ErrorFactory.unreadable('book.xlsx', [
      { engine: 'exceljs', kind: 'CorruptFile', message: 'bad zip' },
      { engine: 'sheetjs', kind: 'UnsupportedFeature', message: 'encrypted' },
    ]);

    expect(error.message).toBe('Unable to load book.xlsx (exceljs: bad zip; sheetjs: encrypted)');
    expect(error.kind).toBe('Unreadable');
    expect(error.attempts).toHaveLength(2);
  });

  it('builds feature faults from any thrown value', () => {
    const fault = ErrorFactory.featureFault('styles', 'odd font');

    expect(fault).toBeInstanceOf(FeatureExtractionFault);
    expect(fault.provider).toBe('styles');
    expect(fault.message).toBe('Feature provider "styles" failed: odd font');
  });

  it('names the sheet a feature fault came from', () => {
    const fault = ErrorFactory.featureFault('formulas', new Error('bad token'), 'Q3');

    expect(fault.sheet).toBe('Q3');
    expect(fault.message).toBe('Feature provider "formulas" failed on sheet "Q3": bad token');
    expect(fault.context).toEqual({ provider: 'formulas', sheet: 'Q3' });
  });

  it('marks conversion faults as non-operational', () => {
    const fault = ErrorFactory.conversion('overlap');

    expect(fault).toBeInstanceOf(ConversionFault);
    expect(isOperationalError(fault)).toBe(false);
    expect(isOperationalError(ErrorFactory.validation('bad'))).toBe(true);
  });
});

describe('toAppError', () => {
  it('returns AppErrors unchanged', () => {
    const error = new ValidationError('bad');
    expect(toAppError(error)).toBe(error);
  });

  it('infers validation errors from the message', () => {
    expect(toAppError(new Error('Invalid option'))).toBeInstanceOf(ValidationError);
  });

  it('wraps other values as internal errors', () => {
    const wrapped = toAppError(42);

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.context).toEqual({ error: '42' });
    expect(isAppError(wrapped)).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
  });

  it('extracts messages from unknown values', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage('y')).toBe('y');
  });
});
