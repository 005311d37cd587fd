/**
 * Schema Validator
 * Checks loaded values against their field definitions
 */

import { ConfigFieldType, ConfigSchema, ConfigValidationError, ConfigValidationResult, ConfigValue } from '../types';

export function validateConfig(
  config: Record<string, ConfigValue | undefined>,
  schema: ConfigSchema
): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  for (const [key, field] of Object.entries(schema)) {
    const value = config[key];

    if (value === undefined || value === '') {
      if (field.required) {
        errors.push({ field: key, message: 'Required field is missing', value });
      }
      continue;
    }

    if (field.type) {
      const typeError = validateType(key, value, field.type);
      if (typeError) {
        errors.push(typeError);
        continue;
      }
    }

    if (field.validate) {
      const result = field.validate(value);
      if (result !== true) {
        errors.push({
          field: key,
          message: typeof result === 'string' ? result : 'Validation failed',
          value,
        });
      }
    }
  }

  return { valid: errors.length === 0, errors };
}

function validateType(field: string, value: ConfigValue, type: ConfigFieldType): ConfigValidationError | null {
  switch (type) {
    case 'string':
      return typeof value === 'string' ? null : { field, message: 'Must be a string', value };
    case 'number':
      return typeof value === 'number' && !Number.isNaN(value) ? null : { field, message: 'Must be a number', value };
    case 'boolean':
      return typeof value === 'boolean' ? null : { field, message: 'Must be a boolean', value };
  }
}
