/**
 * @sheetmark/config
 */

export { ConfigLoader, createConfigLoader, loadConfig, toEnvName } from './config-loader';
export { validateConfig } from './validators/schema-validator';
export type {
  ConfigSchema,
  ConfigField,
  ConfigFieldType,
  ConfigOptions,
  ConfigValue,
  ConfigValidationError,
  ConfigValidationResult,
} from './types';
