import { createLogger } from '@sheetmark/logger';
import { config } from '../config';

export const logger = createLogger({
  service: 'table-parser',
  level: config.logLevel,
});
