import { loadTableParserConfig } from '../../config';

describe('loadTableParserConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadTableParserConfig({})).toEqual({
      logLevel: 'info',
      chunkRows: 256,
      preserveStyles: false,
      cleanIllegalChars: true,
      includeEmptyRows: false,
      imagesDir: './images',
      stageTimeoutMs: 60000,
      batchConcurrency: 4,
    });
  });

  it('reads SHEETMARK_ prefixed variables', () => {
    const config = loadTableParserConfig({
      SHEETMARK_LOG_LEVEL: 'debug',
      SHEETMARK_CHUNK_ROWS: '64',
      SHEETMARK_PRESERVE_STYLES: 'yes',
      SHEETMARK_CLEAN_ILLEGAL_CHARS: 'false',
      SHEETMARK_IMAGES_DIR: '/var/tmp/sheet-images',
      SHEETMARK_STAGE_TIMEOUT_MS: '1500',
      SHEETMARK_BATCH_CONCURRENCY: '8',
    });

    expect(config).toMatchObject({
      logLevel: 'debug',
      chunkRows: 64,
      preserveStyles: true,
      cleanIllegalChars: false,
      imagesDir: '/var/tmp/sheet-images',
      stageTimeoutMs: 1500,
      batchConcurrency: 8,
    });
  });

  it('falls back to defaults for invalid values', () => {
    const config = loadTableParserConfig({
      SHEETMARK_LOG_LEVEL: 'verbose',
      SHEETMARK_CHUNK_ROWS: 'lots',
      SHEETMARK_BATCH_CONCURRENCY: '0',
      SHEETMARK_STAGE_TIMEOUT_MS: '-5',
    });

    expect(config).toMatchObject({ logLevel: 'info', chunkRows: 256, batchConcurrency: 4, stageTimeoutMs: 60000 });
  });
});
