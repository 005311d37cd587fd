/**
 * TableParser
 *
 * Thin orchestrator over the loader, the scoring engine and the
 * converters: load -> score -> choose format -> convert -> extract images.
 */

import { SerializedError, toAppError } from '@sheetmark/errors';
import { Bulkhead } from '@sheetmark/resilience';
import { loadTableParserConfig } from './config';
import { convert } from './converter';
import {
  ConversionOptions,
  DEFAULT_CONVERSION_OPTIONS,
  OutputFormat,
  resolveConversionOptions,
  validateOutputFormat,
} from './converter/options';
import { DocumentLoader, DocumentSource, describeSource } from './loader/DocumentLoader';
import { LoadMetadata, TabularDocument, getCell, plainText } from './models/document.model';
import type { FormulaSummary, ImageInfo } from './providers/types';
import { ComplexityScore, RenderFormat } from './scoring/ComplexityScore';
import { ComplexityScorer } from './scoring/ComplexityScorer';
import { deepFreeze } from './utils/freeze';
import { logger as rootLogger } from './utils/logger';
import { collectImages, writeImages } from './writers/image-writer';

const logger = rootLogger.child({ component: 'table-parser' });

export interface SheetSummary {
  name: string;
  rows: number;
  cols: number;
  merges: number;
  images: number;
}

export interface ParseMetadata {
  source: string;
  load: LoadMetadata;
  sheets: SheetSummary[];
  images?: ImageInfo[];
  imagePaths?: string[];
  formulas?: FormulaSummary;
  highlightedCells?: string[];
  shapeText?: string[];
  durationMs: number;
}

export interface ParseSuccess {
  success: true;
  outputFormat: RenderFormat;
  /** Markdown text, or HTML fragments in document order */
  content: string | readonly string[];
  complexityScore: ComplexityScore;
  metadata: ParseMetadata;
}

export interface ParseFailure {
  success: false;
  outputFormat: null;
  content: null;
  complexityScore: null;
  metadata: { source: string; durationMs: number };
  error: SerializedError;
}

export type ParseResult = ParseSuccess | ParseFailure;

export interface SheetPreview {
  name: string;
  totalRows: number;
  totalCols: number;
  /** Display values of the top-left block */
  rows: string[][];
}

export interface DocumentPreview {
  source: string;
  load: LoadMetadata;
  totalSheets: number;
  sheets: SheetPreview[];
}

export interface TableParserOptions {
  loader?: DocumentLoader;
  scorer?: ComplexityScorer;
  /** Defaults for every call; per-call options take precedence */
  conversion?: Partial<ConversionOptions>;
  batchConcurrency?: number;
}

export class TableParser {
  private readonly loader: DocumentLoader;
  private readonly scorer: ComplexityScorer;
  private readonly defaults: ConversionOptions;
  private readonly batchConcurrency: number;

  constructor(options: TableParserOptions = {}) {
    this.loader = options.loader ?? new DocumentLoader();
    this.scorer = options.scorer ?? new ComplexityScorer();
    this.defaults = resolveConversionOptions(options.conversion, DEFAULT_CONVERSION_OPTIONS);
    this.batchConcurrency = Math.max(1, Math.trunc(options.batchConcurrency ?? 4));
  }

  /**
   * Load, score and render one document. Never throws; failures come
   * back as `success: false` with the serialized error.
   */
  async parse(
    source: DocumentSource,
    outputFormat: OutputFormat = 'auto',
    options?: Partial<ConversionOptions>
  ): Promise<ParseResult> {
    const startedAt = Date.now();
    const label = describeSource(source);

    try {
      const requested = validateOutputFormat(outputFormat);
      const resolved = resolveConversionOptions(options, this.defaults);
      const document = await this.loader.load(source);
      const complexityScore = this.scorer.score(document);
      const format: RenderFormat = requested === 'auto' ? complexityScore.recommendedFormat : requested;

      const rendered = convert(document, format, resolved);
      const content = rendered.format === 'html' ? [...rendered.chunks] : rendered.content;

      const metadata = buildMetadata(label, document, complexityScore);
      if (resolved.extractImages && document.load.fidelity === 'full') {
        const written = await writeImages(collectImages(document), resolved.imagesDir);
        metadata.imagePaths = written.paths;
      }
      metadata.durationMs = Date.now() - startedAt;

      logger.info('Parsed document', {
        source: label,
        outputFormat: format,
        level: complexityScore.level,
        durationMs: metadata.durationMs,
      });

      return deepFreeze<ParseSuccess>({
        success: true,
        outputFormat: format,
        content,
        complexityScore,
        metadata: structuredClone(metadata),
      });
    } catch (error) {
      const appError = toAppError(error);
      logger.error('Failed to parse document', { source: label, code: appError.code, error: appError.message });
      return deepFreeze<ParseFailure>({
        success: false,
        outputFormat: null,
        content: null,
        complexityScore: null,
        metadata: { source: label, durationMs: Date.now() - startedAt },
        error: appError.toJSON(),
      });
    }
  }

  /** Score without rendering; load failures propagate as LoadError */
  async analyzeOnly(source: DocumentSource): Promise<ComplexityScore> {
    const document = await this.loader.load(source);
    return this.scorer.score(document);
  }

  async preview(source: DocumentSource, maxRows = 10, maxCols = 10): Promise<DocumentPreview> {
    const document = await this.loader.load(source);
    const rowLimit = Math.max(0, Math.trunc(maxRows));
    const colLimit = Math.max(0, Math.trunc(maxCols));

    return {
      source: describeSource(source),
      load: document.load,
      totalSheets: document.sheets.length,
      sheets: document.sheets.map((sheet) => {
        const rows: string[][] = [];
        for (let row = 0; row < Math.min(rowLimit, sheet.rowCount); row++) {
          const values: string[] = [];
          for (let col = 0; col < Math.min(colLimit, sheet.colCount); col++) {
            values.push(plainText(getCell(sheet, row, col)));
          }
          rows.push(values);
        }
        return { name: sheet.name, totalRows: sheet.rowCount, totalCols: sheet.colCount, rows };
      }),
    };
  }

  /**
   * Parse several documents with bounded concurrency. Results keep the
   * input order.
   */
  async parseBatch(
    sources: readonly DocumentSource[],
    outputFormat: OutputFormat = 'auto',
    options?: Partial<ConversionOptions>
  ): Promise<ParseResult[]> {
    const bulkhead = new Bulkhead({ maxConcurrent: this.batchConcurrency, maxQueue: sources.length });
    const results = await Promise.all(
      sources.map((source) => bulkhead.execute(() => this.parse(source, outputFormat, options)))
    );

    const failed = results.filter((result) => !result.success).length;
    logger.info('Parsed batch', { documents: results.length, failed });
    return results;
  }
}

function buildMetadata(source: string, document: TabularDocument, score: ComplexityScore): ParseMetadata {
  const { details } = score;
  const metadata: ParseMetadata = {
    source,
    load: document.load,
    sheets: document.sheets.map((sheet) => ({
      name: sheet.name,
      rows: sheet.rowCount,
      cols: sheet.colCount,
      merges: sheet.merges.length,
      images: sheet.images.length,
    })),
    durationMs: 0,
  };
  if (details.images) metadata.images = details.images;
  if (details.formulas) metadata.formulas = details.formulas;
  if (details.highlightedCells) metadata.highlightedCells = details.highlightedCells;
  if (details.shapeText) metadata.shapeText = details.shapeText;
  return metadata;
}

/**
 * TableParser configured from SHEETMARK_* environment variables
 */
export function createTableParserFromEnv(env: NodeJS.ProcessEnv = process.env): TableParser {
  const settings = loadTableParserConfig(env);
  return new TableParser({
    loader: new DocumentLoader({ stageTimeoutMs: settings.stageTimeoutMs }),
    conversion: {
      chunkRows: settings.chunkRows,
      preserveStyles: settings.preserveStyles,
      cleanIllegalChars: settings.cleanIllegalChars,
      includeEmptyRows: settings.includeEmptyRows,
      imagesDir: settings.imagesDir,
    },
    batchConcurrency: settings.batchConcurrency,
  });
}
