/**
 * Resilient document loader.
 *
 * Spreadsheet inputs go through an ordered chain of reader stages, each
 * tried only when the previous one failed:
 *   1. exceljs  full object model (styles, merges, images, rich text)
 *   2. SheetJS  tabular values, merges dropped
 *   3. OOXML    raw package XML, values only
 * CSV inputs skip the chain and go straight to the tabular reader.
 * Stage failures stay internal; only exhausting the chain raises
 * LoadError{Unreadable}.
 */

import * as fs from 'fs-extra';
import { ErrorFactory, LoadError, StageFailure, errorMessage } from '@sheetmark/errors';
import { FallbackChain, FallbackExhaustedError } from '@sheetmark/resilience';
import {
  Fidelity,
  FileKind,
  LoadEngine,
  PackageArchive,
  Sheet,
  TabularDocument,
} from '../models/document.model';
import { ensureUniqueSheetNames } from '../models/sheet-builder';
import { config } from '../config';
import { logger as rootLogger } from '../utils/logger';
import { readWithExcelJs } from './engines/exceljs-engine';
import { readWithSheetJs } from './engines/sheetjs-engine';
import { readWithOoxml } from './engines/ooxml-engine';
import { readCsv } from './engines/csv-engine';
import { detectFileKind, hasZipSignature } from './file-kind';
import { toStageFailure } from './failure-classifier';
import { OoxmlArchive } from './ooxml-archive';

const logger = rootLogger.child({ component: 'loader' });

export type FileKindHint = FileKind | 'auto';

export type DocumentSource = string | Buffer;

export interface LoaderStage {
  engine: LoadEngine;
  fidelity: Fidelity;
  read: (bytes: Buffer, kind: FileKind) => Promise<Sheet[]>;
}

export const DEFAULT_STAGES: ReadonlyArray<LoaderStage> = [
  { engine: 'exceljs', fidelity: 'full', read: (bytes) => readWithExcelJs(bytes) },
  { engine: 'sheetjs', fidelity: 'degraded', read: (bytes) => readWithSheetJs(bytes) },
  { engine: 'ooxml', fidelity: 'degraded', read: (bytes) => readWithOoxml(bytes) },
];

export interface DocumentLoaderOptions {
  /** Replaces the default chain; order is preserved */
  stages?: ReadonlyArray<LoaderStage>;
  /** Per-stage limit in milliseconds; 0 disables (default: SHEETMARK_STAGE_TIMEOUT_MS) */
  stageTimeoutMs?: number;
}

export class DocumentLoader {
  private readonly stages: ReadonlyArray<LoaderStage>;
  private readonly stageTimeoutMs: number;

  constructor(options: DocumentLoaderOptions = {}) {
    this.stages = options.stages ?? DEFAULT_STAGES;
    this.stageTimeoutMs = options.stageTimeoutMs ?? config.stageTimeoutMs;
  }

  async load(source: DocumentSource, fileKind: FileKindHint = 'auto'): Promise<TabularDocument> {
    const label = describeSource(source);
    const bytes = await readSource(source);

    if (bytes.length === 0) {
      throw new LoadError('Unreadable', `Unable to load ${label}: document is empty`);
    }

    const kind = fileKind === 'auto'
      ? detectFileKind(bytes, typeof source === 'string' ? source : undefined)
      : fileKind;

    return kind === 'csv'
      ? this.loadCsv(bytes, label)
      : this.loadSpreadsheet(bytes, kind, label);
  }

  private async loadCsv(bytes: Buffer, label: string): Promise<TabularDocument> {
    try {
      const { sheets, encoding } = await readCsv(bytes);
      logger.info('Loaded CSV document', { source: label, encoding, rows: sheets[0]?.rowCount ?? 0 });
      return {
        sheets,
        load: { engine: 'sheetjs', fidelity: 'degraded', fileKind: 'csv', encoding, attempts: [] },
      };
    } catch (error) {
      throw ErrorFactory.unreadable(label, [toStageFailure('sheetjs', error)]);
    }
  }

  private async loadSpreadsheet(bytes: Buffer, kind: FileKind, label: string): Promise<TabularDocument> {
    const chain = new FallbackChain<Buffer, Sheet[]>(
      this.stages.map((stage) => ({ name: stage.engine, run: (input: Buffer) => stage.read(input, kind) })),
      {
        timeout: this.stageTimeoutMs > 0 ? this.stageTimeoutMs : undefined,
        onFailure: (attempt, next) => {
          if (next) {
            logger.warn('Loader stage failed, falling back', {
              source: label,
              engine: attempt.strategy,
              next,
              error: errorMessage(attempt.error),
            });
          }
        },
      }
    );

    try {
      const result = await chain.execute(bytes);
      const stage = this.stages[result.index];
      const attempts: StageFailure[] = result.attempts.map((a) => toStageFailure(a.strategy, a.error));

      logger.info('Loaded spreadsheet', {
        source: label,
        engine: stage.engine,
        fidelity: stage.fidelity,
        sheets: result.value.length,
      });

      return {
        sheets: ensureUniqueSheetNames(result.value),
        load: { engine: stage.engine, fidelity: stage.fidelity, fileKind: kind, attempts },
        archive: openArchive(bytes),
      };
    } catch (error) {
      if (error instanceof FallbackExhaustedError) {
        const failures = error.attempts.map((a) => toStageFailure(a.strategy, a.error));
        logger.error('All loader stages failed', { source: label, attempts: failures });
        throw ErrorFactory.unreadable(label, failures);
      }
      throw error;
    }
  }
}

async function readSource(source: DocumentSource): Promise<Buffer> {
  if (typeof source !== 'string') {
    return source;
  }
  try {
    return await fs.readFile(source);
  } catch (error) {
    throw new LoadError('Unreadable', `Unable to read ${source}: ${errorMessage(error)}`, [
      { engine: 'fs', kind: 'Unreadable', message: errorMessage(error) },
    ]);
  }
}

function openArchive(bytes: Buffer): PackageArchive | undefined {
  if (!hasZipSignature(bytes)) {
    return undefined;
  }
  try {
    return OoxmlArchive.open(bytes);
  } catch (error) {
    logger.debug('Package parts unavailable', { error: errorMessage(error) });
    return undefined;
  }
}

export function describeSource(source: DocumentSource): string {
  return typeof source === 'string' ? source : `<buffer ${source.length} bytes>`;
}

let defaultLoader: DocumentLoader | undefined;

/**
 * Load with the default stage chain
 */
export function load(source: DocumentSource, fileKind: FileKindHint = 'auto'): Promise<TabularDocument> {
  if (!defaultLoader) {
    defaultLoader = new DocumentLoader();
  }
  return defaultLoader.load(source, fileKind);
}
