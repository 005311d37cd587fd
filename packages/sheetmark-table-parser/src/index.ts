/**
 * @sheetmark/table-parser
 *
 * Spreadsheet to Markdown / HTML conversion with complexity-driven
 * format selection.
 */

export {
  TableParser,
  createTableParserFromEnv,
} from './TableParser';
export type {
  ParseResult,
  ParseSuccess,
  ParseFailure,
  ParseMetadata,
  SheetSummary,
  DocumentPreview,
  SheetPreview,
  TableParserOptions,
} from './TableParser';

export { DocumentLoader, DEFAULT_STAGES, load, describeSource } from './loader/DocumentLoader';
export type { DocumentLoaderOptions, DocumentSource, FileKindHint, LoaderStage } from './loader/DocumentLoader';
export { detectFileKind } from './loader/file-kind';

export { ComplexityScorer, recommendFormat, score } from './scoring/ComplexityScorer';
export { ComplexityScore, classifyLevel } from './scoring/ComplexityScore';
export type { ComplexityLevel, OverrideReason, RenderFormat } from './scoring/ComplexityScore';
export { DEFAULT_SCORING_CONFIG, resolveScoringConfig } from './scoring/scoring-config';
export type { ScoringConfig } from './scoring/scoring-config';
export { BASE_PROFILE, ADVANCED_PROFILE, WEIGHT_PROFILES, combineScores, selectProfile, weightSum } from './scoring/weight-profiles';
export type { Dimension, ScoreBreakdown, WeightProfile, WeightProfileId } from './scoring/weight-profiles';
export type { FeatureVector } from './scoring/feature-vector';

export * from './providers';
export * from './converter';

export { collectImages, writeImages, imageFileName } from './writers/image-writer';
export type { ImageEntry, ImageWriteResult } from './writers/image-writer';

export * from './models/document.model';
export { MergeIndex, validateMergeRegions, assertSheetInvariants } from './models/merge-index';
export type { MergeRole, MergeViolation } from './models/merge-index';
export { SheetBuilder } from './models/sheet-builder';

export { DEFAULT_HIGHLIGHT_RANGE, isHighlightColor } from './utils/color';
export type { HighlightRange } from './utils/color';
export { loadTableParserConfig } from './config';
export type { TableParserConfig } from './config';
