import type { TabularDocument } from '../models/document.model';

export type FeatureName =
  | 'images'
  | 'styles'
  | 'richText'
  | 'formulas'
  | 'pivotTables'
  | 'charts'
  | 'macros'
  | 'shapes';

/** Raw counts a provider may contribute; absent fields count as zero */
export interface FeatureCounts {
  imageCount: number;
  styledCellCount: number;
  richTextRunCount: number;
  formulaCount: number;
  hyperlinkCount: number;
  pivotTableCount: number;
  chartCount: number;
  macroPresent: boolean;
}

export type FormulaCategory = 'aggregate' | 'percentage' | 'logical' | 'lookup' | 'arithmetic' | 'other';

export interface FormulaInfo {
  /** Sheet!A1 */
  address: string;
  formula: string;
  category: FormulaCategory;
  functions: string[];
  references: string[];
  description: string;
}

export interface FormulaSummary {
  total: number;
  byCategory: Record<FormulaCategory, number>;
  /** Capped per category */
  samples: FormulaInfo[];
}

export interface ImageInfo {
  sheet: string;
  index: number;
  extension: string;
  /** Sheet!A1 of the top-left anchor, when known */
  anchor?: string;
}

/** Auxiliary metadata passed through to the parse result */
export interface FeatureDetails {
  images?: ImageInfo[];
  highlightedCells?: string[];
  formulas?: FormulaSummary;
  shapeText?: string[];
}

export interface FeatureFragment {
  counts: Partial<FeatureCounts>;
  details?: FeatureDetails;
}

/**
 * `sheet` providers are run once per sheet against a one-sheet view of the
 * document; `document` providers (the default) see the whole package.
 */
export type ProviderScope = 'sheet' | 'document';

/**
 * A pure feature detector. Must not mutate the document; may throw, in
 * which case the engine records the fault and treats the feature as absent
 * for that sheet (or for the document, for document-scoped providers).
 */
export interface FeatureProvider {
  readonly name: FeatureName;
  readonly scope?: ProviderScope;
  extract(document: TabularDocument): FeatureFragment;
}

export type FeatureProviders = { [K in FeatureName]?: FeatureProvider };
