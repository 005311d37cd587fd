import { FORMULA_SAMPLE_LIMIT } from '../providers/content-providers';
import type { FeatureCounts, FeatureDetails, FormulaCategory, FormulaInfo, FormulaSummary } from '../providers/types';

export interface StructureStats {
  sheetCount: number;
  mergeCount: number;
  /** Merged area over all cells, across sheets */
  mergeAreaRatio: number;
  /** Largest row span of any region */
  maxMergeDepth: number;
  /** Some region spans several rows and several columns */
  hasComplexMerge: boolean;
  /** Deepest header across sheets */
  headerLevels: number;
  maxRows: number;
  maxCols: number;
  /** rows × cols of the largest sheet */
  maxCells: number;
}

export interface FeatureVector extends StructureStats, FeatureCounts {
  /** Richness sub-score */
  contentRichness: number;
  hasAdvancedFeatures: boolean;
  hasHighContentRichness: boolean;
}

export const ZERO_COUNTS: Readonly<FeatureCounts> = Object.freeze({
  imageCount: 0,
  styledCellCount: 0,
  richTextRunCount: 0,
  formulaCount: 0,
  hyperlinkCount: 0,
  pivotTableCount: 0,
  chartCount: 0,
  macroPresent: false,
});

/** Numbers add up, flags OR together */
export function mergeCounts(into: FeatureCounts, fragment: Partial<FeatureCounts>): FeatureCounts {
  return {
    imageCount: into.imageCount + (fragment.imageCount ?? 0),
    styledCellCount: into.styledCellCount + (fragment.styledCellCount ?? 0),
    richTextRunCount: into.richTextRunCount + (fragment.richTextRunCount ?? 0),
    formulaCount: into.formulaCount + (fragment.formulaCount ?? 0),
    hyperlinkCount: into.hyperlinkCount + (fragment.hyperlinkCount ?? 0),
    pivotTableCount: into.pivotTableCount + (fragment.pivotTableCount ?? 0),
    chartCount: into.chartCount + (fragment.chartCount ?? 0),
    macroPresent: into.macroPresent || (fragment.macroPresent ?? false),
  };
}

const FORMULA_CATEGORIES: readonly FormulaCategory[] = ['aggregate', 'percentage', 'logical', 'lookup', 'arithmetic', 'other'];

/** Keeps the first FORMULA_SAMPLE_LIMIT samples of each category */
function capSamples(samples: FormulaInfo[]): FormulaInfo[] {
  const seen = new Map<FormulaCategory, number>();
  return samples.filter((sample) => {
    const count = (seen.get(sample.category) ?? 0) + 1;
    seen.set(sample.category, count);
    return count <= FORMULA_SAMPLE_LIMIT;
  });
}

function mergeFormulaSummaries(a: FormulaSummary, b: FormulaSummary): FormulaSummary {
  const byCategory = { ...a.byCategory };
  for (const category of FORMULA_CATEGORIES) {
    byCategory[category] += b.byCategory[category];
  }
  return { total: a.total + b.total, byCategory, samples: capSamples([...a.samples, ...b.samples]) };
}

/** Lists concatenate in sheet order; formula summaries add up */
export function mergeDetails(into: FeatureDetails, fragment: FeatureDetails = {}): FeatureDetails {
  const merged: FeatureDetails = { ...into };
  if (fragment.images) merged.images = [...(into.images ?? []), ...fragment.images];
  if (fragment.highlightedCells) {
    merged.highlightedCells = [...(into.highlightedCells ?? []), ...fragment.highlightedCells];
  }
  if (fragment.formulas) {
    merged.formulas = into.formulas ? mergeFormulaSummaries(into.formulas, fragment.formulas) : fragment.formulas;
  }
  if (fragment.shapeText) {
    merged.shapeText = [...new Set([...(into.shapeText ?? []), ...fragment.shapeText])];
  }
  return merged;
}
