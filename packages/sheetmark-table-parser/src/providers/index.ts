import { HighlightRange } from '../utils/color';
import { createStyleProvider, formulaProvider, imageProvider, richTextProvider } from './content-providers';
import { chartProvider, macroProvider, pivotTableProvider, shapeTextProvider } from './package-providers';
import { FeatureProviders } from './types';

export * from './types';
export { analyzeFormula } from './formula-analyzer';
export type { FormulaAnalysis } from './formula-analyzer';
export { createStyleProvider, formulaProvider, imageProvider, richTextProvider, FORMULA_SAMPLE_LIMIT } from './content-providers';
export { chartProvider, macroProvider, pivotTableProvider, shapeTextProvider } from './package-providers';

export interface DefaultProviderOptions {
  highlightRange?: HighlightRange;
}

/** The standard provider set; each call returns a fresh record */
export function defaultFeatureProviders(options: DefaultProviderOptions = {}): FeatureProviders {
  return {
    images: imageProvider,
    styles: createStyleProvider(options.highlightRange),
    richText: richTextProvider,
    formulas: formulaProvider,
    pivotTables: pivotTableProvider,
    charts: chartProvider,
    macros: macroProvider,
    shapes: shapeTextProvider,
  };
}
