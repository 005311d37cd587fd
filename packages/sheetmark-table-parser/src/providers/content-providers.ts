/**
 * Providers that read the loaded cell grid: images, styles, rich text
 * and formulas.
 */

import { Sheet, TabularDocument, toA1 } from '../models/document.model';
import { DEFAULT_HIGHLIGHT_RANGE, HighlightRange, isHighlightColor } from '../utils/color';
import { analyzeFormula } from './formula-analyzer';
import { FeatureProvider, FormulaCategory, FormulaInfo, ImageInfo } from './types';

/** Per-category cap on formula samples kept in metadata */
export const FORMULA_SAMPLE_LIMIT = 100;

export function address(sheet: Sheet, row: number, col: number): string {
  return `${sheet.name}!${toA1(row, col)}`;
}

export const imageProvider: FeatureProvider = {
  name: 'images',
  scope: 'sheet',
  extract(document: TabularDocument) {
    const images: ImageInfo[] = document.sheets.flatMap((sheet) =>
      sheet.images.map((image) => ({
        sheet: sheet.name,
        index: image.index,
        extension: image.extension,
        anchor: image.anchor ? address(sheet, image.anchor.row, image.anchor.col) : undefined,
      }))
    );
    return { counts: { imageCount: images.length }, details: { images } };
  },
};

/**
 * Cells with a fill or font colour count as styled. Fills inside the
 * highlight hue range are also listed by address.
 */
export function createStyleProvider(range: HighlightRange = DEFAULT_HIGHLIGHT_RANGE): FeatureProvider {
  return {
    name: 'styles',
    scope: 'sheet',
    extract(document) {
      let styledCellCount = 0;
      const highlightedCells: string[] = [];

      for (const sheet of document.sheets) {
        for (const [key, style] of sheet.styles) {
          if (!style.backgroundColor && !style.fontColor) continue;
          styledCellCount++;
          if (isHighlightColor(style.backgroundColor, range)) {
            const [row, col] = key.split(':').map(Number);
            highlightedCells.push(address(sheet, row, col));
          }
        }
      }

      return { counts: { styledCellCount }, details: { highlightedCells } };
    },
  };
}

export const richTextProvider: FeatureProvider = {
  name: 'richText',
  scope: 'sheet',
  extract(document) {
    let richTextRunCount = 0;
    for (const sheet of document.sheets) {
      for (const row of sheet.cells) {
        for (const cell of row) {
          richTextRunCount += cell.richText?.filter((run) => run.script !== 'normal').length ?? 0;
        }
      }
    }
    return { counts: { richTextRunCount } };
  },
};

export const formulaProvider: FeatureProvider = {
  name: 'formulas',
  scope: 'sheet',
  extract(document) {
    let formulaCount = 0;
    let hyperlinkCount = 0;
    const byCategory: Record<FormulaCategory, number> = {
      aggregate: 0,
      percentage: 0,
      logical: 0,
      lookup: 0,
      arithmetic: 0,
      other: 0,
    };
    const samples: FormulaInfo[] = [];

    for (const sheet of document.sheets) {
      sheet.cells.forEach((row, r) => {
        row.forEach((cell, c) => {
          const value = cell.value;
          if (value.kind === 'hyperlink') {
            hyperlinkCount++;
            return;
          }
          if (value.kind !== 'formula') return;

          formulaCount++;
          const analysis = analyzeFormula(value.formula);
          byCategory[analysis.category]++;
          if (byCategory[analysis.category] <= FORMULA_SAMPLE_LIMIT) {
            samples.push({ address: address(sheet, r, c), formula: value.formula, ...analysis });
          }
        });
      });
    }

    return {
      counts: { formulaCount, hyperlinkCount },
      details: { formulas: { total: formulaCount, byCategory, samples } },
    };
  },
};
