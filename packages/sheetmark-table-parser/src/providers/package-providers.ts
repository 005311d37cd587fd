/**
 * Providers that inspect the OOXML package parts rather than the cell
 * grid. Documents without a package (CSV, legacy xls) report nothing.
 */

import { elementsByTag, partsMatching, readXmlPart, textOf } from '../loader/ooxml-archive';
import { FeatureProvider } from './types';

const PIVOT_TABLE_PART = /^xl\/pivotTables\/pivotTable\d+\.xml$/;
const CHART_PART = /^xl\/charts\/chart\d+\.xml$/;
const DRAWING_PART = /^xl\/drawings\/drawing\d+\.xml$/;
const MACRO_PART = 'xl/vbaProject.bin';

export const pivotTableProvider: FeatureProvider = {
  name: 'pivotTables',
  extract({ archive }) {
    return { counts: { pivotTableCount: archive ? partsMatching(archive, PIVOT_TABLE_PART).length : 0 } };
  },
};

export const chartProvider: FeatureProvider = {
  name: 'charts',
  extract({ archive }) {
    return { counts: { chartCount: archive ? partsMatching(archive, CHART_PART).length : 0 } };
  },
};

export const macroProvider: FeatureProvider = {
  name: 'macros',
  extract({ archive }) {
    return { counts: { macroPresent: archive?.has(MACRO_PART) ?? false } };
  },
};

/** Text typed into drawing shapes (text boxes, callouts), de-duplicated */
export const shapeTextProvider: FeatureProvider = {
  name: 'shapes',
  extract({ archive }) {
    const shapeText: string[] = [];
    if (!archive) return { counts: {}, details: { shapeText } };

    for (const part of partsMatching(archive, DRAWING_PART)) {
      const drawing = readXmlPart(archive, part);
      if (!drawing) continue;
      for (const shape of elementsByTag(drawing, 'xdr:sp')) {
        const text = elementsByTag(shape, 'a:t').map(textOf).join('').trim();
        if (text && !shapeText.includes(text)) {
          shapeText.push(text);
        }
      }
    }

    return { counts: {}, details: { shapeText } };
  },
};
