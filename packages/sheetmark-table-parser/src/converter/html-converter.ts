/**
 * Chunked HTML tables with merge reconstruction.
 *
 * Each sheet yields one or more `<table>` fragments. The header band is
 * repeated in every fragment so a chunk stands on its own. A merge region
 * that crosses the header band or a chunk boundary is clipped and continued
 * as an empty cell spanning the remaining rows.
 */

import { MergeRegion, Sheet, cellKey, getCell } from '../models/document.model';
import { MergeIndex, assertSheetInvariants } from '../models/merge-index';
import { cleanIllegalChars, escapeHtml, htmlCellContent } from './cell-text';
import { ConversionOptions } from './options';
import { styleAttributes } from './style-attributes';
import { VisibleBounds, visibleBounds } from './visible-bounds';
import { logger as rootLogger } from '../utils/logger';

const logger = rootLogger.child({ component: 'html' });

type CellTag = 'th' | 'td';

interface SheetLayout {
  sheet: Sheet;
  merges: MergeIndex;
  bounds: VisibleBounds;
  headerRows: number;
}

/** Tallest header band; regions reaching further continue in the body */
export const MAX_HEADER_ROWS = 5;

/**
 * Rows 0..h-1 where h grows until no region starting inside the band
 * extends below it, or until it reaches `limit`.
 */
export function headerBandHeight(
  regions: readonly MergeRegion[],
  rowCount: number,
  limit: number = MAX_HEADER_ROWS
): number {
  const ceiling = Math.min(rowCount, Math.max(1, limit));
  let height = Math.min(1, ceiling);
  let grown = true;
  while (grown) {
    grown = false;
    for (const region of regions) {
      const next = Math.min(region.endRow + 1, ceiling);
      if (region.startRow < height && next > height) {
        height = next;
        grown = true;
      }
    }
  }
  return height;
}

function openingTag(tag: CellTag, attributes: Array<[string, string]>): string {
  const rendered = attributes.map(([name, value]) => ` ${name}="${value}"`).join('');
  return `<${tag}${rendered}>`;
}

function renderRows(
  layout: SheetLayout,
  start: number,
  end: number,
  tag: CellTag,
  options: ConversionOptions
): string {
  const { sheet, merges, bounds } = layout;
  let html = '';

  for (let row = start; row < end; row++) {
    let cells = '';
    for (let col = 0; col < bounds.colCount; col++) {
      const region = merges.regionAt(row, col);
      const attributes: Array<[string, string]> = [];
      let continuation = false;

      if (region) {
        const firstRow = Math.max(region.startRow, start);
        if (row !== firstRow || col !== region.startCol) continue;

        const rowSpan = Math.min(region.endRow, end - 1) - row + 1;
        const colSpan = Math.min(region.endCol, bounds.colCount - 1) - col + 1;
        if (rowSpan > 1) attributes.push(['rowspan', String(rowSpan)]);
        if (colSpan > 1) attributes.push(['colspan', String(colSpan)]);
        continuation = row !== region.startRow;
      }

      if (continuation) {
        cells += `${openingTag(tag, attributes)}</${tag}>`;
        continue;
      }

      if (options.preserveStyles) {
        const { style, highlight } = styleAttributes(sheet.styles.get(cellKey(row, col)), options.highlightRange);
        if (style) attributes.push(['style', escapeHtml(style)]);
        if (highlight) attributes.push(['data-highlight', 'true']);
      }
      const content = htmlCellContent(getCell(sheet, row, col), options);
      cells += `${openingTag(tag, attributes)}${content}</${tag}>`;
    }
    html += `<tr>${cells}</tr>\n`;
  }

  return html;
}

function renderTable(caption: string, head: string, body: string): string {
  return (
    '<table>\n' +
    `<caption>${caption}</caption>\n` +
    `<thead>\n${head}</thead>\n` +
    `<tbody>\n${body}</tbody>\n` +
    '</table>\n'
  );
}

function* sheetFragments(layout: SheetLayout, options: ConversionOptions): Generator<string> {
  const { sheet, bounds, headerRows } = layout;
  const caption = escapeHtml(options.cleanIllegalChars ? cleanIllegalChars(sheet.name) : sheet.name);
  const head = renderRows(layout, 0, headerRows, 'th', options);

  const bodyRows = bounds.rowCount - headerRows;
  if (bodyRows <= 0) {
    yield renderTable(caption, head, '');
    return;
  }

  const chunkSize = options.chunkRows > 0 ? options.chunkRows : bodyRows;
  logger.debug('Rendering sheet', {
    sheet: sheet.name,
    headerRows,
    bodyRows,
    fragments: Math.ceil(bodyRows / chunkSize),
  });
  for (let start = headerRows; start < bounds.rowCount; start += chunkSize) {
    const end = Math.min(start + chunkSize, bounds.rowCount);
    yield renderTable(caption, head, renderRows(layout, start, end, 'td', options));
  }
}

/**
 * Lazy, restartable sequence of table fragments. Merge regions are
 * checked for every sheet before the sequence is returned.
 */
export function toHtmlChunks(sheets: readonly Sheet[], options: ConversionOptions): Iterable<string> {
  const layouts: SheetLayout[] = [];
  for (const sheet of sheets) {
    const merges = assertSheetInvariants(sheet);
    const bounds = visibleBounds(sheet, options.includeEmptyRows);
    if (bounds.rowCount === 0 || bounds.colCount === 0) continue;
    const limit = options.chunkRows > 0 ? Math.min(MAX_HEADER_ROWS, options.chunkRows) : MAX_HEADER_ROWS;
    layouts.push({ sheet, merges, bounds, headerRows: headerBandHeight(sheet.merges, bounds.rowCount, limit) });
  }

  return {
    *[Symbol.iterator]() {
      for (const layout of layouts) {
        yield* sheetFragments(layout, options);
      }
    },
  };
}
