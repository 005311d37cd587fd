import { Sheet, getCell } from '../models/document.model';
import { assertSheetInvariants } from '../models/merge-index';
import { cleanIllegalChars, escapeMarkdownCell, markdownCellText } from './cell-text';
import { ConversionOptions } from './options';
import { visibleBounds } from './visible-bounds';
import { logger as rootLogger } from '../utils/logger';

const logger = rootLogger.child({ component: 'markdown' });

const DEFAULT_SHEET_NAMES = new Set(['sheet', 'sheet1', 'data']);

export function isDefaultSheetName(name: string): boolean {
  return DEFAULT_SHEET_NAMES.has(name.trim().toLowerCase());
}

function tableRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

/**
 * One GitHub-style table for the sheet, or undefined when nothing is
 * visible. Merge anchors keep the value, covered cells are left blank.
 */
export function sheetToMarkdown(sheet: Sheet, options: ConversionOptions): string | undefined {
  const merges = assertSheetInvariants(sheet);
  const { rowCount, colCount } = visibleBounds(sheet, options.includeEmptyRows);
  if (rowCount === 0 || colCount === 0) {
    logger.debug('Skipping empty sheet', { sheet: sheet.name });
    return undefined;
  }

  const lines: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const cells: string[] = [];
    for (let col = 0; col < colCount; col++) {
      cells.push(merges.isCovered(row, col) ? '' : markdownCellText(getCell(sheet, row, col), options));
    }
    lines.push(tableRow(cells));
    if (row === 0) {
      lines.push(tableRow(new Array<string>(colCount).fill('---')));
    }
  }

  logger.debug('Rendered sheet', { sheet: sheet.name, rows: rowCount, cols: colCount });
  if (isDefaultSheetName(sheet.name)) {
    return lines.join('\n');
  }
  const title = options.cleanIllegalChars ? cleanIllegalChars(sheet.name) : sheet.name;
  return `## ${escapeMarkdownCell(title)}\n\n${lines.join('\n')}`;
}

export function toMarkdown(sheets: readonly Sheet[], options: ConversionOptions): string {
  const tables = sheets
    .map((sheet) => sheetToMarkdown(sheet, options))
    .filter((table): table is string => table !== undefined);
  return tables.length ? `${tables.join('\n\n')}\n` : '';
}
