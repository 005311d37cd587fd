import { Sheet, isEmptyCell } from '../models/document.model';

export interface VisibleBounds {
  rowCount: number;
  colCount: number;
}

/**
 * Extent of the sheet once trailing rows and columns that hold no value
 * and lie outside every merge region are dropped.
 */
export function visibleBounds(sheet: Sheet, includeEmpty: boolean): VisibleBounds {
  if (includeEmpty) {
    return { rowCount: sheet.rowCount, colCount: sheet.colCount };
  }

  let lastRow = -1;
  let lastCol = -1;
  sheet.cells.forEach((row, r) => {
    row.forEach((cell, c) => {
      if (isEmptyCell(cell)) return;
      lastRow = Math.max(lastRow, r);
      lastCol = Math.max(lastCol, c);
    });
  });
  for (const region of sheet.merges) {
    lastRow = Math.max(lastRow, Math.min(region.endRow, sheet.rowCount - 1));
    lastCol = Math.max(lastCol, Math.min(region.endCol, sheet.colCount - 1));
  }

  if (lastRow < 0 || lastCol < 0) {
    return { rowCount: 0, colCount: 0 };
  }
  return { rowCount: lastRow + 1, colCount: lastCol + 1 };
}
