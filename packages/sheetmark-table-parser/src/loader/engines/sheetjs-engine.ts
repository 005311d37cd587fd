import * as XLSX from 'xlsx';
import { Cell, Sheet, emptyCell, numberCell, textCell } from '../../models/document.model';
import { SheetBuilder } from '../../models/sheet-builder';
import { formatDate } from '../../utils/buffers';

export type RowValue = string | number | boolean | Date | null | undefined;

/**
 * Tabular fallback: cell values only. Merge regions are not carried over,
 * so every coordinate is an independent cell.
 */
export async function readWithSheetJs(bytes: Buffer): Promise<Sheet[]> {
  const workbook = XLSX.read(bytes, { type: 'buffer', cellDates: true });
  return readWorkbookRows(workbook);
}

export function readWorkbookRows(workbook: XLSX.WorkBook, coerce: (value: RowValue) => Cell = toCell): Sheet[] {
  if (workbook.SheetNames.length === 0) {
    throw new Error('Workbook contains no worksheets');
  }

  return workbook.SheetNames.map((name) => {
    const worksheet = workbook.Sheets[name];
    const builder = new SheetBuilder(name);
    if (!worksheet || !worksheet['!ref']) {
      return builder.build();
    }

    // sheet_to_json starts at the used range, which need not be A1
    const origin = XLSX.utils.decode_range(worksheet['!ref']).s;
    const rows = XLSX.utils.sheet_to_json<RowValue[]>(worksheet, {
      header: 1,
      raw: true,
      defval: null,
      blankrows: true,
    });

    rows.forEach((row, r) => {
      row.forEach((value, c) => {
        builder.setCell(origin.r + r, origin.c + c, coerce(value));
      });
    });

    return builder.build();
  });
}

export function toCell(value: RowValue): Cell {
  if (value === null || value === undefined) return emptyCell();
  if (typeof value === 'number') return numberCell(value);
  if (typeof value === 'boolean') return textCell(value ? 'TRUE' : 'FALSE');
  if (value instanceof Date) return textCell(formatDate(value));
  return textCell(value);
}
