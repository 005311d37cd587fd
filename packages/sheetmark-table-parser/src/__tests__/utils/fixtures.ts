/**
 * Test Fixtures - in-memory sheets, documents and workbook bytes
 *
 * Workbooks are produced with exceljs (xlsx) and SheetJS (legacy xls)
 * at test time; nothing is read from disk.
 */

import * as ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';
import {
  CellStyle,
  LoadMetadata,
  MergeRegion,
  PackageArchive,
  Sheet,
  TabularDocument,
  numberCell,
  textCell,
} from '../../models/document.model';
import { SheetBuilder } from '../../models/sheet-builder';

export type GridValue = string | number | null;

/**
 * Sample PNG image (1x1 pixel red PNG)
 */
export const samplePNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8DwHwAFBQIAX8jx0gAAAABJRU5ErkJggg==',
  'base64'
);

export function region(startRow: number, startCol: number, endRow: number, endCol: number): MergeRegion {
  return { startRow, startCol, endRow, endCol };
}

/**
 * Sheet from a row-major grid; null leaves the cell empty
 */
export function buildSheet(
  name: string,
  rows: GridValue[][],
  merges: MergeRegion[] = [],
  styles: Array<[number, number, CellStyle]> = []
): Sheet {
  const builder = new SheetBuilder(name);
  rows.forEach((row, r) => {
    row.forEach((value, c) => {
      if (value === null) return;
      builder.setCell(r, c, typeof value === 'number' ? numberCell(value) : textCell(value));
    });
  });
  merges.forEach((merge) => builder.addMerge(merge));
  styles.forEach(([r, c, style]) => builder.setStyle(r, c, style));
  return builder.build();
}

/**
 * Sheet with a header row and `count` numbered body rows
 */
export function tallSheet(name: string, count: number, cols = 3): Sheet {
  const header = Array.from({ length: cols }, (_, c) => `Col ${c + 1}`);
  const body = Array.from({ length: count }, (_, r) => Array.from({ length: cols }, (_, c) => r * cols + c));
  return buildSheet(name, [header, ...body]);
}

export function buildDocument(
  sheets: Sheet[],
  load: Partial<LoadMetadata> = {},
  archive?: PackageArchive
): TabularDocument {
  return {
    sheets,
    load: { engine: 'exceljs', fidelity: 'full', fileKind: 'xlsx', attempts: [], ...load },
    archive,
  };
}

/**
 * Package view over a fixed set of parts
 */
export function archiveOf(parts: Record<string, string>): PackageArchive {
  const names = Object.keys(parts);
  return {
    entries: () => [...names],
    has: (name) => names.includes(name),
    readText: (name) => parts[name],
  };
}

export async function workbookBuffer(build: (workbook: ExcelJS.Workbook) => void): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  build(workbook);
  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}

/**
 * Legacy BIFF8 (.xls) bytes; exceljs cannot open these
 */
export function xlsBuffer(rows: GridValue[][], sheetName = 'Legacy'): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'biff8' });
  return data;
}
