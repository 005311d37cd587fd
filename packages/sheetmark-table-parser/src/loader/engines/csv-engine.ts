import * as XLSX from 'xlsx';
import { analyse } from 'chardet';
import * as iconv from 'iconv-lite';
import { LoadError } from '@sheetmark/errors';
import { Cell, Sheet, numberCell, textCell, emptyCell } from '../../models/document.model';
import { SheetBuilder } from '../../models/sheet-builder';
import { RowValue, readWorkbookRows } from './sheetjs-engine';

export const CSV_SHEET_NAME = 'Data';

export interface DecodedText {
  text: string;
  encoding: string;
}

const BOMS: Array<{ bytes: number[]; encoding: string }> = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: 'UTF-8' },
  { bytes: [0xff, 0xfe], encoding: 'UTF-16LE' },
  { bytes: [0xfe, 0xff], encoding: 'UTF-16BE' },
];

/**
 * Pick an encoding from the byte-order mark, else from chardet's
 * candidates, else UTF-8; then decode with iconv-lite.
 */
export function decodeText(bytes: Buffer): DecodedText {
  const bom = BOMS.find(({ bytes: mark }) => mark.every((b, i) => bytes[i] === b));
  let encoding = bom?.encoding;

  if (!encoding) {
    const candidates = bytes.length > 0 ? analyse(bytes) : [];
    encoding = candidates.find((match) => iconv.encodingExists(match.name))?.name ?? 'UTF-8';
  }

  try {
    return { text: iconv.decode(bytes, encoding), encoding };
  } catch (error) {
    throw new LoadError('EncodingError', `Cannot decode text as ${encoding}`, [], {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/** "42" -> 42, but "007", "1e3" and " 5" stay text */
export function coerceCsvValue(value: RowValue): Cell {
  if (value === null || value === undefined || value === '') return emptyCell();
  if (typeof value === 'number') return numberCell(value);
  if (typeof value !== 'string') return textCell(String(value));
  const numeric = Number(value);
  return value.trim() !== '' && String(numeric) === value ? numberCell(numeric) : textCell(value);
}

export async function readCsv(bytes: Buffer): Promise<{ sheets: Sheet[]; encoding: string }> {
  const { text, encoding } = decodeText(bytes);
  if (text.trim() === '') {
    return { sheets: [new SheetBuilder(CSV_SHEET_NAME).build()], encoding };
  }
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const [sheet] = readWorkbookRows(workbook, coerceCsvValue);
  return { sheets: [{ ...sheet, name: CSV_SHEET_NAME }], encoding };
}
