import * as ExcelJS from 'exceljs';
import {
  Cell,
  CellStyle,
  MergeRegion,
  RichTextRun,
  Sheet,
  emptyCell,
  numberCell,
  textCell,
} from '../../models/document.model';
import { SheetBuilder } from '../../models/sheet-builder';
import { toArrayBuffer, formatDate } from '../../utils/buffers';
import { argbToHex } from '../../utils/color';

/** Workbook default; only other sizes are recorded */
const DEFAULT_FONT_SIZE = 11;

/**
 * Full-fidelity reader: values, formulas, hyperlinks, rich text, merges,
 * fills, fonts and embedded images.
 */
export async function readWithExcelJs(bytes: Buffer): Promise<Sheet[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(toArrayBuffer(bytes));

  if (workbook.worksheets.length === 0) {
    throw new Error('Workbook contains no worksheets');
  }

  return workbook.worksheets.map((worksheet) => readWorksheet(workbook, worksheet));
}

function readWorksheet(workbook: ExcelJS.Workbook, worksheet: ExcelJS.Worksheet): Sheet {
  const builder = new SheetBuilder(worksheet.name);
  const regions = new Map<string, MergeRegion>();

  worksheet.eachRow({ includeEmpty: true }, (row) => {
    row.eachCell({ includeEmpty: true }, (cell) => {
      const r = Number(cell.row) - 1;
      const c = Number(cell.col) - 1;

      if (cell.isMerged) {
        const master = cell.master;
        const region = regions.get(master.address) ?? {
          startRow: Number(master.row) - 1,
          startCol: Number(master.col) - 1,
          endRow: Number(master.row) - 1,
          endCol: Number(master.col) - 1,
        };
        region.endRow = Math.max(region.endRow, r);
        region.endCol = Math.max(region.endCol, c);
        regions.set(master.address, region);

        if (master.address !== cell.address) {
          return;
        }
      }

      builder.setCell(r, c, toCell(cell.value, cell.formula));
      builder.setStyle(r, c, extractCellStyle(cell));
    });
  });

  for (const region of regions.values()) {
    builder.addMerge(region);
  }

  for (const image of worksheet.getImages()) {
    const media = workbook.getImage(Number(image.imageId));
    const data = media ? imageData(media) : undefined;
    if (!media || !data) continue;
    builder.addImage({
      extension: media.extension,
      data,
      anchor: { row: Math.floor(image.range.tl.nativeRow), col: Math.floor(image.range.tl.nativeCol) },
    });
  }

  return builder.build();
}

function imageData(media: ExcelJS.Image): Buffer | undefined {
  if (media.buffer) {
    return Buffer.from(media.buffer);
  }
  if (media.base64) {
    return Buffer.from(media.base64.replace(/^data:[^,]*,/, ''), 'base64');
  }
  return undefined;
}

/**
 * `translatedFormula` is the cell's own formula text; for shared-formula
 * followers exceljs derives it from the master.
 */
export function toCell(value: ExcelJS.CellValue, translatedFormula?: string): Cell {
  if (value === null || value === undefined) return emptyCell();
  if (typeof value === 'number') return numberCell(value);
  if (typeof value === 'string') return textCell(value);
  if (typeof value === 'boolean') return textCell(value ? 'TRUE' : 'FALSE');
  if (value instanceof Date) return textCell(formatDate(value));

  if ('richText' in value) {
    const runs: RichTextRun[] = value.richText.map((run) => ({
      text: run.text,
      script: run.font?.vertAlign ?? 'normal',
    }));
    const text = runs.map((run) => run.text).join('');
    const cell = textCell(text);
    return runs.some((run) => run.script !== 'normal') ? { ...cell, richText: runs } : cell;
  }

  if ('hyperlink' in value) {
    return { value: { kind: 'hyperlink', text: flattenText(value.text), target: value.hyperlink } };
  }

  if ('sharedFormula' in value) {
    const formula = value.formula ?? (translatedFormula || value.sharedFormula);
    return { value: { kind: 'formula', formula, result: formulaResult(value.result) } };
  }

  if ('formula' in value) {
    return { value: { kind: 'formula', formula: value.formula, result: formulaResult(value.result) } };
  }

  return textCell(value.error);
}

type FormulaResult = ExcelJS.CellFormulaValue['result'];

function formulaResult(result: FormulaResult): string | number | undefined {
  if (result === undefined || result === null) return undefined;
  if (typeof result === 'number' || typeof result === 'string') return result;
  if (typeof result === 'boolean') return result ? 'TRUE' : 'FALSE';
  if (result instanceof Date) return formatDate(result);
  return result.error;
}

/** Hyperlink text may itself arrive as a rich-text object */
function flattenText(text: unknown): string {
  if (typeof text === 'string') return text;
  if (typeof text === 'number') return String(text);
  if (text && typeof text === 'object' && 'richText' in text && Array.isArray(text.richText)) {
    return text.richText
      .map((run: unknown) => (run && typeof run === 'object' && 'text' in run ? String(run.text) : ''))
      .join('');
  }
  return '';
}

export function extractCellStyle(cell: ExcelJS.Cell): CellStyle {
  const style: CellStyle = {};
  const fill: ExcelJS.Fill | undefined = cell.fill;
  const font: Partial<ExcelJS.Font> | undefined = cell.font;

  if (fill?.type === 'pattern' && fill.pattern !== 'none') {
    const background = argbToHex(fill.fgColor?.argb);
    if (background) style.backgroundColor = background;
  }

  if (font) {
    const color = argbToHex(font.color?.argb);
    if (color) style.fontColor = color;
    if (font.bold) style.bold = true;
    if (font.italic) style.italic = true;
    if (font.underline && font.underline !== 'none') style.underline = true;
    if (typeof font.size === 'number' && font.size !== DEFAULT_FONT_SIZE) style.fontSize = font.size;
  }

  return style;
}
