/**
 * In-memory tabular model shared by the loader, the scoring engine and
 * the converters. Coordinates are zero-based (row, col).
 */

import type { StageFailure } from '@sheetmark/errors';

export type CellValue =
  | { kind: 'empty' }
  | { kind: 'text'; text: string }
  | { kind: 'number'; value: number }
  | { kind: 'formula'; formula: string; result?: string | number }
  | { kind: 'hyperlink'; text: string; target: string };

export type ScriptPosition = 'normal' | 'superscript' | 'subscript';

export interface RichTextRun {
  text: string;
  script: ScriptPosition;
}

export interface Cell {
  value: CellValue;
  /** Present only when the source carried formatted runs */
  richText?: RichTextRun[];
}

export interface CellStyle {
  /** #RRGGBB */
  backgroundColor?: string;
  /** #RRGGBB */
  fontColor?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  /** Points */
  fontSize?: number;
}

/** Inclusive bounds */
export interface MergeRegion {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

export interface SheetImage {
  /** 1-based position within the sheet */
  index: number;
  extension: string;
  data: Buffer;
  anchor?: { row: number; col: number };
}

export interface Sheet {
  name: string;
  rowCount: number;
  colCount: number;
  /** Dense, row-major: rowCount rows of colCount cells */
  cells: Cell[][];
  merges: MergeRegion[];
  /** Keyed by cellKey(row, col) */
  styles: Map<string, CellStyle>;
  images: SheetImage[];
}

export type LoadEngine = 'exceljs' | 'sheetjs' | 'ooxml';

export type Fidelity = 'full' | 'degraded';

export type FileKind = 'xlsx' | 'xls' | 'csv';

export interface LoadMetadata {
  engine: LoadEngine;
  fidelity: Fidelity;
  fileKind: FileKind;
  /** Detected text encoding, CSV only */
  encoding?: string;
  /** Stages that failed before `engine` succeeded */
  attempts: StageFailure[];
}

/** Read-only view of the parts of an OOXML package */
export interface PackageArchive {
  entries(): string[];
  has(name: string): boolean;
  readText(name: string): string | undefined;
}

export interface TabularDocument {
  sheets: Sheet[];
  load: LoadMetadata;
  archive?: PackageArchive;
}

export const EMPTY_VALUE: CellValue = Object.freeze({ kind: 'empty' });

export function emptyCell(): Cell {
  return { value: EMPTY_VALUE };
}

export function textCell(text: string): Cell {
  return text === '' ? emptyCell() : { value: { kind: 'text', text } };
}

export function numberCell(value: number): Cell {
  return { value: { kind: 'number', value } };
}

export function cellKey(row: number, col: number): string {
  return `${row}:${col}`;
}

export function getCell(sheet: Sheet, row: number, col: number): Cell {
  return sheet.cells[row]?.[col] ?? emptyCell();
}

export function isEmptyCell(cell: Cell): boolean {
  return cell.value.kind === 'empty' && !cell.richText?.length;
}

/** Text of a cell without any markup */
export function plainText(cell: Cell): string {
  if (cell.richText?.length) {
    return cell.richText.map((run) => run.text).join('');
  }
  const value = cell.value;
  switch (value.kind) {
    case 'empty':
      return '';
    case 'text':
      return value.text;
    case 'number':
      return formatNumber(value.value);
    case 'formula':
      if (value.result === undefined) return `=${value.formula}`;
      return typeof value.result === 'number' ? formatNumber(value.result) : value.result;
    case 'hyperlink':
      return value.text;
  }
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toPrecision(15)));
}

export function regionArea(region: MergeRegion): number {
  return (region.endRow - region.startRow + 1) * (region.endCol - region.startCol + 1);
}

export function regionRowSpan(region: MergeRegion): number {
  return region.endRow - region.startRow + 1;
}

export function regionColSpan(region: MergeRegion): number {
  return region.endCol - region.startCol + 1;
}

/** 0 -> A, 27 -> AB */
export function columnLetter(col: number): string {
  let n = col + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function toA1(row: number, col: number): string {
  return `${columnLetter(col)}${row + 1}`;
}

/** "AB12" -> { row: 11, col: 27 } */
export function fromA1(ref: string): { row: number; col: number } | undefined {
  const match = /^\$?([A-Za-z]+)\$?(\d+)$/.exec(ref.trim());
  if (!match) return undefined;
  let col = 0;
  for (const ch of match[1].toUpperCase()) {
    col = col * 26 + (ch.charCodeAt(0) - 64);
  }
  return { row: Number(match[2]) - 1, col: col - 1 };
}
