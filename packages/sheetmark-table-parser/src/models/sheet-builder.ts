import {
  Cell,
  CellStyle,
  MergeRegion,
  Sheet,
  SheetImage,
  cellKey,
  emptyCell,
  isEmptyCell,
} from './document.model';

/**
 * Accumulates sparse cell writes from a reader and produces a dense Sheet
 * whose extent covers every written cell and merge region.
 */
export class SheetBuilder {
  private readonly sparse = new Map<number, Map<number, Cell>>();
  private readonly merges: MergeRegion[] = [];
  private readonly styles = new Map<string, CellStyle>();
  private readonly images: SheetImage[] = [];
  private maxRow = -1;
  private maxCol = -1;

  constructor(private readonly name: string) {}

  setCell(row: number, col: number, cell: Cell): this {
    if (row < 0 || col < 0 || isEmptyCell(cell)) {
      return this;
    }
    let rowCells = this.sparse.get(row);
    if (!rowCells) {
      rowCells = new Map();
      this.sparse.set(row, rowCells);
    }
    rowCells.set(col, cell);
    this.extend(row, col);
    return this;
  }

  addMerge(region: MergeRegion): this {
    if (region.endRow === region.startRow && region.endCol === region.startCol) {
      return this;
    }
    this.merges.push(region);
    this.extend(region.endRow, region.endCol);
    return this;
  }

  setStyle(row: number, col: number, style: CellStyle): this {
    if (Object.keys(style).length > 0) {
      this.styles.set(cellKey(row, col), style);
    }
    return this;
  }

  addImage(image: Omit<SheetImage, 'index'>): this {
    this.images.push({ ...image, index: this.images.length + 1 });
    return this;
  }

  build(): Sheet {
    const rowCount = this.maxRow + 1;
    const colCount = this.maxCol + 1;
    const cells: Cell[][] = [];

    for (let row = 0; row < rowCount; row++) {
      const rowCells = this.sparse.get(row);
      const line: Cell[] = [];
      for (let col = 0; col < colCount; col++) {
        line.push(rowCells?.get(col) ?? emptyCell());
      }
      cells.push(line);
    }

    return {
      name: this.name,
      rowCount,
      colCount,
      cells,
      merges: [...this.merges],
      styles: new Map(this.styles),
      images: [...this.images],
    };
  }

  private extend(row: number, col: number): void {
    this.maxRow = Math.max(this.maxRow, row);
    this.maxCol = Math.max(this.maxCol, col);
  }
}

/** Rename duplicates as "Name (2)", "Name (3)" so names stay unique */
export function ensureUniqueSheetNames(sheets: Sheet[]): Sheet[] {
  const seen = new Set<string>();
  return sheets.map((sheet) => {
    const base = sheet.name.trim() || 'Sheet';
    let name = base;
    for (let n = 2; seen.has(name.toLowerCase()); n++) {
      name = `${base} (${n})`;
    }
    seen.add(name.toLowerCase());
    return name === sheet.name ? sheet : { ...sheet, name };
  });
}
