import { Sheet, TabularDocument, getCell, isEmptyCell, regionArea, regionColSpan, regionRowSpan } from '../models/document.model';
import { MergeIndex } from '../models/merge-index';
import { StructureStats } from './feature-vector';
import { ScoringConfig } from './scoring-config';

type HeaderConfig = Pick<ScoringConfig, 'headerScanRows' | 'headerTextRatio'>;

/**
 * Merge, header and scale signals read straight from the grid.
 */
export function analyzeStructure(document: TabularDocument, config: HeaderConfig): StructureStats {
  let totalCells = 0;
  let mergedArea = 0;
  const stats: StructureStats = {
    sheetCount: document.sheets.length,
    mergeCount: 0,
    mergeAreaRatio: 0,
    maxMergeDepth: 0,
    hasComplexMerge: false,
    headerLevels: 0,
    maxRows: 0,
    maxCols: 0,
    maxCells: 0,
  };

  for (const sheet of document.sheets) {
    const cells = sheet.rowCount * sheet.colCount;
    totalCells += cells;
    stats.maxRows = Math.max(stats.maxRows, sheet.rowCount);
    stats.maxCols = Math.max(stats.maxCols, sheet.colCount);
    stats.maxCells = Math.max(stats.maxCells, cells);

    for (const region of sheet.merges) {
      stats.mergeCount++;
      mergedArea += regionArea(region);
      stats.maxMergeDepth = Math.max(stats.maxMergeDepth, regionRowSpan(region));
      if (regionRowSpan(region) > 1 && regionColSpan(region) > 1) {
        stats.hasComplexMerge = true;
      }
    }

    stats.headerLevels = Math.max(stats.headerLevels, headerLevels(sheet, config));
  }

  stats.mergeAreaRatio = totalCells > 0 ? Math.min(1, mergedArea / totalCells) : 0;
  return stats;
}

/**
 * Number of header levels at the top of a sheet: the taller of the
 * deepest merge starting in the scan band and the run of fully populated,
 * text-only rows from the top. Without merges in the band a sheet has a
 * single header row.
 */
export function headerLevels(sheet: Sheet, config: HeaderConfig): number {
  if (sheet.rowCount === 0 || sheet.colCount === 0) return 0;

  const scanRows = Math.min(config.headerScanRows, sheet.rowCount);
  const bandMerges = sheet.merges.filter((region) => region.startRow < scanRows);
  if (bandMerges.length === 0) return 1;

  const mergeDepth = Math.max(...bandMerges.map(regionRowSpan));
  const index = new MergeIndex(sheet.merges);

  let populated = 0;
  while (populated < scanRows && isHeaderLikeRow(sheet, index, populated, config.headerTextRatio)) {
    populated++;
  }

  return Math.max(mergeDepth, populated);
}

function isHeaderLikeRow(sheet: Sheet, index: MergeIndex, row: number, textRatio: number): boolean {
  let values = 0;
  let texts = 0;

  for (let col = 0; col < sheet.colCount; col++) {
    if (index.isCovered(row, col)) continue;
    const cell = getCell(sheet, row, col);
    if (isEmptyCell(cell)) return false;
    values++;
    if (cell.value.kind === 'text' || cell.value.kind === 'hyperlink') texts++;
  }

  return values === 0 || texts / values >= textRatio;
}
