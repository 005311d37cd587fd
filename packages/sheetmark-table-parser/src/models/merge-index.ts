import { ErrorFactory } from '@sheetmark/errors';
import { MergeRegion, Sheet, cellKey } from './document.model';

export type MergeRole =
  | { role: 'free' }
  | { role: 'anchor'; region: MergeRegion }
  | { role: 'covered'; region: MergeRegion };

export interface MergeViolation {
  type: 'inverted' | 'out_of_bounds' | 'overlap';
  region: MergeRegion;
  /** Region already covering the first shared coordinate */
  other?: MergeRegion;
}

const FREE: MergeRole = { role: 'free' };

/**
 * Coordinate lookup over a sheet's merge regions, built per call.
 */
export class MergeIndex {
  private readonly owner = new Map<string, MergeRegion>();
  readonly violations: MergeViolation[] = [];

  constructor(regions: ReadonlyArray<MergeRegion>, bounds?: { rowCount: number; colCount: number }) {
    for (const region of regions) {
      if (region.endRow < region.startRow || region.endCol < region.startCol || region.startRow < 0 || region.startCol < 0) {
        this.violations.push({ type: 'inverted', region });
        continue;
      }
      if (bounds && (region.endRow >= bounds.rowCount || region.endCol >= bounds.colCount)) {
        this.violations.push({ type: 'out_of_bounds', region });
      }
      this.claim(region);
    }
  }

  regionAt(row: number, col: number): MergeRegion | undefined {
    return this.owner.get(cellKey(row, col));
  }

  roleAt(row: number, col: number): MergeRole {
    const region = this.regionAt(row, col);
    if (!region) return FREE;
    return region.startRow === row && region.startCol === col
      ? { role: 'anchor', region }
      : { role: 'covered', region };
  }

  isCovered(row: number, col: number): boolean {
    return this.roleAt(row, col).role === 'covered';
  }

  private claim(region: MergeRegion): void {
    for (let row = region.startRow; row <= region.endRow; row++) {
      for (let col = region.startCol; col <= region.endCol; col++) {
        const key = cellKey(row, col);
        const other = this.owner.get(key);
        if (other) {
          this.violations.push({ type: 'overlap', region, other });
          return;
        }
        this.owner.set(key, region);
      }
    }
  }
}

export function validateMergeRegions(sheet: Sheet): MergeViolation[] {
  return new MergeIndex(sheet.merges, sheet).violations;
}

/**
 * Index the sheet's regions, throwing ConversionFault when any region is
 * inverted, leaves the grid or overlaps another.
 */
export function assertSheetInvariants(sheet: Sheet): MergeIndex {
  const index = new MergeIndex(sheet.merges, sheet);
  const [first] = index.violations;
  if (first) {
    throw ErrorFactory.conversion(
      `Sheet "${sheet.name}" has an invalid merge region (${first.type})`,
      { sheet: sheet.name, violation: first.type, region: first.region, other: first.other }
    );
  }
  return index;
}
