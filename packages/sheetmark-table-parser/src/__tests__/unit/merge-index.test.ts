/**
 * MergeIndex / merge region invariants
 */

import { ConversionFault } from '@sheetmark/errors';
import { MergeIndex, assertSheetInvariants, validateMergeRegions } from '../../models/merge-index';
import { buildSheet, region } from '../utils/fixtures';

describe('MergeIndex', () => {
  const index = new MergeIndex([region(0, 0, 1, 2)]);

  it('marks the top-left coordinate as the anchor', () => {
    expect(index.roleAt(0, 0)).toEqual({ role: 'anchor', region: region(0, 0, 1, 2) });
  });

  it('marks every other coordinate of the region as covered', () => {
    const covered = [[0, 1], [0, 2], [1, 0], [1, 1], [1, 2]];
    for (const [row, col] of covered) {
      expect(index.isCovered(row, col)).toBe(true);
    }
  });

  it('leaves coordinates outside every region free', () => {
    expect(index.roleAt(2, 0)).toEqual({ role: 'free' });
    expect(index.roleAt(0, 3)).toEqual({ role: 'free' });
    expect(index.regionAt(2, 2)).toBeUndefined();
  });
});

describe('validateMergeRegions', () => {
  it('accepts disjoint regions', () => {
    const sheet = buildSheet('Ok', [['a', null, 'b', null]], [region(0, 0, 0, 1), region(0, 2, 0, 3)]);
    expect(validateMergeRegions(sheet)).toEqual([]);
  });

  it('reports overlapping regions with the region already holding the cell', () => {
    const sheet = buildSheet('Overlap', [['a', null, null], [null, null, null], [null, null, null]], [
      region(0, 0, 1, 1),
      region(1, 1, 2, 2),
    ]);

    expect(validateMergeRegions(sheet)).toEqual([
      { type: 'overlap', region: region(1, 1, 2, 2), other: region(0, 0, 1, 1) },
    ]);
  });

  it('reports regions that leave the grid', () => {
    const sheet = { ...buildSheet('Small', [['a', 'b']]), merges: [region(0, 0, 3, 0)] };
    expect(validateMergeRegions(sheet).map((v) => v.type)).toEqual(['out_of_bounds']);
  });

  it('reports inverted regions', () => {
    const sheet = { ...buildSheet('Inverted', [['a'], ['b'], ['c']]), merges: [region(2, 0, 1, 0)] };
    expect(validateMergeRegions(sheet).map((v) => v.type)).toEqual(['inverted']);
  });
});

describe('assertSheetInvariants', () => {
  it('returns the index for a valid sheet', () => {
    const sheet = buildSheet('Valid', [['a', null]], [region(0, 0, 0, 1)]);
    expect(assertSheetInvariants(sheet).isCovered(0, 1)).toBe(true);
  });

  it('throws ConversionFault naming the sheet and the violation', () => {
    const sheet = buildSheet('Broken', [['a', null], [null, null]], [region(0, 0, 1, 0), region(0, 0, 0, 1)]);

    expect(() => assertSheetInvariants(sheet)).toThrow(ConversionFault);
    expect(() => assertSheetInvariants(sheet)).toThrow('Sheet "Broken" has an invalid merge region (overlap)');
  });
});
