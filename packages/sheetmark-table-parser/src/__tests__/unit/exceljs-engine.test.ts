/**
 * exceljs reader: merge coordinates, rich text and shared formulas
 */

import { readWithExcelJs } from '../../loader/engines/exceljs-engine';
import { numberCell, textCell } from '../../models/document.model';
import { region, workbookBuffer } from '../utils/fixtures';

describe('readWithExcelJs', () => {
  it('maps merges to zero-based regions anchored at the master cell', async () => {
    const bytes = await workbookBuffer((workbook) => {
      const sheet = workbook.addWorksheet('Blocks');
      sheet.getCell('B2').value = 'Span';
      sheet.mergeCells('B2:C3');
      sheet.getCell('D4').value = 1;
    });

    const [sheet] = await readWithExcelJs(bytes);

    expect(sheet.merges).toEqual([region(1, 1, 2, 2)]);
    expect(sheet.cells[1][1]).toEqual(textCell('Span'));
    expect(sheet.cells[3][3]).toEqual(numberCell(1));
    expect(sheet.rowCount).toBe(4);
    expect(sheet.colCount).toBe(4);
  });

  it('keeps script runs of rich text', async () => {
    const bytes = await workbookBuffer((workbook) => {
      workbook.addWorksheet('Lab').getCell('A1').value = {
        richText: [{ text: 'H' }, { text: '2', font: { vertAlign: 'subscript' } }, { text: 'O' }],
      };
    });

    const [sheet] = await readWithExcelJs(bytes);

    expect(sheet.cells[0][0]).toEqual({
      value: { kind: 'text', text: 'H2O' },
      richText: [
        { text: 'H', script: 'normal' },
        { text: '2', script: 'subscript' },
        { text: 'O', script: 'normal' },
      ],
    });
  });

  it('gives shared-formula followers their own translated formula', async () => {
    const bytes = await workbookBuffer((workbook) => {
      const sheet = workbook.addWorksheet('Calc');
      sheet.getCell('A1').value = 1;
      sheet.getCell('A2').value = 2;
      sheet.getCell('A3').value = 3;
      sheet.fillFormula('B1:B3', 'A1*2', [2, 4, 6]);
    });

    const [sheet] = await readWithExcelJs(bytes);

    expect(sheet.cells[0][1]).toMatchObject({ value: { kind: 'formula', formula: 'A1*2', result: 2 } });
    expect(sheet.cells[1][1]).toMatchObject({ value: { kind: 'formula', formula: 'A2*2' } });
    expect(sheet.cells[2][1]).toMatchObject({ value: { kind: 'formula', formula: 'A3*2' } });
  });
});
