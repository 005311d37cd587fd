/**
 * Raw OOXML reader against real package bytes
 *
 * Tests cover:
 * - Workbooks written by exceljs: shared strings, script runs, formulas, booleans
 * - Hand-built packages: inline strings, cached string results, error values,
 *   absolute relationship targets and sheets without a relationship
 */

import AdmZip from 'adm-zip';
import { readWithOoxml } from '../../loader/engines/ooxml-engine';
import { numberCell, textCell } from '../../models/document.model';
import { workbookBuffer } from '../utils/fixtures';

const MAIN_NS = 'http://schemas.openxmlformats.org/spreadsheetml/2006/main';
const REL_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

function packageBytes(parts: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, text] of Object.entries(parts)) {
    zip.addFile(name, Buffer.from(text, 'utf8'));
  }
  return zip.toBuffer();
}

describe('readWithOoxml', () => {
  it('reads a workbook written by exceljs', async () => {
    const bytes = await workbookBuffer((workbook) => {
      const lab = workbook.addWorksheet('Lab');
      lab.getCell('A1').value = 'Compound';
      lab.getCell('B1').value = {
        richText: [{ text: 'H' }, { text: '2', font: { vertAlign: 'subscript' } }, { text: 'O' }],
      };
      lab.getCell('A2').value = 3;
      lab.getCell('B2').value = { formula: 'A2*2', result: 6 };
      lab.getCell('A3').value = true;
      workbook.addWorksheet('Notes').getCell('A1').value = 'second';
    });

    const sheets = await readWithOoxml(bytes);

    expect(sheets.map((sheet) => sheet.name)).toEqual(['Lab', 'Notes']);
    const [lab, notes] = sheets;
    expect(lab.cells[0][0]).toEqual(textCell('Compound'));
    expect(lab.cells[0][1]).toEqual({
      value: { kind: 'text', text: 'H2O' },
      richText: [
        { text: 'H', script: 'normal' },
        { text: '2', script: 'subscript' },
        { text: 'O', script: 'normal' },
      ],
    });
    expect(lab.cells[1][0]).toEqual(numberCell(3));
    expect(lab.cells[1][1]).toEqual({ value: { kind: 'formula', formula: 'A2*2', result: 6 } });
    expect(lab.cells[2][0]).toEqual(textCell('TRUE'));
    expect(lab.merges).toEqual([]);
    expect(notes.cells[0][0]).toEqual(textCell('second'));
  });

  it('reads inline strings, string results and error values through an absolute relationship', async () => {
    const bytes = packageBytes({
      'xl/workbook.xml':
        `<workbook xmlns="${MAIN_NS}" xmlns:r="${REL_NS}"><sheets>` +
        '<sheet name="Inline" sheetId="1" r:id="rId7"/><sheet name="Plain" sheetId="2"/>' +
        '</sheets></workbook>',
      'xl/_rels/workbook.xml.rels':
        '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
        `<Relationship Id="rId7" Type="${REL_NS}/worksheet" Target="/xl/worksheets/custom.xml"/>` +
        '</Relationships>',
      'xl/worksheets/custom.xml':
        `<worksheet xmlns="${MAIN_NS}"><sheetData>` +
        '<row r="1"><c r="A1" t="inlineStr"><is><t>Inline text</t></is></c>' +
        '<c r="C1" t="str"><f>CONCAT("a","b")</f><v>ab</v></c></row>' +
        '<row r="3"><c r="B3" t="e"><v>#DIV/0!</v></c><c r="C3"><v>2.5</v></c></row>' +
        '</sheetData></worksheet>',
      'xl/worksheets/sheet2.xml':
        `<worksheet xmlns="${MAIN_NS}"><sheetData><row><c><v>7</v></c><c><v>8</v></c></row></sheetData></worksheet>`,
    });

    const [inline, plain] = await readWithOoxml(bytes);

    expect(inline.name).toBe('Inline');
    expect(inline.rowCount).toBe(3);
    expect(inline.colCount).toBe(3);
    expect(inline.cells[0][0]).toEqual(textCell('Inline text'));
    expect(inline.cells[0][2]).toEqual({ value: { kind: 'formula', formula: 'CONCAT("a","b")', result: 'ab' } });
    expect(inline.cells[2][1]).toEqual(textCell('#DIV/0!'));
    expect(inline.cells[2][2]).toEqual(numberCell(2.5));

    expect(plain.name).toBe('Plain');
    expect(plain.cells).toEqual([[numberCell(7), numberCell(8)]]);
  });

  it('rejects a package without a workbook part', async () => {
    const bytes = packageBytes({ 'docProps/app.xml': '<Properties/>' });
    await expect(readWithOoxml(bytes)).rejects.toThrow('Package has no xl/workbook.xml part');
  });

  it('rejects a worksheet relationship that points at a missing part', async () => {
    const bytes = packageBytes({
      'xl/workbook.xml': `<workbook xmlns="${MAIN_NS}"><sheets><sheet name="Gone" sheetId="1"/></sheets></workbook>`,
    });
    await expect(readWithOoxml(bytes)).rejects.toThrow('Worksheet part xl/worksheets/sheet1.xml is missing');
  });
});
