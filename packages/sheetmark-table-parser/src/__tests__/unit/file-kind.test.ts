import { detectFileKind, hasOle2Signature, hasZipSignature } from '../../loader/file-kind';

const zipBytes = Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]);
const ole2Bytes = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);
const textBytes = Buffer.from('name,qty\nwidget,3\n');

describe('detectFileKind', () => {
  it('recognises zip packages as xlsx', () => {
    expect(hasZipSignature(zipBytes)).toBe(true);
    expect(detectFileKind(zipBytes)).toBe('xlsx');
  });

  it('recognises OLE2 compound files as xls', () => {
    expect(hasOle2Signature(ole2Bytes)).toBe(true);
    expect(detectFileKind(ole2Bytes)).toBe('xls');
  });

  it('lets the signature win over the file name', () => {
    expect(detectFileKind(zipBytes, 'export.csv')).toBe('xlsx');
    expect(detectFileKind(ole2Bytes, 'report.xlsx')).toBe('xls');
  });

  it('uses the extension only for unsigned bytes', () => {
    expect(detectFileKind(textBytes, '/tmp/book.XLSX')).toBe('xlsx');
    expect(detectFileKind(textBytes, 'table.tsv')).toBe('csv');
  });

  it('treats unsigned bytes without a hint as CSV', () => {
    expect(detectFileKind(textBytes)).toBe('csv');
    expect(detectFileKind(textBytes, 'notes.md')).toBe('csv');
  });
});
