import * as path from 'path';
import type { FileKind } from '../models/document.model';

/** Zip container: xlsx, xlsm */
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

/** OLE2 compound file: legacy xls */
const OLE2_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0]);

const EXTENSION_KINDS: Record<string, FileKind> = {
  '.xlsx': 'xlsx',
  '.xlsm': 'xlsx',
  '.xls': 'xls',
  '.csv': 'csv',
  '.tsv': 'csv',
  '.txt': 'csv',
};

export function hasZipSignature(bytes: Buffer): boolean {
  return bytes.subarray(0, 4).equals(ZIP_SIGNATURE);
}

export function hasOle2Signature(bytes: Buffer): boolean {
  return bytes.subarray(0, 4).equals(OLE2_SIGNATURE);
}

/**
 * Decide the file kind from magic bytes. The file name only matters when
 * the bytes carry no signature, and then only to route text-like files.
 */
export function detectFileKind(bytes: Buffer, fileName?: string): FileKind {
  if (hasZipSignature(bytes)) return 'xlsx';
  if (hasOle2Signature(bytes)) return 'xls';

  if (fileName) {
    const hinted = EXTENSION_KINDS[path.extname(fileName).toLowerCase()];
    // A spreadsheet extension on unsigned bytes still goes through the engine chain
    if (hinted) return hinted;
  }
  return 'csv';
}
