import { Cell, RichTextRun, Sheet, fromA1, numberCell, textCell } from '../../models/document.model';
import { SheetBuilder } from '../../models/sheet-builder';
import { OoxmlArchive, elementsByTag, firstByTag, readRelationshipTargets, textOf } from '../ooxml-archive';

interface SharedString {
  text: string;
  runs?: RichTextRun[];
}

/**
 * Low-level reader for packages the object-model engines reject: walks
 * workbook.xml, its relationships, the shared string table and each
 * worksheet's sheetData directly. Values only, like the tabular fallback.
 */
export async function readWithOoxml(bytes: Buffer): Promise<Sheet[]> {
  const archive = OoxmlArchive.open(bytes);
  const workbook = archive.readXml('xl/workbook.xml');
  if (!workbook) {
    throw new Error('Package has no xl/workbook.xml part');
  }

  const targets = readRelationshipTargets(archive, 'xl/_rels/workbook.xml.rels', 'xl');
  const sharedStrings = readSharedStrings(archive);
  const sheetElements = elementsByTag(workbook, 'sheet');

  if (sheetElements.length === 0) {
    throw new Error('Workbook contains no worksheets');
  }

  return sheetElements.map((element, i) => {
    const name = element.getAttribute('name') || `Sheet${i + 1}`;
    const relId = element.getAttribute('r:id') ?? '';
    const partName = targets.get(relId) ?? `xl/worksheets/sheet${i + 1}.xml`;
    const sheetXml = archive.readXml(partName);
    if (!sheetXml) {
      throw new Error(`Worksheet part ${partName} is missing`);
    }
    return readSheetData(name, sheetXml, sharedStrings);
  });
}

function readSharedStrings(archive: OoxmlArchive): SharedString[] {
  const doc = archive.readXml('xl/sharedStrings.xml');
  if (!doc) return [];

  return elementsByTag(doc, 'si').map((si) => {
    const runElements = elementsByTag(si, 'r');
    if (runElements.length === 0) {
      return { text: elementsByTag(si, 't').map(textOf).join('') };
    }

    const runs: RichTextRun[] = runElements.map((run) => {
      const vertAlign = firstByTag(run, 'vertAlign')?.getAttribute('val');
      return {
        text: textOf(firstByTag(run, 't')),
        script: vertAlign === 'superscript' || vertAlign === 'subscript' ? vertAlign : 'normal',
      };
    });
    const text = runs.map((run) => run.text).join('');
    return runs.some((run) => run.script !== 'normal') ? { text, runs } : { text };
  });
}

function readSheetData(name: string, sheetXml: Document, sharedStrings: SharedString[]): Sheet {
  const builder = new SheetBuilder(name);
  let rowIndex = -1;

  for (const row of elementsByTag(sheetXml, 'row')) {
    const declaredRow = Number(row.getAttribute('r'));
    rowIndex = declaredRow > 0 ? declaredRow - 1 : rowIndex + 1;
    let colIndex = -1;

    for (const c of elementsByTag(row, 'c')) {
      const ref = fromA1(c.getAttribute('r') ?? '');
      colIndex = ref ? ref.col : colIndex + 1;
      builder.setCell(rowIndex, colIndex, readCell(c, sharedStrings));
    }
  }

  return builder.build();
}

function readCell(c: Element, sharedStrings: SharedString[]): Cell {
  const type = c.getAttribute('t') ?? 'n';
  const raw = textOf(firstByTag(c, 'v'));
  const formula = textOf(firstByTag(c, 'f'));

  let value: string | number | undefined;
  let runs: RichTextRun[] | undefined;

  switch (type) {
    case 's': {
      const shared = sharedStrings[Number(raw)];
      value = shared?.text;
      runs = shared?.runs;
      break;
    }
    case 'inlineStr':
      value = elementsByTag(c, 't').map(textOf).join('');
      break;
    case 'b':
      value = raw === '1' ? 'TRUE' : 'FALSE';
      break;
    case 'str':
    case 'e':
      value = raw;
      break;
    default:
      value = raw === '' ? undefined : Number(raw);
  }

  if (formula) {
    return { value: { kind: 'formula', formula, result: value === '' ? undefined : value } };
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? textCell(raw) : numberCell(value);
  }
  const cell = textCell(value ?? '');
  return runs ? { ...cell, richText: runs } : cell;
}
