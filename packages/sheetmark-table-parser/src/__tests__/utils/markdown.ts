/**
 * Reads Markdown tables back into grids, for round-trip assertions.
 */

function splitRow(line: string): string[] {
  const inner = line.trim().replace(/^\|/, '').replace(/\|$/, '');
  const cells: string[] = [];
  let current = '';
  for (let i = 0; i < inner.length; i++) {
    const ch = inner[i];
    if (ch === '\\' && inner[i + 1] === '|') {
      current += '|';
      i++;
    } else if (ch === '|') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells.map((cell) => cell.trim().replace(/<br>/g, '\n'));
}

const SEPARATOR_ROW = /^\|(\s*---\s*\|)+$/;

/** Every table in the text, separator rows dropped */
export function readMarkdownTables(markdown: string): string[][][] {
  const tables: string[][][] = [];
  let current: string[][] | undefined;

  for (const line of markdown.split('\n')) {
    if (!line.startsWith('|')) {
      current = undefined;
      continue;
    }
    if (!current) {
      current = [];
      tables.push(current);
    }
    if (!SEPARATOR_ROW.test(line.trim())) {
      current.push(splitRow(line));
    }
  }

  return tables;
}
