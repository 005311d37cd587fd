/**
 * Cell-level text rendering for both output formats.
 */

import { Cell, RichTextRun, plainText } from '../models/document.model';

const ILLEGAL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F]/g;
const LINE_BREAK = /\r\n|\r|\n/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

const SUPERSCRIPT_CHARS: Record<string, string> = {
  '⁰': '0', '¹': '1', '²': '2', '³': '3', '⁴': '4',
  '⁵': '5', '⁶': '6', '⁷': '7', '⁸': '8', '⁹': '9',
  '⁺': '+', '⁻': '-', '⁼': '=', '⁽': '(', '⁾': ')', 'ⁿ': 'n',
};

const SUBSCRIPT_CHARS: Record<string, string> = {
  '₀': '0', '₁': '1', '₂': '2', '₃': '3', '₄': '4',
  '₅': '5', '₆': '6', '₇': '7', '₈': '8', '₉': '9',
  '₊': '+', '₋': '-', '₌': '=', '₍': '(', '₎': ')',
};

const SUPERSCRIPT_RUN = new RegExp(`[${Object.keys(SUPERSCRIPT_CHARS).join('')}]+`, 'g');
const SUBSCRIPT_RUN = new RegExp(`[${Object.keys(SUBSCRIPT_CHARS).join('')}]+`, 'g');

export function cleanIllegalChars(text: string): string {
  return text.replace(ILLEGAL_CHARACTERS, '');
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(LINE_BREAK, '<br>');
}

/** "x²" -> "x<sup>2</sup>", "H₂O" -> "H<sub>2</sub>O" */
export function convertUnicodeScripts(text: string): string {
  const mapRun = (table: Record<string, string>) => (run: string) =>
    [...run].map((ch) => table[ch] ?? ch).join('');
  return text
    .replace(SUPERSCRIPT_RUN, (run) => `<sup>${mapRun(SUPERSCRIPT_CHARS)(run)}</sup>`)
    .replace(SUBSCRIPT_RUN, (run) => `<sub>${mapRun(SUBSCRIPT_CHARS)(run)}</sub>`);
}

export interface TextRenderOptions {
  cleanIllegalChars: boolean;
}

export interface HtmlRenderOptions extends TextRenderOptions {
  convertUnicodeScripts: boolean;
}

function prepare(text: string, options: TextRenderOptions): string {
  return options.cleanIllegalChars ? cleanIllegalChars(text) : text;
}

function markdownRun(run: RichTextRun, options: TextRenderOptions): string {
  const text = prepare(run.text, options);
  if (!text) return '';
  switch (run.script) {
    case 'superscript':
      return `^${text}^`;
    case 'subscript':
      return `~${text}~`;
    default:
      return text;
  }
}

/**
 * Markdown cell text: script runs as ^sup^ / ~sub~, hyperlinks as
 * [text](target), pipes escaped and line breaks as <br>.
 */
export function markdownCellText(cell: Cell, options: TextRenderOptions): string {
  let text: string;
  if (cell.richText?.length) {
    text = cell.richText.map((run) => markdownRun(run, options)).join('');
  } else if (cell.value.kind === 'hyperlink') {
    const label = prepare(cell.value.text, options) || cell.value.target;
    text = `[${label}](${prepare(cell.value.target, options).replace(/\s/g, '%20')})`;
  } else {
    text = prepare(plainText(cell), options);
  }
  return escapeMarkdownCell(text);
}

function htmlText(text: string, options: HtmlRenderOptions): string {
  const escaped = escapeHtml(prepare(text, options)).replace(LINE_BREAK, '<br>');
  return options.convertUnicodeScripts ? convertUnicodeScripts(escaped) : escaped;
}

/** HTML cell content: script runs as <sup>/<sub>, hyperlinks as anchors */
export function htmlCellContent(cell: Cell, options: HtmlRenderOptions): string {
  if (cell.richText?.length) {
    return cell.richText
      .map((run) => {
        const text = htmlText(run.text, options);
        if (!text) return '';
        if (run.script === 'superscript') return `<sup>${text}</sup>`;
        if (run.script === 'subscript') return `<sub>${text}</sub>`;
        return text;
      })
      .join('');
  }

  if (cell.value.kind === 'hyperlink') {
    const href = escapeHtml(prepare(cell.value.target, options));
    const label = htmlText(cell.value.text, options) || href;
    return `<a href="${href}">${label}</a>`;
  }

  return htmlText(plainText(cell), options);
}
