import type { TabularDocument } from '../models/document.model';
import type { RenderFormat } from '../scoring/ComplexityScore';
import { toHtmlChunks } from './html-converter';
import { toMarkdown } from './markdown-converter';
import { ConversionOptions, resolveConversionOptions } from './options';

export type RenderedContent =
  | { format: 'markdown'; content: string }
  | { format: 'html'; chunks: Iterable<string> };

/**
 * Render a loaded document. Throws ConversionFault when a sheet carries
 * invalid merge regions.
 */
export function convert(
  document: TabularDocument,
  format: RenderFormat,
  options?: Partial<ConversionOptions>
): RenderedContent {
  const resolved = resolveConversionOptions(options);
  if (format === 'html') {
    return { format, chunks: toHtmlChunks(document.sheets, resolved) };
  }
  return { format, content: toMarkdown(document.sheets, resolved) };
}

export * from './options';
export { toMarkdown, sheetToMarkdown, isDefaultSheetName } from './markdown-converter';
export { toHtmlChunks, headerBandHeight } from './html-converter';
export { visibleBounds } from './visible-bounds';
export type { VisibleBounds } from './visible-bounds';
export { inlineStyle, styleAttributes } from './style-attributes';
export { cleanIllegalChars, convertUnicodeScripts, escapeHtml, escapeMarkdownCell } from './cell-text';
