import { CellStyle } from '../models/document.model';
import { HighlightRange, isHighlightColor } from '../utils/color';

export interface StyleAttributes {
  style?: string;
  highlight: boolean;
}

/** Inline CSS for a cell style, declarations in a fixed order */
export function inlineStyle(style: CellStyle): string | undefined {
  const declarations: string[] = [];
  if (style.backgroundColor) declarations.push(`background-color: ${style.backgroundColor}`);
  if (style.fontColor) declarations.push(`color: ${style.fontColor}`);
  if (style.bold) declarations.push('font-weight: bold');
  if (style.italic) declarations.push('font-style: italic');
  if (style.underline) declarations.push('text-decoration: underline');
  if (style.fontSize !== undefined) declarations.push(`font-size: ${style.fontSize}pt`);
  return declarations.length ? declarations.join('; ') : undefined;
}

export function styleAttributes(style: CellStyle | undefined, range: HighlightRange): StyleAttributes {
  if (!style) return { highlight: false };
  return {
    style: inlineStyle(style),
    highlight: isHighlightColor(style.backgroundColor, range),
  };
}
