import { z } from 'zod';
import { ErrorFactory } from '@sheetmark/errors';
import { config } from '../config';
import { DEFAULT_HIGHLIGHT_RANGE, HighlightRange } from '../utils/color';

export type OutputFormat = 'auto' | 'markdown' | 'html';

export interface ConversionOptions {
  /** Inline cell styles in HTML output */
  preserveStyles: boolean;
  /** Write embedded images next to the output */
  extractImages: boolean;
  imagesDir: string;
  /** Body rows per HTML fragment; 0 or less renders one fragment per sheet */
  chunkRows: number;
  /** Strip C0 control characters other than tab, LF and CR */
  cleanIllegalChars: boolean;
  /** Keep trailing empty rows and columns */
  includeEmptyRows: boolean;
  /** Render Unicode super/subscript digits as <sup>/<sub> in HTML */
  convertUnicodeScripts: boolean;
  highlightRange: HighlightRange;
}

export const DEFAULT_CONVERSION_OPTIONS: Readonly<ConversionOptions> = Object.freeze({
  preserveStyles: config.preserveStyles,
  extractImages: false,
  imagesDir: config.imagesDir,
  chunkRows: config.chunkRows,
  cleanIllegalChars: config.cleanIllegalChars,
  includeEmptyRows: config.includeEmptyRows,
  convertUnicodeScripts: false,
  highlightRange: DEFAULT_HIGHLIGHT_RANGE,
});

function buildSchema(defaults: ConversionOptions) {
  const highlight = defaults.highlightRange;
  return z
    .object({
      preserveStyles: z.boolean().catch(defaults.preserveStyles),
      extractImages: z.boolean().catch(defaults.extractImages),
      imagesDir: z.string().min(1).catch(defaults.imagesDir),
      chunkRows: z.number().finite().transform(Math.trunc).catch(defaults.chunkRows),
      cleanIllegalChars: z.boolean().catch(defaults.cleanIllegalChars),
      includeEmptyRows: z.boolean().catch(defaults.includeEmptyRows),
      convertUnicodeScripts: z.boolean().catch(defaults.convertUnicodeScripts),
      highlightRange: z
        .object({
          hueMin: z.number().catch(highlight.hueMin),
          hueMax: z.number().catch(highlight.hueMax),
          minSaturation: z.number().catch(highlight.minSaturation),
          minLightness: z.number().catch(highlight.minLightness),
        })
        .catch(highlight),
    })
    .catch(defaults);
}

/**
 * Resolve caller options against defaults. Unknown keys are ignored and
 * values of the wrong type fall back to their default; this never throws.
 */
export function resolveConversionOptions(
  input: unknown = {},
  defaults: ConversionOptions = DEFAULT_CONVERSION_OPTIONS
): ConversionOptions {
  return buildSchema(defaults).parse(input ?? {});
}

const OUTPUT_FORMATS: readonly OutputFormat[] = ['auto', 'markdown', 'html'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function validateOutputFormat(value: unknown): OutputFormat {
  if (!isOutputFormat(value)) {
    throw ErrorFactory.validation(`Unsupported output format: ${String(value)}`, {
      allowed: OUTPUT_FORMATS,
    });
  }
  return value;
}
