/**
 * Colour helpers for style extraction and highlight detection.
 */

export interface HighlightRange {
  /** Inclusive hue bounds in degrees */
  hueMin: number;
  hueMax: number;
  /** 0..1 */
  minSaturation: number;
  /** 0..1 */
  minLightness: number;
}

/** Yellow-ish fills: marker pens and "review me" cells */
export const DEFAULT_HIGHLIGHT_RANGE: HighlightRange = {
  hueMin: 40,
  hueMax: 70,
  minSaturation: 0.5,
  minLightness: 0.45,
};

/** "FFFFFF00" / "FFFF00" -> "#FFFF00" */
export function argbToHex(argb: string | undefined): string | undefined {
  if (!argb || !/^([0-9a-fA-F]{2})?[0-9a-fA-F]{6}$/.test(argb)) {
    return undefined;
  }
  return `#${argb.slice(-6).toUpperCase()}`;
}

export function hexToHsl(hex: string): { h: number; s: number; l: number } | undefined {
  const match = /^#?([0-9a-fA-F]{6})$/.exec(hex);
  if (!match) return undefined;

  const value = parseInt(match[1], 16);
  const r = ((value >> 16) & 0xff) / 255;
  const g = ((value >> 8) & 0xff) / 255;
  const b = (value & 0xff) / 255;

  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const l = (max + min) / 2;
  const delta = max - min;

  if (delta === 0) {
    return { h: 0, s: 0, l };
  }

  const s = delta / (1 - Math.abs(2 * l - 1));
  let h: number;
  if (max === r) {
    h = 60 * (((g - b) / delta) % 6);
  } else if (max === g) {
    h = 60 * ((b - r) / delta + 2);
  } else {
    h = 60 * ((r - g) / delta + 4);
  }
  if (h < 0) h += 360;

  return { h, s, l };
}

export function isHighlightColor(hex: string | undefined, range: HighlightRange = DEFAULT_HIGHLIGHT_RANGE): boolean {
  const hsl = hex ? hexToHsl(hex) : undefined;
  if (!hsl) return false;
  return (
    hsl.h >= range.hueMin &&
    hsl.h <= range.hueMax &&
    hsl.s >= range.minSaturation &&
    hsl.l >= range.minLightness
  );
}
