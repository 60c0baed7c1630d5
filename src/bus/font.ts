import glyphs from './font.json';

// Hex digit sprites 0-F, 5 rows each, 4 pixels wide in the high nibble.
export const FONT_BASE = 0x014;
export const GLYPH_BYTES = 5;

export const FONT: Uint8Array = Uint8Array.from(glyphs.flat());

export function glyphAddress(digit: number): number {
  return FONT_BASE + (digit & 0x0f) * GLYPH_BYTES;
}
