export interface RGBA { r: number; g: number; b: number; a: number }

export interface Palette {
  on: RGBA;
  off: RGBA;
}

export const DEFAULT_PALETTE: Palette = {
  on: { r: 255, g: 255, b: 255, a: 255 },
  off: { r: 0, g: 0, b: 0, a: 255 },
};

// Accepts "#rgb", "#rrggbb" or the same without '#'. Returns null for anything else.
export function parseHexColor(text: string): RGBA | null {
  const m = text.trim().replace(/^#/, '');
  let full: string;
  if (/^[0-9a-f]{3}$/i.test(m)) full = m.split('').map((c) => c + c).join('');
  else if (/^[0-9a-f]{6}$/i.test(m)) full = m;
  else return null;
  const v = parseInt(full, 16);
  return { r: (v >>> 16) & 0xff, g: (v >>> 8) & 0xff, b: v & 0xff, a: 255 };
}
