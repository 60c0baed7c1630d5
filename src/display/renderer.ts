import { PNG } from 'pngjs';
import type { Display } from './display';
import { DEFAULT_PALETTE, type Palette } from './palette';

export interface AsciiGlyphs {
  on: string;
  off: string;
}

export function renderAscii(display: Display, glyphs: AsciiGlyphs = { on: '#', off: '.' }): string[] {
  const lines: string[] = [];
  for (let y = 0; y < display.height; y++) {
    let line = '';
    for (let x = 0; x < display.width; x++) line += display.getPixel(x, y) ? glyphs.on : glyphs.off;
    lines.push(line);
  }
  return lines;
}

// Scaled RGBA8888 image of the framebuffer, row-major.
export function renderRGBA(display: Display, scale = 1, palette: Palette = DEFAULT_PALETTE): Uint8Array {
  const s = Math.max(1, scale | 0);
  const width = display.width * s;
  const height = display.height * s;
  const out = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const c = display.getPixel(Math.floor(x / s), Math.floor(y / s)) ? palette.on : palette.off;
      const o = (y * width + x) * 4;
      out[o] = c.r;
      out[o + 1] = c.g;
      out[o + 2] = c.b;
      out[o + 3] = c.a;
    }
  }
  return out;
}

export function encodePNG(display: Display, scale = 1, palette: Palette = DEFAULT_PALETTE): Buffer {
  const s = Math.max(1, scale | 0);
  const rgba = renderRGBA(display, s, palette);
  const png = new PNG({ width: display.width * s, height: display.height * s });
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}
