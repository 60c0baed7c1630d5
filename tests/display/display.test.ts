import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Display } from '../../src/display/display';

const sprite = fc.array(fc.integer({ min: 0, max: 255 }), { minLength: 1, maxLength: 15 });
const coord = fc.integer({ min: 0, max: 255 });

function visiblyLit(rows: number[], y: number): boolean {
  const oy = y % 32;
  return rows.some((r, i) => r !== 0 && oy + i < 32);
}

describe('Display XOR blit', () => {
  it('drawing the same sprite twice restores the previous frame exactly', () => {
    fc.assert(fc.property(sprite, coord, coord, sprite, coord, coord, (bg, bx, by, rows, x, y) => {
      const d = new Display();
      d.drawSprite(bx, by, bg);
      const before = d.snapshot();
      d.drawSprite(x, y, rows);
      d.drawSprite(x, y, rows);
      expect(d.snapshot()).toEqual(before);
    }), { numRuns: 300 });
  });

  it('on a blank screen the second draw collides exactly when the first lit something', () => {
    fc.assert(fc.property(sprite, coord, coord, (rows, x, y) => {
      const d = new Display();
      expect(d.drawSprite(x, y, rows)).toBe(false);
      expect(d.drawSprite(x, y, rows)).toBe(visiblyLit(rows, y));
    }), { numRuns: 300 });
  });

  it('snapshot is a copy', () => {
    const d = new Display();
    const snap = d.snapshot();
    d.drawSprite(0, 0, [0x80]);
    expect(snap[0]).toBe(0);
    expect(d.snapshot()[0]).toBe(1);
  });

  it('raises dirty on draw and clear', () => {
    const d = new Display();
    d.dirty = false;
    d.drawSprite(0, 0, [0x01]);
    expect(d.dirty).toBe(true);
    d.dirty = false;
    d.clear();
    expect(d.dirty).toBe(true);
  });

  it('reads off-screen pixels as unset', () => {
    const d = new Display();
    expect(d.getPixel(-1, 0)).toBe(false);
    expect(d.getPixel(64, 0)).toBe(false);
    expect(d.getPixel(0, 32)).toBe(false);
  });
});
