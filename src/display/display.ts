import { DISPLAY_WIDTH, DISPLAY_HEIGHT } from '../emulator/config';

export interface BlitOptions {
  wrapVertically?: boolean;
}

// 64x32 monochrome framebuffer, one byte (0/1) per pixel, row-major.
export class Display {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private readonly pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  // Raised on every mutation; the host clears it after presenting a frame.
  dirty = true;

  getPixel(x: number, y: number): boolean {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return false;
    return this.pixels[y * this.width + x] === 1;
  }

  clear(): void {
    this.pixels.fill(0);
    this.dirty = true;
  }

  // XOR each sprite row onto the buffer starting at (x, y). The origin wraps;
  // columns wrap per row; rows below the bottom edge are clipped unless wrapVertically.
  // Returns true when any set pixel was turned off.
  drawSprite(x: number, y: number, rows: ArrayLike<number>, opts: BlitOptions = {}): boolean {
    const ox = ((x % this.width) + this.width) % this.width;
    const oy = ((y % this.height) + this.height) % this.height;
    let collision = false;
    for (let r = 0; r < rows.length; r++) {
      let py = oy + r;
      if (py >= this.height) {
        if (!opts.wrapVertically) break;
        py %= this.height;
      }
      const bits = rows[r] & 0xff;
      for (let c = 0; c < 8; c++) {
        if (((bits >>> (7 - c)) & 1) === 0) continue;
        const px = (ox + c) % this.width;
        const idx = py * this.width + px;
        if (this.pixels[idx] === 1) collision = true;
        this.pixels[idx] ^= 1;
      }
    }
    this.dirty = true;
    return collision;
  }

  snapshot(): Uint8Array {
    return this.pixels.slice();
  }

  countLit(): number {
    let c = 0;
    for (let i = 0; i < this.pixels.length; i++) c += this.pixels[i];
    return c;
  }
}
