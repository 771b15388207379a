export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

// 64x32 monochrome display. Pixels are stored row-major, one byte each (0 = off, 1 = on).
export class Framebuffer {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;
  private buf = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  clear(): void { this.buf.fill(0); }

  pixel(x: number, y: number): boolean {
    return this.buf[this.index(x, y)] === 1;
  }

  // XOR a single pixel; returns true when a set pixel was turned off
  xorPixel(x: number, y: number, on: boolean): boolean {
    if (!on) return false;
    const idx = this.index(x, y);
    const was = this.buf[idx];
    this.buf[idx] = was ^ 1;
    return was === 1;
  }

  // Draw sprite rows (MSB = leftmost pixel) with the origin wrapped onto the screen.
  // Columns wrap around horizontally; rows below the bottom edge are clipped.
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    const ox = x % SCREEN_WIDTH;
    const oy = y % SCREEN_HEIGHT;
    let collided = false;
    for (let row = 0; row < rows.length; row++) {
      const py = oy + row;
      if (py >= SCREEN_HEIGHT) break;
      const bits = rows[row] & 0xFF;
      if (bits === 0) continue;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const px = (ox + col) % SCREEN_WIDTH;
        if (this.xorPixel(px, py, true)) collided = true;
      }
    }
    return collided;
  }

  // Live row-major view; hosts read it once per frame
  pixels(): Uint8Array { return this.buf; }

  countLit(): number {
    let n = 0;
    for (let i = 0; i < this.buf.length; i++) n += this.buf[i];
    return n;
  }

  // Text rendering for CLI output and test diagnostics
  toText(on = '#', off = '.'): string {
    const lines: string[] = [];
    for (let y = 0; y < SCREEN_HEIGHT; y++) {
      let line = '';
      for (let x = 0; x < SCREEN_WIDTH; x++) line += this.buf[y * SCREEN_WIDTH + x] ? on : off;
      lines.push(line);
    }
    return lines.join('\n');
  }

  private index(x: number, y: number): number {
    if (x < 0 || x >= SCREEN_WIDTH || y < 0 || y >= SCREEN_HEIGHT) {
      throw new RangeError(`pixel (${x}, ${y}) is outside the ${SCREEN_WIDTH}x${SCREEN_HEIGHT} display`);
    }
    return y * SCREEN_WIDTH + x;
  }
}
