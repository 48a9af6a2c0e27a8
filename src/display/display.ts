export const WIDTH = 64;
export const HEIGHT = 32;

// 64x32 monochrome framebuffer. Sprites are XOR-blitted one 8-pixel row at a time.
export class Display {
  private vram = new Uint8Array(WIDTH * HEIGHT);
  // Set on every mutation; only the consumer clears it after redrawing
  updated = false;

  clear(): void {
    this.vram.fill(0);
    this.updated = true;
  }

  /**
   * XOR one sprite row (MSB = leftmost pixel) at (x, y), wrapping both axes.
   * Returns 1 if any lit pixel was turned off, else 0.
   */
  set(x: number, y: number, value: number): number {
    this.updated = true;
    let erased = 0;
    const row = (y % HEIGHT) * WIDTH;
    for (let bit = 0; bit < 8; bit++) {
      const col = (x + bit) % WIDTH;
      const pixel = (value & (0x80 >> bit)) !== 0;
      if (!pixel) continue;
      const idx = row + col;
      if (this.vram[idx] !== 0) erased = 1;
      this.vram[idx] ^= 1;
    }
    return erased;
  }

  get(x: number, y: number): boolean {
    return this.vram[y * WIDTH + x] !== 0;
  }

  // Raster order: rows top to bottom, columns left to right within a row
  *grid(): Generator<boolean, void, undefined> {
    for (let y = 0; y < HEIGHT; y++) {
      for (let x = 0; x < WIDTH; x++) yield this.vram[y * WIDTH + x] !== 0;
    }
  }

  litCount(): number {
    let c = 0;
    for (let i = 0; i < this.vram.length; i++) c += this.vram[i];
    return c;
  }

  // Debug helper: one line per row, '#' lit, '.' unlit
  toAscii(): string {
    const lines: string[] = [];
    for (let y = 0; y < HEIGHT; y++) {
      let s = '';
      for (let x = 0; x < WIDTH; x++) s += this.get(x, y) ? '#' : '.';
      lines.push(s);
    }
    return lines.join('\n');
  }
}
