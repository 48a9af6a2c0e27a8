import fs from 'fs';
import { PNG } from 'pngjs';
import { Display, WIDTH, HEIGHT } from '../display/display';

export interface Palette {
  on: [number, number, number];
  off: [number, number, number];
}

export const DEFAULT_PALETTE: Palette = { on: [255, 255, 255], off: [0, 0, 0] };

// Expand the framebuffer into RGBA, `scale` pixels per cell, following grid() raster order.
export function frameToRGBA(display: Display, scale = 1, palette: Palette = DEFAULT_PALETTE): Uint8Array {
  const s = Math.max(1, scale | 0);
  const w = WIDTH * s;
  const out = new Uint8Array(w * HEIGHT * s * 4);
  let cell = 0;
  for (const lit of display.grid()) {
    const cx = cell % WIDTH;
    const cy = Math.floor(cell / WIDTH);
    const [r, g, b] = lit ? palette.on : palette.off;
    for (let dy = 0; dy < s; dy++) {
      for (let dx = 0; dx < s; dx++) {
        const o = ((cy * s + dy) * w + (cx * s + dx)) * 4;
        out[o] = r; out[o + 1] = g; out[o + 2] = b; out[o + 3] = 255;
      }
    }
    cell++;
  }
  return out;
}

export function encodePNG(display: Display, scale = 1, palette: Palette = DEFAULT_PALETTE): Buffer {
  const s = Math.max(1, scale | 0);
  const png = new PNG({ width: WIDTH * s, height: HEIGHT * s });
  const rgba = frameToRGBA(display, s, palette);
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}

export function writePNG(display: Display, outPath: string, scale = 1, palette: Palette = DEFAULT_PALETTE): void {
  fs.writeFileSync(outPath, encodePNG(display, scale, palette));
}
