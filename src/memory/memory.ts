import type { Byte } from '../emulator/types';
import { MemoryOutOfBoundsError, RomTooLargeError } from '../emulator/errors';
import { Address, ADDRESS_SPACE, ENTRY_POINT } from './address';
import fontGlyphs from './font.json';

export const MEMORY_SIZE = ADDRESS_SPACE;
export const MAX_ROM_SIZE = MEMORY_SIZE - ENTRY_POINT;
export const FONT_BASE = 0x000;
export const GLYPH_BYTES = 5;

// Hex digit glyphs 0..F, 5 rows each, 4 px wide in the high nibble
export const FONT: Uint8Array = Uint8Array.from(fontGlyphs.flat());

export class Memory {
  private readonly mem = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.mem.set(FONT, FONT_BASE);
  }

  get size(): number {
    return this.mem.length;
  }

  // Clears memory, rewrites the font and places the program at the entry point.
  loadRom(bytes: ArrayLike<number>): void {
    if (bytes.length > MAX_ROM_SIZE) throw new RomTooLargeError(bytes.length, MAX_ROM_SIZE);
    this.mem.fill(0);
    this.mem.set(FONT, FONT_BASE);
    this.mem.set(bytes, ENTRY_POINT);
  }

  read8(addr: Address): Byte {
    return this.mem[addr.inner()];
  }

  // Copies caller data into memory starting at addr
  readRange(addr: Address, data: ArrayLike<number>): void {
    const start = this.checkRange(addr, data.length);
    for (let i = 0; i < data.length; i++) this.mem[start + i] = data[i] & 0xff;
  }

  // Copies memory starting at addr into out
  writeRange(addr: Address, out: Uint8Array): void {
    const start = this.checkRange(addr, out.length);
    out.set(this.mem.subarray(start, start + out.length));
  }

  // Copy of a memory range, for inspection
  inspect(start: number, length: number): Uint8Array {
    if (start < 0 || start + length > this.mem.length) throw new MemoryOutOfBoundsError(start, length);
    return this.mem.slice(start, start + length);
  }

  private checkRange(addr: Address, length: number): number {
    const start = addr.inner();
    if (start + length > this.mem.length) throw new MemoryOutOfBoundsError(start, length);
    return start;
  }
}
