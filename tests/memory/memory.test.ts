import { describe, it, expect } from 'vitest';
import { Memory, MAX_ROM_SIZE, FONT } from '../../src/memory/memory';
import { Address } from '../../src/memory/address';
import { MemoryOutOfBoundsError, RomTooLargeError } from '../../src/emulator/errors';

describe('Memory', () => {
  it('holds the 16 hex glyphs at the bottom of memory', () => {
    const mem = new Memory();
    expect(FONT.length).toBe(80);
    expect(Array.from(mem.inspect(0, 5))).toEqual([0xf0, 0x90, 0x90, 0x90, 0xf0]); // 0
    expect(Array.from(mem.inspect(0x4b, 5))).toEqual([0xf0, 0x80, 0xf0, 0x80, 0x80]); // F
  });

  it('loadRom places the program at 0x200 and clears stale bytes', () => {
    const mem = new Memory();
    mem.loadRom([1, 2, 3, 4]);
    mem.loadRom([9]);
    expect(Array.from(mem.inspect(0x200, 4))).toEqual([9, 0, 0, 0]);
    expect(mem.read8(new Address(0x000))).toBe(0xf0);
  });

  it('accepts a ROM that fills the program space exactly', () => {
    const mem = new Memory();
    const bytes = new Uint8Array(MAX_ROM_SIZE).fill(0xaa);
    mem.loadRom(bytes);
    expect(mem.read8(new Address(0xfff))).toBe(0xaa);
  });

  it('rejects a ROM one byte too large', () => {
    const mem = new Memory();
    expect(() => mem.loadRom(new Uint8Array(MAX_ROM_SIZE + 1))).toThrow(RomTooLargeError);
  });

  it('readRange copies caller data in; writeRange copies memory out', () => {
    const mem = new Memory();
    mem.readRange(new Address(0x300), [0x11, 0x22, 0x33]);
    const out = new Uint8Array(3);
    mem.writeRange(new Address(0x300), out);
    expect(Array.from(out)).toEqual([0x11, 0x22, 0x33]);
  });

  it('range operations past the end throw MemoryOutOfBoundsError', () => {
    const mem = new Memory();
    expect(() => mem.readRange(new Address(0xfff), [1, 2])).toThrow(MemoryOutOfBoundsError);
    expect(() => mem.writeRange(new Address(0xffe), new Uint8Array(3))).toThrow(MemoryOutOfBoundsError);
    mem.readRange(new Address(0xffe), [7, 8]);
    expect(mem.read8(new Address(0xfff))).toBe(8);
  });
});
