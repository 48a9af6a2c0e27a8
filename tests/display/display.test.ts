import { describe, it, expect } from 'vitest';
import { Display, WIDTH, HEIGHT } from '../../src/display/display';

describe('Display', () => {
  it('XORs a sprite row MSB-first and reports no collision on a blank screen', () => {
    const d = new Display();
    expect(d.set(0, 0, 0b10100000)).toBe(0);
    expect(d.get(0, 0)).toBe(true);
    expect(d.get(1, 0)).toBe(false);
    expect(d.get(2, 0)).toBe(true);
    expect(d.updated).toBe(true);
  });

  it('reports a collision only when a lit pixel is erased', () => {
    const d = new Display();
    d.set(0, 0, 0b11000000);
    // overlapping unlit bits and new pixels do not count
    expect(d.set(0, 0, 0b00110000)).toBe(0);
    expect(d.set(0, 0, 0b01000000)).toBe(1);
    expect(d.get(1, 0)).toBe(false);
  });

  it('plotting the same row twice clears it and collides', () => {
    const d = new Display();
    d.set(10, 5, 0xff);
    expect(d.set(10, 5, 0xff)).toBe(1);
    expect(d.litCount()).toBe(0);
  });

  it('wraps columns past the right edge', () => {
    const d = new Display();
    d.set(63, 0, 0xff);
    expect(d.get(63, 0)).toBe(true);
    for (let x = 0; x < 7; x++) expect(d.get(x, 0)).toBe(true);
    expect(d.get(7, 0)).toBe(false);
  });

  it('wraps rows past the bottom edge', () => {
    const d = new Display();
    d.set(0, HEIGHT, 0x80);
    expect(d.get(0, 0)).toBe(true);
  });

  it('clear unlights everything and marks updated', () => {
    const d = new Display();
    d.set(0, 0, 0xff);
    d.updated = false;
    d.clear();
    expect(d.litCount()).toBe(0);
    expect(d.updated).toBe(true);
  });

  it('grid() walks rows top to bottom, columns left to right, and restarts', () => {
    const d = new Display();
    d.set(1, 0, 0x80); // (1,0) -> index 1
    d.set(0, 1, 0x80); // (0,1) -> index 64
    const cells = Array.from(d.grid());
    expect(cells.length).toBe(WIDTH * HEIGHT);
    expect(cells.findIndex((c) => c)).toBe(1);
    expect(cells.lastIndexOf(true)).toBe(WIDTH);
    expect(Array.from(d.grid())).toEqual(cells);
  });

  it('toAscii renders one line per row', () => {
    const d = new Display();
    d.set(0, 0, 0xc0);
    const lines = d.toAscii().split('\n');
    expect(lines.length).toBe(HEIGHT);
    expect(lines[0].slice(0, 3)).toBe('##.');
  });
});
