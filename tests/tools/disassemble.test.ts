import { describe, it, expect } from 'vitest';
import { disassemble, formatListing } from '../../src/tools/disassemble';

describe('disassemble', () => {
  it('lists one word per line from the entry point', () => {
    const lines = disassemble([0x6a, 0x05, 0xd1, 0x25, 0x12]);
    expect(lines).toEqual([
      { address: 0x200, word: 0x6a05, mnemonic: 'LD VA, 0x5' },
      { address: 0x202, word: 0xd125, mnemonic: 'DRW V1, V2, 0x5' },
      { address: 0x204, word: null, mnemonic: 'DB 0x12' },
    ]);
  });

  it('formats a listing', () => {
    const text = formatListing(disassemble([0x6a, 0x05, 0x12], 0x300));
    expect(text.split('\n')).toEqual([
      '0x0300  6A05  LD VA, 0x5',
      '0x0302        DB 0x12',
    ]);
  });
});
