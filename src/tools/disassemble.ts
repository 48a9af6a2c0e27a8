import { Opcode } from '../cpu/opcode';
import { ENTRY_POINT } from '../memory/address';

export interface ListingLine {
  address: number;
  word: number | null; // null for a trailing odd byte
  mnemonic: string;
}

export function disassemble(bytes: ArrayLike<number>, origin = ENTRY_POINT): ListingLine[] {
  const out: ListingLine[] = [];
  let off = 0;
  for (; off + 1 < bytes.length; off += 2) {
    const op = Opcode.fromBytes(bytes[off], bytes[off + 1]);
    out.push({ address: origin + off, word: op.word, mnemonic: op.toString() });
  }
  if (off < bytes.length) {
    const b = bytes[off] & 0xff;
    out.push({ address: origin + off, word: null, mnemonic: `DB 0x${b.toString(16).toUpperCase().padStart(2, '0')}` });
  }
  return out;
}

export function formatListing(lines: readonly ListingLine[]): string {
  return lines.map((l) => {
    const addr = `0x${l.address.toString(16).toUpperCase().padStart(4, '0')}`;
    const word = l.word === null ? '    ' : l.word.toString(16).toUpperCase().padStart(4, '0');
    return `${addr}  ${word}  ${l.mnemonic}`;
  }).join('\n');
}
