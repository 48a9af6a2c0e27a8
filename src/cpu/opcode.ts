import type { Word } from '../emulator/types';

export type Nibbles = readonly [number, number, number, number];

// One variant per base CHIP-8 instruction. Register operands are indices 0..F.
export type Instruction =
  | { op: 'CLS' }
  | { op: 'RET' }
  | { op: 'SYS'; addr: number }
  | { op: 'JP'; addr: number }
  | { op: 'CALL'; addr: number }
  | { op: 'SE_BYTE'; x: number; kk: number }
  | { op: 'SNE_BYTE'; x: number; kk: number }
  | { op: 'SE_REG'; x: number; y: number }
  | { op: 'LD_BYTE'; x: number; kk: number }
  | { op: 'ADD_BYTE'; x: number; kk: number }
  | { op: 'LD_REG'; x: number; y: number }
  | { op: 'OR'; x: number; y: number }
  | { op: 'AND'; x: number; y: number }
  | { op: 'XOR'; x: number; y: number }
  | { op: 'ADD_REG'; x: number; y: number }
  | { op: 'SUB'; x: number; y: number }
  | { op: 'SHR'; x: number }
  | { op: 'SUBN'; x: number; y: number }
  | { op: 'SHL'; x: number }
  | { op: 'SNE_REG'; x: number; y: number }
  | { op: 'LD_I'; addr: number }
  | { op: 'JP_V0'; addr: number }
  | { op: 'RND'; x: number; kk: number }
  | { op: 'DRW'; x: number; y: number; n: number }
  | { op: 'SKP'; x: number }
  | { op: 'SKNP'; x: number }
  | { op: 'LD_VX_DT'; x: number }
  | { op: 'LD_VX_K'; x: number }
  | { op: 'LD_DT_VX'; x: number }
  | { op: 'LD_ST_VX'; x: number }
  | { op: 'ADD_I_VX'; x: number }
  | { op: 'LD_F_VX'; x: number }
  | { op: 'LD_B_VX'; x: number }
  | { op: 'LD_I_VX'; x: number } // store V0..Vx at [I]
  | { op: 'LD_VX_I'; x: number } // load V0..Vx from [I]
  | { op: 'INVALID'; word: Word };

export type InstructionKind = Instruction['op'];

const hex = (v: number): string => `0x${v.toString(16).toUpperCase()}`;
const reg = (r: number): string => `V${r.toString(16).toUpperCase()}`;

// Raw big-endian instruction word with nibble/operand accessors
export class Opcode {
  readonly word: Word;

  constructor(word: Word) {
    this.word = word & 0xffff;
  }

  static fromBytes(upper: number, lower: number): Opcode {
    return new Opcode(((upper & 0xff) << 8) | (lower & 0xff));
  }

  nibbles(): Nibbles {
    const w = this.word;
    return [(w >> 12) & 0xf, (w >> 8) & 0xf, (w >> 4) & 0xf, w & 0xf];
  }

  get nnn(): number { return this.word & 0x0fff; }
  get kk(): number { return this.word & 0xff; }
  get x(): number { return (this.word >> 8) & 0xf; }
  get y(): number { return (this.word >> 4) & 0xf; }
  get n(): number { return this.word & 0xf; }

  decode(): Instruction {
    const [n0, x, y, n] = this.nibbles();
    const addr = this.nnn;
    const kk = this.kk;
    switch (n0) {
      case 0x0:
        if (this.word === 0x00e0) return { op: 'CLS' };
        if (this.word === 0x00ee) return { op: 'RET' };
        return { op: 'SYS', addr };
      case 0x1: return { op: 'JP', addr };
      case 0x2: return { op: 'CALL', addr };
      case 0x3: return { op: 'SE_BYTE', x, kk };
      case 0x4: return { op: 'SNE_BYTE', x, kk };
      case 0x5:
        if (n === 0) return { op: 'SE_REG', x, y };
        break;
      case 0x6: return { op: 'LD_BYTE', x, kk };
      case 0x7: return { op: 'ADD_BYTE', x, kk };
      case 0x8:
        switch (n) {
          case 0x0: return { op: 'LD_REG', x, y };
          case 0x1: return { op: 'OR', x, y };
          case 0x2: return { op: 'AND', x, y };
          case 0x3: return { op: 'XOR', x, y };
          case 0x4: return { op: 'ADD_REG', x, y };
          case 0x5: return { op: 'SUB', x, y };
          case 0x6: return { op: 'SHR', x };
          case 0x7: return { op: 'SUBN', x, y };
          case 0xe: return { op: 'SHL', x };
        }
        break;
      case 0x9:
        if (n === 0) return { op: 'SNE_REG', x, y };
        break;
      case 0xa: return { op: 'LD_I', addr };
      case 0xb: return { op: 'JP_V0', addr };
      case 0xc: return { op: 'RND', x, kk };
      case 0xd: return { op: 'DRW', x, y, n };
      case 0xe:
        if (kk === 0x9e) return { op: 'SKP', x };
        if (kk === 0xa1) return { op: 'SKNP', x };
        break;
      case 0xf:
        switch (kk) {
          case 0x07: return { op: 'LD_VX_DT', x };
          case 0x0a: return { op: 'LD_VX_K', x };
          case 0x15: return { op: 'LD_DT_VX', x };
          case 0x18: return { op: 'LD_ST_VX', x };
          case 0x1e: return { op: 'ADD_I_VX', x };
          case 0x29: return { op: 'LD_F_VX', x };
          case 0x33: return { op: 'LD_B_VX', x };
          case 0x55: return { op: 'LD_I_VX', x };
          case 0x65: return { op: 'LD_VX_I', x };
        }
        break;
    }
    return { op: 'INVALID', word: this.word };
  }

  toString(): string {
    return mnemonic(this.decode());
  }
}

export function mnemonic(ins: Instruction): string {
  switch (ins.op) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'SYS': return `SYS ${hex(ins.addr)}`;
    case 'JP': return `JP ${hex(ins.addr)}`;
    case 'CALL': return `CALL ${hex(ins.addr)}`;
    case 'SE_BYTE': return `SE ${reg(ins.x)}, ${hex(ins.kk)}`;
    case 'SNE_BYTE': return `SNE ${reg(ins.x)}, ${hex(ins.kk)}`;
    case 'SE_REG': return `SE ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'LD_BYTE': return `LD ${reg(ins.x)}, ${hex(ins.kk)}`;
    case 'ADD_BYTE': return `ADD ${reg(ins.x)}, ${hex(ins.kk)}`;
    case 'LD_REG': return `LD ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'OR': return `OR ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'AND': return `AND ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'XOR': return `XOR ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'ADD_REG': return `ADD ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'SUB': return `SUB ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'SHR': return `SHR ${reg(ins.x)}`;
    case 'SUBN': return `SUBN ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'SHL': return `SHL ${reg(ins.x)}`;
    case 'SNE_REG': return `SNE ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'LD_I': return `LD I, ${hex(ins.addr)}`;
    case 'JP_V0': return `JP V0, ${hex(ins.addr)}`;
    case 'RND': return `RND ${reg(ins.x)}, ${hex(ins.kk)}`;
    case 'DRW': return `DRW ${reg(ins.x)}, ${reg(ins.y)}, ${hex(ins.n)}`;
    case 'SKP': return `SKP ${reg(ins.x)}`;
    case 'SKNP': return `SKNP ${reg(ins.x)}`;
    case 'LD_VX_DT': return `LD ${reg(ins.x)}, DT`;
    case 'LD_VX_K': return `LD ${reg(ins.x)}, K`;
    case 'LD_DT_VX': return `LD DT, ${reg(ins.x)}`;
    case 'LD_ST_VX': return `LD ST, ${reg(ins.x)}`;
    case 'ADD_I_VX': return `ADD I, ${reg(ins.x)}`;
    case 'LD_F_VX': return `LD F, ${reg(ins.x)}`;
    case 'LD_B_VX': return `LD B, ${reg(ins.x)}`;
    case 'LD_I_VX': return `LD [I], ${reg(ins.x)}`;
    case 'LD_VX_I': return `LD ${reg(ins.x)}, [I]`;
    case 'INVALID': {
      const w = ins.word;
      return [(w >> 12) & 0xf, (w >> 8) & 0xf, (w >> 4) & 0xf, w & 0xf].map(hex).join(' ');
    }
  }
}
