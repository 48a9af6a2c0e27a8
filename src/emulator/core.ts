import { Address } from '../memory/address';
import { Memory, MAX_ROM_SIZE, GLYPH_BYTES, FONT_BASE } from '../memory/memory';
import { Stack } from '../cpu/stack';
import { Opcode } from '../cpu/opcode';
import { RandGen } from '../cpu/rand';
import { Display, HEIGHT } from '../display/display';
import { Keyboard, KEY_COUNT } from '../input/keyboard';
import { bcd } from '../utils/bcd';
import { createConsoleLogger, type Logger } from '../utils/log';
import { RomTooLargeError } from './errors';
import { loadConfig } from './config';
import { FLAGS_REGISTER, REGISTER_COUNT, type ExecState, type IEmulator } from './types';

export interface EmulatorOptions {
  stackDepth?: number;
  seed?: bigint;
  rand?: RandGen; // takes precedence over seed
  logger?: Logger;
}

export class Emulator implements IEmulator {
  // Registers
  pc: Address = Address.entryPoint();
  i: Address = new Address(0);
  readonly v = new Uint8Array(REGISTER_COUNT);
  soundTimer = 0;
  delayTimer = 0;
  // Memory segments
  readonly stack: Stack<Address>;
  readonly memory = new Memory();
  // Devices
  readonly display = new Display();
  readonly keyboard = new Keyboard();

  private readonly rand: RandGen;
  private readonly logger: Logger;
  private execState: ExecState = { kind: 'new' };

  constructor(opts: EmulatorOptions = {}) {
    const config = loadConfig();
    this.stack = new Stack<Address>(opts.stackDepth ?? config.stackDepth);
    this.rand = opts.rand ?? new RandGen(opts.seed ?? config.seed);
    this.logger = opts.logger ?? createConsoleLogger('CHIP8', config.logLevel);
  }

  get state(): ExecState {
    return this.execState;
  }

  // Resets registers, stack and display, then writes font and program. Throws before touching state if too large.
  loadRom(bytes: ArrayLike<number>): void {
    if (bytes.length > MAX_ROM_SIZE) throw new RomTooLargeError(bytes.length, MAX_ROM_SIZE);
    this.pc = Address.entryPoint();
    this.i = new Address(0);
    this.delayTimer = 0;
    this.soundTimer = 0;
    this.v.fill(0);
    this.stack.clear();
    this.display.clear();
    this.memory.loadRom(bytes);
    this.execState = { kind: 'running' };
    this.logger.info(`Loaded ROM (${bytes.length} bytes)`);
  }

  tick(): void {
    const st = this.execState;
    switch (st.kind) {
      case 'new':
        return;
      case 'waitingKey': {
        let key = -1;
        for (let k = 0; k < KEY_COUNT; k++) {
          if (this.keyboard.isSet(k)) { key = k; break; }
        }
        if (key < 0) return;
        this.v[st.x] = key;
        this.execState = { kind: 'running' };
        break;
      }
      case 'running':
        break;
    }

    if (this.soundTimer > 0) this.soundTimer--;
    if (this.delayTimer > 0) this.delayTimer--;

    const opcode = this.fetchOpcode();
    if (this.logger.enabled('debug')) this.logger.debug(`| ${this.pc} | ${opcode}`);
    this.executeOpcode(opcode);
  }

  fetchOpcode(): Opcode {
    const buf = new Uint8Array(2);
    this.memory.writeRange(this.pc, buf);
    return Opcode.fromBytes(buf[0], buf[1]);
  }

  executeOpcode(opcode: Opcode): void {
    const V = this.v;
    const F = FLAGS_REGISTER;
    const skipIf = (cond: boolean): void => { if (cond) this.pc.addAssign(2); };

    this.pc.addAssign(2);

    const ins = opcode.decode();
    switch (ins.op) {
      case 'CLS': this.display.clear(); break;
      case 'RET': this.pc = this.stack.pop(); break;
      case 'JP': this.pc = new Address(ins.addr); break;
      case 'SYS':
      case 'CALL':
        this.stack.push(this.pc.clone());
        this.pc = new Address(ins.addr);
        break;
      case 'SE_BYTE': skipIf(V[ins.x] === ins.kk); break;
      case 'SNE_BYTE': skipIf(V[ins.x] !== ins.kk); break;
      case 'SE_REG': skipIf(V[ins.x] === V[ins.y]); break;
      case 'LD_BYTE': V[ins.x] = ins.kk; break;
      case 'ADD_BYTE': V[ins.x] = (V[ins.x] + ins.kk) & 0xff; break;
      case 'LD_REG': V[ins.x] = V[ins.y]; break;
      case 'OR': V[ins.x] |= V[ins.y]; break;
      case 'AND': V[ins.x] &= V[ins.y]; break;
      case 'XOR': V[ins.x] ^= V[ins.y]; break;
      case 'ADD_REG': {
        const sum = V[ins.x] + V[ins.y];
        V[ins.x] = sum & 0xff;
        V[F] = sum > 0xff ? 1 : 0;
        break;
      }
      case 'SUB':
        V[F] = V[ins.x] > V[ins.y] ? 1 : 0;
        V[ins.x] = (V[ins.x] - V[ins.y]) & 0xff;
        break;
      case 'SHR':
        V[F] = V[ins.x] & 1;
        V[ins.x] >>= 1;
        break;
      case 'SUBN':
        V[F] = V[ins.y] > V[ins.x] ? 1 : 0;
        V[ins.x] = (V[ins.y] - V[ins.x]) & 0xff;
        break;
      case 'SHL':
        V[F] = (V[ins.x] >> 7) & 1;
        V[ins.x] = (V[ins.x] << 1) & 0xff;
        break;
      case 'SNE_REG': skipIf(V[ins.x] !== V[ins.y]); break;
      case 'LD_I': this.i = new Address(ins.addr); break;
      // Relative to the already-advanced pc, not an absolute jump
      case 'JP_V0': this.pc.addAssign(ins.addr + V[0]); break;
      case 'RND': V[ins.x] = this.rand.next() & ins.kk; break;
      case 'DRW': {
        V[F] = 0;
        const x = V[ins.x];
        const y = V[ins.y];
        for (let row = 0; row < ins.n; row++) {
          const sprite = this.memory.read8(Address.checked(this.i.inner() + row));
          V[F] |= this.display.set(x, (y % HEIGHT) + row, sprite);
        }
        break;
      }
      case 'SKP': skipIf(this.keyboard.isSet(V[ins.x])); break;
      case 'SKNP': skipIf(!this.keyboard.isSet(V[ins.x])); break;
      case 'LD_VX_DT': V[ins.x] = this.delayTimer; break;
      case 'LD_VX_K': this.execState = { kind: 'waitingKey', x: ins.x }; break;
      case 'LD_DT_VX': this.delayTimer = V[ins.x]; break;
      case 'LD_ST_VX': this.soundTimer = V[ins.x]; break;
      case 'ADD_I_VX': this.i.addAssign(V[ins.x]); break;
      case 'LD_F_VX': this.i = new Address(FONT_BASE + V[ins.x] * GLYPH_BYTES); break;
      case 'LD_B_VX': this.memory.readRange(this.i, bcd(V[ins.x])); break;
      case 'LD_I_VX': this.memory.readRange(this.i, V.subarray(0, ins.x + 1)); break;
      case 'LD_VX_I': this.memory.writeRange(this.i, V.subarray(0, ins.x + 1)); break;
      case 'INVALID':
        this.logger.error(`Unrecognized opcode | ${this.pc} | ${opcode}`);
        break;
    }
  }

  // One-line register dump for traces
  describe(): string {
    const regs = Array.from(this.v, (r, idx) => `V${idx.toString(16).toUpperCase()}=${r.toString(16).padStart(2, '0')}`).join(' ');
    return `PC=${this.pc} I=${this.i} ${regs} DT=${this.delayTimer} ST=${this.soundTimer} SP=${this.stack.depth} state=${this.execState.kind}`;
  }
}
