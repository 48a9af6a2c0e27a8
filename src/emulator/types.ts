export type Byte = number; // 0..255
export type Word = number; // 0..65535

export const REGISTER_COUNT = 16;
export const FLAGS_REGISTER = 0xf;

// Execution state of the interpreter loop
export type ExecState =
  | { kind: 'new' }
  | { kind: 'running' }
  | { kind: 'waitingKey'; x: number };

export interface IEmulator {
  loadRom(bytes: ArrayLike<number>): void;
  tick(): void; // one fetch/decode/execute step
}
