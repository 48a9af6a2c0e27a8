export class EmulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AddressOutOfRangeError extends EmulatorError {
  constructor(readonly value: number) {
    super(`Address out of range: 0x${value.toString(16)}`);
  }
}

export class MemoryOutOfBoundsError extends EmulatorError {
  constructor(readonly start: number, readonly length: number) {
    super(`Memory access out of bounds: 0x${start.toString(16)} + ${length}`);
  }
}

export class StackOverflowError extends EmulatorError {
  constructor(readonly capacity: number) {
    super(`Stack overflow (capacity ${capacity})`);
  }
}

export class StackUnderflowError extends EmulatorError {
  constructor() {
    super('Stack underflow');
  }
}

export class RomTooLargeError extends EmulatorError {
  constructor(readonly size: number, readonly max: number) {
    super(`ROM too large: ${size} bytes (max ${max})`);
  }
}
