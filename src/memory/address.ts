import { AddressOutOfRangeError } from '../emulator/errors';

export const ADDRESS_SPACE = 0x1000; // 12-bit
export const ADDRESS_MASK = 0x0fff;
export const ENTRY_POINT = 0x200;

// 12-bit pointer used for pc and I. Construction masks; addAssign surfaces overflow.
export class Address {
  private value: number;

  constructor(raw: number) {
    this.value = raw & ADDRESS_MASK;
  }

  static entryPoint(): Address {
    return new Address(ENTRY_POINT);
  }

  // Checked conversion for computed indices (e.g. I + row)
  static checked(raw: number): Address {
    if (raw < 0 || raw > ADDRESS_MASK) throw new AddressOutOfRangeError(raw);
    return new Address(raw);
  }

  inner(): number {
    return this.value;
  }

  addAssign(delta: number): void {
    const next = this.value + delta;
    if (next > ADDRESS_MASK) throw new AddressOutOfRangeError(next);
    this.value = next;
  }

  clone(): Address {
    return new Address(this.value);
  }

  toString(): string {
    return `0x${this.value.toString(16).toUpperCase()}`;
  }
}
