import { describe, it, expect } from 'vitest';
import { Address, ENTRY_POINT } from '../../src/memory/address';
import { AddressOutOfRangeError } from '../../src/emulator/errors';

describe('Address', () => {
  it('masks raw values to 12 bits', () => {
    expect(new Address(0x1234).inner()).toBe(0x234);
    expect(Address.entryPoint().inner()).toBe(ENTRY_POINT);
  });

  it('addAssign advances within the address space', () => {
    const a = new Address(0xffc);
    a.addAssign(3);
    expect(a.inner()).toBe(0xfff);
  });

  it('addAssign past 0xFFF throws and leaves the value untouched', () => {
    const a = new Address(0xffe);
    expect(() => a.addAssign(2)).toThrow(AddressOutOfRangeError);
    expect(a.inner()).toBe(0xffe);
  });

  it('checked rejects out-of-range indices', () => {
    expect(Address.checked(0xfff).inner()).toBe(0xfff);
    expect(() => Address.checked(0x1000)).toThrow(AddressOutOfRangeError);
  });

  it('clone is independent of the original', () => {
    const a = new Address(0x300);
    const b = a.clone();
    a.addAssign(2);
    expect(b.inner()).toBe(0x300);
    expect(a.toString()).toBe('0x302');
  });
});
