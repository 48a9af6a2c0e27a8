export const KEY_COUNT = 16;

// 16-key hex keypad held as a bitmask. The host sets keys; the emulator only queries them.
export class Keyboard {
  private state = 0;

  set(key: number): void {
    if (key < 0 || key >= KEY_COUNT) return;
    this.state |= 1 << key;
  }

  unset(key: number): void {
    if (key < 0 || key >= KEY_COUNT) return;
    this.state &= ~(1 << key) & 0xffff;
  }

  isSet(key: number): boolean {
    if (key < 0 || key >= KEY_COUNT) return false;
    return ((this.state >> key) & 1) !== 0;
  }

  setMask(mask: number): void {
    this.state = mask & 0xffff;
  }

  mask(): number {
    return this.state;
  }

  clear(): void {
    this.state = 0;
  }
}
