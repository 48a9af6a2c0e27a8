// Three decimal digits of a byte, hundreds first
export function bcd(value: number): [number, number, number] {
  const v = value & 0xff;
  return [Math.floor(v / 100), Math.floor(v / 10) % 10, v % 10];
}
