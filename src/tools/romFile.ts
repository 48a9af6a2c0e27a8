import fs from 'fs';

export function readRomFile(path: string): Uint8Array {
  const raw = fs.readFileSync(path);
  return new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength);
}
