import { readRomFile } from '../src/tools/romFile';
import { disassemble, formatListing } from '../src/tools/disassemble';

const m = process.argv.slice(2).map((a) => a.match(/^--rom=(.*)$/)).find((x) => x !== null);
const romPath = m ? m[1] : process.env.CHIP8_ROM;
if (!romPath) {
  console.error('Usage: npm run disasm -- --rom=path/to/game.ch8');
  process.exit(1);
}
console.log(formatListing(disassemble(readRomFile(romPath))));
