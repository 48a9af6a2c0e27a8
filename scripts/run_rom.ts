import { Emulator } from '../src/emulator/core';
import { Scheduler, type TickErrorMode } from '../src/emulator/scheduler';
import { loadConfig } from '../src/emulator/config';
import { readRomFile } from '../src/tools/romFile';
import { writePNG } from '../src/tools/screenshot';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

function parseErrorMode(raw: string | undefined): TickErrorMode {
  return raw === 'throw' || raw === 'ignore' ? raw : 'record';
}

function main(): void {
  const args = parseArgs(process.argv);
  const romPath = args.rom || process.env.CHIP8_ROM;
  const config = loadConfig();
  const outPath = args.out || 'frame.png';
  const frames = Number.isFinite(Number(args.frames)) ? Math.max(1, Number(args.frames)) : 60;
  const ticks = Number.isFinite(Number(args.ticks)) ? Math.max(1, Number(args.ticks)) : config.ticksPerFrame;
  const scale = Number.isFinite(Number(args.scale)) ? Math.max(1, Number(args.scale)) : 8;
  const keys = args.keys ? parseInt(args.keys.replace(/^0x/i, ''), 16) : 0;
  const traceEvery = Number.isFinite(Number(args.trace)) ? Math.max(0, Number(args.trace)) : 0;
  const onError = parseErrorMode(args.onError);

  if (!romPath) {
    console.error('Usage: npm run run-rom -- --rom=path/to/game.ch8 [--out=frame.png] [--frames=60] [--ticks=10] [--keys=hexmask] [--scale=8] [--trace=N] [--onError=record|throw|ignore]');
    process.exit(1);
  }

  console.log(`[run-rom] ROM: ${romPath}  out: ${outPath}  frames: ${frames}  ticks/frame: ${ticks}  keys: 0x${(keys & 0xffff).toString(16)}  onError=${onError}`);

  const emu = new Emulator();
  emu.loadRom(readRomFile(romPath));
  if (Number.isFinite(keys)) emu.keyboard.setMask(keys);

  const sched = new Scheduler(emu, { ticksPerFrame: ticks, onError, traceEvery });
  sched.runFrames(frames);
  if (sched.lastError !== undefined) console.error('[run-rom] error during stepping:', sched.lastError);

  writePNG(emu.display, outPath, scale);
  console.log(`Wrote ${outPath} after ${sched.tickCount} ticks (lit=${emu.display.litCount()}, sound=${emu.soundTimer})`);
}

try {
  main();
} catch (e) {
  console.error('[run-rom] Unhandled error:', e);
  process.exit(1);
}
