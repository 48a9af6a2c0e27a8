import { parseLogLevel, type LogLevel } from '../utils/log';
import { DEFAULT_STACK_DEPTH } from '../cpu/stack';

export interface EmulatorConfig {
  logLevel: LogLevel;
  trace: boolean; // log every executed instruction
  stackDepth: number;
  seed?: bigint;
  ticksPerFrame: number;
}

type Env = Record<string, string | undefined>;

const isOn = (v: string | undefined): boolean => v === '1' || v === 'true';

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const v = Number(raw);
  return Number.isFinite(v) && v > 0 ? Math.floor(v) : fallback;
}

// Accepts decimal or 0x-prefixed hex
export function parseSeed(raw: string | undefined): bigint | undefined {
  const cleaned = (raw ?? '').trim().toLowerCase();
  if (!/^(0x[0-9a-f]+|[0-9]+)$/.test(cleaned)) return undefined;
  return BigInt(cleaned);
}

export function loadConfig(env: Env = process.env): EmulatorConfig {
  const trace = isOn(env.CHIP8_TRACE);
  return {
    logLevel: trace ? 'debug' : parseLogLevel(env.CHIP8_LOG_LEVEL),
    trace,
    stackDepth: parsePositiveInt(env.CHIP8_STACK_DEPTH, DEFAULT_STACK_DEPTH),
    seed: parseSeed(env.CHIP8_SEED),
    ticksPerFrame: parsePositiveInt(env.CHIP8_TICKS_PER_FRAME, 10),
  };
}
