// 128-bit linear congruential generator; next() yields the low byte of the state.
const MULTIPLIER = 6364136223846793005n;
const INCREMENT = 1442695040888963407n;
const WRAP = (1n << 128n) - 1n; // arithmetic wraps at 2^128
const MODULUS = (1n << 128n) - 1n;
export const FALLBACK_SEED = 5555n;

export function epochMicros(now: () => number = Date.now): bigint {
  const ms = now();
  if (!Number.isFinite(ms) || ms < 0) return FALLBACK_SEED;
  return BigInt(Math.floor(ms)) * 1000n;
}

export class RandGen {
  private state: bigint;

  constructor(seed: bigint = epochMicros()) {
    this.state = seed & WRAP;
  }

  next(): number {
    this.state = ((MULTIPLIER * this.state + INCREMENT) & WRAP) % MODULUS;
    return Number(this.state & 0xffn);
  }
}
