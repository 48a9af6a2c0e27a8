import { Emulator } from './core';
import { loadConfig } from './config';

export type TickErrorMode = 'ignore' | 'throw' | 'record';

export interface SchedulerOptions {
  ticksPerFrame?: number;
  onError?: TickErrorMode;
  traceEvery?: number; // if >0, log emulator state every N ticks
}

// Deterministic stepper for headless runs and tests: a "frame" is a fixed batch of ticks.
// No wall-clock pacing; the caller decides how often to call stepFrame.
export class Scheduler {
  readonly ticksPerFrame: number;
  private onError: TickErrorMode;
  private traceEvery: number;
  lastError: unknown = undefined;
  tickCount = 0;

  constructor(private emu: Emulator, opts: SchedulerOptions = {}) {
    this.ticksPerFrame = Math.max(1, opts.ticksPerFrame ?? loadConfig().ticksPerFrame) | 0;
    this.onError = opts.onError ?? 'record';
    this.traceEvery = Math.max(0, opts.traceEvery ?? 0) | 0;
  }

  // Returns the number of ticks executed this frame
  stepFrame(): number {
    if (this.onError === 'record' && this.lastError !== undefined) return 0;
    let done = 0;
    for (let t = 0; t < this.ticksPerFrame; t++) {
      try {
        this.emu.tick();
      } catch (e) {
        this.lastError = e;
        if (this.onError === 'throw') throw e;
        if (this.onError === 'record') break;
        continue;
      }
      done++;
      this.tickCount++;
      if (this.traceEvery > 0 && (this.tickCount % this.traceEvery) === 0) {
        // eslint-disable-next-line no-console
        console.log(`[TRACE] #${this.tickCount} ${this.emu.describe()}`);
      }
    }
    return done;
  }

  runFrames(frames: number): number {
    let total = 0;
    for (let f = 0; f < frames; f++) total += this.stepFrame();
    return total;
  }

  clearError(): void {
    this.lastError = undefined;
  }
}
