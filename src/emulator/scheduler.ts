import { Emulator } from './core';
import { MasterClock } from './masterClock';
import { Chip8Error } from './errors';
import { DEFAULT_IPS, TIMER_HZ } from './config';
import { disassemble } from '../cpu/disasm';
import type { ExecutedInstruction } from '../cpu/chip8cpu';

export type CpuErrorMode = 'throw' | 'record';

export interface SchedulerOptions {
  instructionsPerSecond?: number;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
  maxCatchUpMs?: number; // wall time beyond this per advance() is dropped
  onFrame?: (emu: Emulator) => void; // called after every 60Hz timer tick
  log?: (line: string) => void;
  now?: () => number; // millisecond clock for run(); defaults to performance.now
}

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// Drives one Emulator: instructions at a configurable rate, timers at a fixed 60Hz.
// Stop and reset requests are only observed between instructions.
export class Scheduler {
  private ips: number;
  private onCpuError: CpuErrorMode;
  private traceEveryInstr: number;
  private maxCatchUpMs: number;
  private onFrame?: (emu: Emulator) => void;
  private log: (line: string) => void;
  private now: () => number;
  private clock: MasterClock;
  public lastCpuError: unknown | undefined;
  private paused = false;
  private halted = false;
  private stopRequested = false;
  private execCount = 0;
  private frameCarry = 0;
  private runHandle: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly emu: Emulator, opts: SchedulerOptions = {}) {
    this.ips = Math.max(1, Math.floor(opts.instructionsPerSecond ?? DEFAULT_IPS));
    this.onCpuError = opts.onCpuError ?? 'throw';
    this.traceEveryInstr = Math.max(0, (opts.traceEveryInstr ?? Number(process.env.CHIP8_TRACE ?? '0')) | 0);
    this.maxCatchUpMs = opts.maxCatchUpMs ?? 250;
    this.onFrame = opts.onFrame;
    this.log = opts.log ?? ((line) => console.log(line));
    this.now = opts.now ?? (() => performance.now());
    this.clock = new MasterClock(this.ips);
  }

  get isPaused(): boolean { return this.paused; }
  get isHalted(): boolean { return this.halted; }
  get isRunning(): boolean { return this.runHandle !== null; }
  get instructionsExecuted(): number { return this.execCount; }
  get instructionsPerSecond(): number { return this.ips; }

  setInstructionsPerSecond(ips: number): void {
    this.ips = Math.max(1, Math.floor(ips));
    this.clock.setRate(this.ips);
    this.frameCarry = 0;
  }

  pause(): void { this.paused = true; }
  resume(): void { this.paused = false; }

  // Reinitialise machine state, reload the program and clear any recorded fault.
  reset(): void {
    this.emu.reset();
    this.halted = false;
    this.stopRequested = false;
    this.lastCpuError = undefined;
    this.execCount = 0;
    this.frameCarry = 0;
    this.clock.reset();
  }

  // Single step for debugging; ignores pause. Returns false if the machine is halted.
  stepInstruction(): boolean {
    if (this.halted) return false;
    return this.execOne();
  }

  // One 60Hz frame: the instructions due in 1/60 s, then one timer tick.
  stepFrame(): void {
    if (this.paused || this.halted) return;
    const due = this.ips / TIMER_HZ + this.frameCarry;
    const count = Math.floor(due);
    this.frameCarry = due - count;
    for (let i = 0; i < count; i++) {
      if (!this.execOne()) return;
    }
    this.tick();
  }

  // Wall-clock driven stepping with instructions and timer ticks interleaved by time.
  advance(elapsedMs: number): void {
    if (this.paused || this.halted) return;
    const ms = Math.min(Math.max(0, elapsedMs), this.maxCatchUpMs);
    this.clock.advance(ms, (ev) => {
      if (ev === 'timer') {
        this.tick();
        return true;
      }
      if (this.stopRequested || this.paused) return false;
      return this.execOne();
    });
  }

  // Real-time loop at the timer cadence. Resolves on stop() or a recorded halt,
  // rejects with the fault in 'throw' mode.
  run(): Promise<void> {
    if (this.runHandle) return Promise.reject(new Error('[scheduler] already running'));
    this.stopRequested = false;
    return new Promise<void>((resolve, reject) => {
      let last = this.now();
      this.runHandle = setInterval(() => {
        const now = this.now();
        const elapsed = now - last;
        last = now;
        try {
          this.advance(elapsed);
        } catch (e) {
          this.finishRun();
          reject(e);
          return;
        }
        if (this.stopRequested || this.halted) {
          this.finishRun();
          resolve();
        }
      }, 1000 / TIMER_HZ);
    });
  }

  stop(): void {
    this.stopRequested = true;
  }

  private finishRun(): void {
    if (this.runHandle) clearInterval(this.runHandle);
    this.runHandle = null;
    this.stopRequested = false;
  }

  private tick(): void {
    this.emu.tickTimers();
    if (this.onFrame) this.onFrame(this.emu);
  }

  private execOne(): boolean {
    try {
      const executed = this.emu.stepInstruction();
      this.execCount++;
      if (this.traceEveryInstr > 0 && (this.execCount % this.traceEveryInstr) === 0) this.trace(executed);
      return true;
    } catch (e) {
      this.lastCpuError = e;
      this.halted = true;
      if (this.onCpuError === 'throw' || !(e instanceof Chip8Error)) throw e;
      this.log(`[scheduler] halted after ${this.execCount} instructions: ${e.message}`);
      return false;
    }
  }

  private trace(executed: ExecutedInstruction): void {
    const s = this.emu.cpu.state;
    const regs = Array.from(s.V, (v) => hex(v, 2)).join(' ');
    this.log(`[TRACE] ${hex(executed.address, 3)}: ${hex(executed.opcode, 4)}  ${disassemble(executed.instruction).padEnd(16)} I=${hex(s.I, 3)} V=${regs}`);
  }
}
