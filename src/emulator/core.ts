import { Memory } from '../bus/memory';
import { Chip8CPU, type ExecutedInstruction } from '../cpu/chip8cpu';
import { Display } from '../display/display';
import { Keypad } from '../input/keypad';
import { Timers } from '../timing/timers';
import { validateProgram } from '../rom/loader';
import type { IEmulator } from './types';
import { PROGRAM_START, resolveQuirks, type EmulatorOptions, type Quirks } from './config';

// One emulation session. All machine state hangs off this instance; nothing is global.
export class Emulator implements IEmulator {
  readonly memory = new Memory();
  readonly display = new Display();
  readonly keypad = new Keypad();
  readonly timers = new Timers();
  readonly quirks: Readonly<Quirks>;
  readonly cpu: Chip8CPU;
  private program: Uint8Array = new Uint8Array(0);

  constructor(opts: EmulatorOptions = {}) {
    this.quirks = resolveQuirks(opts.quirks);
    this.cpu = new Chip8CPU(
      { memory: this.memory, display: this.display, keypad: this.keypad, timers: this.timers },
      this.quirks,
      opts.random,
    );
    this.memory.loadFont();
  }

  static fromProgram(program: Uint8Array, opts: EmulatorOptions = {}): Emulator {
    const emu = new Emulator(opts);
    emu.loadProgram(program);
    return emu;
  }

  // Throws LoadError before touching memory if the program does not fit.
  loadProgram(program: Uint8Array): void {
    validateProgram(program);
    this.program = program.slice();
    this.reset();
  }

  // Back to power-on state with the last loaded program in place.
  reset(): void {
    this.memory.clear();
    this.memory.loadFont();
    this.memory.load(PROGRAM_START, this.program);
    this.display.clear();
    this.keypad.releaseAll();
    this.timers.reset();
    this.cpu.reset();
  }

  stepInstruction(): ExecutedInstruction {
    return this.cpu.stepInstruction();
  }

  tickTimers(ticks = 1): void {
    this.timers.tick(ticks);
  }

  // Audio collaborator signal.
  isSoundActive(): boolean {
    return this.timers.sound.isActive;
  }

  get programSize(): number {
    return this.program.length;
  }
}
