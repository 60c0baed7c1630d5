import { Emulator } from '../../src/emulator/core';
import type { EmulatorOptions } from '../../src/emulator/config';

// Assemble 16-bit instruction words into a big-endian program image.
export function program(words: readonly number[]): Uint8Array {
  const out = new Uint8Array(words.length * 2);
  words.forEach((w, i) => {
    out[i * 2] = (w >>> 8) & 0xff;
    out[i * 2 + 1] = w & 0xff;
  });
  return out;
}

export function machine(words: readonly number[], opts: EmulatorOptions = {}): Emulator {
  return Emulator.fromProgram(program(words), opts);
}

export function steps(emu: Emulator, n: number): void {
  for (let i = 0; i < n; i++) emu.stepInstruction();
}
