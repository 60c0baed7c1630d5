import type { Emulator } from '../emulator/core';
import type { Memory } from '../bus/memory';

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// Classic hex dump: "0200  00 E0 60 05 ...". The range is clipped to memory.
export function formatMemory(memory: Memory, start: number, length: number, bytesPerRow = 16): string[] {
  const from = Math.max(0, start);
  const to = Math.min(memory.size, start + length);
  const lines: string[] = [];
  for (let row = from; row < to; row += bytesPerRow) {
    const bytes = memory.slice(row, Math.min(bytesPerRow, to - row));
    lines.push(`${hex(row, 4)}  ${Array.from(bytes, (b) => hex(b, 2)).join(' ')}`);
  }
  return lines;
}

export function formatRegisters(emu: Emulator): string[] {
  const s = emu.cpu.state;
  const regs = Array.from(s.V, (v, i) => `V${i.toString(16).toUpperCase()}=${hex(v, 2)}`);
  return [
    regs.slice(0, 8).join(' '),
    regs.slice(8).join(' '),
    `PC=${hex(s.PC, 3)} I=${hex(s.I, 3)} SP=${emu.cpu.stack.depth} DT=${hex(emu.timers.delay.value, 2)} ST=${hex(emu.timers.sound.value, 2)}`,
  ];
}

// Everything a host prints after a fatal fault.
export function formatCrashReport(emu: Emulator, error: unknown): string[] {
  const message = error instanceof Error ? error.message : String(error);
  const pc = emu.cpu.state.PC;
  const around = Math.max(0, (pc & ~0xf) - 0x10);
  return [message, ...formatRegisters(emu), ...formatMemory(emu.memory, around, 0x30)];
}
