export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface IMemoryBus {
  read8(addr: number): Byte;
  read16(addr: number): Word; // big-endian: CHIP-8 instructions are stored high byte first
  write8(addr: number, value: Byte): void;
  write16(addr: number, value: Word): void;
}

export interface IEmulator {
  reset(): void;
  stepInstruction(): void; // fetch, decode and execute exactly one instruction
  tickTimers(): void; // one 60Hz timer tick
}
