import type { IMemoryBus, Byte, Word } from '../emulator/types';
import { MemoryOutOfBoundsError } from '../emulator/errors';
import { MEMORY_SIZE } from '../emulator/config';
import { FONT, FONT_BASE } from './font';

// Flat 4 KiB byte store. Nothing wraps: every access outside 0x000-0xFFF throws.
export class Memory implements IMemoryBus {
  private readonly mem: Uint8Array;

  constructor(readonly size = MEMORY_SIZE) {
    this.mem = new Uint8Array(size);
  }

  private check(addr: number): number {
    if (!Number.isInteger(addr) || addr < 0 || addr >= this.size) throw new MemoryOutOfBoundsError(addr);
    return addr;
  }

  read8(addr: number): Byte {
    return this.mem[this.check(addr)];
  }

  read16(addr: number): Word {
    const hi = this.read8(addr);
    const lo = this.read8(addr + 1);
    return (hi << 8) | lo;
  }

  write8(addr: number, value: Byte): void {
    this.mem[this.check(addr)] = value & 0xff;
  }

  write16(addr: number, value: Word): void {
    this.check(addr + 1);
    this.write8(addr, (value >>> 8) & 0xff);
    this.write8(addr + 1, value & 0xff);
  }

  // Copy a block in; the whole range is validated before anything is written.
  load(addr: number, bytes: ArrayLike<number>): void {
    if (bytes.length === 0) return;
    this.check(addr);
    this.check(addr + bytes.length - 1);
    for (let i = 0; i < bytes.length; i++) this.mem[addr + i] = bytes[i] & 0xff;
  }

  slice(addr: number, length: number): Uint8Array {
    if (length <= 0) return new Uint8Array(0);
    this.check(addr);
    this.check(addr + length - 1);
    return this.mem.slice(addr, addr + length);
  }

  clear(): void {
    this.mem.fill(0);
  }

  loadFont(): void {
    this.load(FONT_BASE, FONT);
  }
}
