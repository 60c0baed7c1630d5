const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, '0');

// Base for every fault the interpreter core surfaces to its host.
export class Chip8Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownOpcodeError extends Chip8Error {
  constructor(public readonly address: number, public readonly opcode: number) {
    super(`[CPU] Unknown opcode 0x${hex(opcode, 4)} at PC=0x${hex(address, 3)}`);
  }
}

export class StackOverflowError extends Chip8Error {
  constructor(public readonly pc: number, public readonly depth: number) {
    super(`[CPU] Stack overflow at PC=0x${hex(pc, 3)} (depth ${depth})`);
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor(public readonly pc: number, public readonly depth: number) {
    super(`[CPU] Return with empty stack at PC=0x${hex(pc, 3)} (depth ${depth})`);
  }
}

export class MemoryOutOfBoundsError extends Chip8Error {
  constructor(public readonly address: number) {
    super(`[MEM] Address 0x${hex(address, 3)} is outside memory`);
  }
}

export class LoadError extends Chip8Error {
  constructor(public readonly size: number, public readonly capacity: number, reason?: string) {
    super(`[ROM] ${reason ?? `Program of ${size} bytes does not fit in ${capacity} bytes of program memory`}`);
  }
}
