import type { Byte, Word } from '../emulator/types';
import type { Memory } from '../bus/memory';
import type { Display } from '../display/display';
import type { Keypad } from '../input/keypad';
import type { Timers } from '../timing/timers';
import type { Quirks } from '../emulator/config';
import { MEMORY_SIZE, PROGRAM_START, REGISTER_COUNT, randomByte } from '../emulator/config';
import { MemoryOutOfBoundsError } from '../emulator/errors';
import { glyphAddress } from '../bus/font';
import { CallStack } from './stack';
import { decode, type Instruction } from './opcodes';

export interface CPUState {
  V: Uint8Array; // V0..VF; VF doubles as carry/borrow/collision flag
  I: Word; // index register
  PC: Word; // address of the next instruction to fetch
}

export interface CPUDevices {
  memory: Memory;
  display: Display;
  keypad: Keypad;
  timers: Timers;
}

// What the dispatcher does with PC once a handler returns.
export type Flow = 'next' | 'skip' | 'wait' | { jump: Word };

export interface ExecutedInstruction {
  address: Word;
  opcode: Word;
  instruction: Instruction;
}

interface KeyWait {
  pc: Word;
  previous: boolean[];
}

const VF = 0xf;

function checkTarget(addr: number): Word {
  if (addr < 0 || addr > MEMORY_SIZE - 2) throw new MemoryOutOfBoundsError(addr);
  return addr;
}

export class Chip8CPU {
  readonly state: CPUState = { V: new Uint8Array(REGISTER_COUNT), I: 0, PC: PROGRAM_START };
  readonly stack = new CallStack();
  private keyWait: KeyWait | null = null;

  constructor(
    private readonly devices: CPUDevices,
    private readonly quirks: Quirks,
    private readonly random: () => number = randomByte,
  ) {}

  reset(): void {
    this.state.V.fill(0);
    this.state.I = 0;
    this.state.PC = PROGRAM_START;
    this.stack.reset();
    this.keyWait = null;
  }

  get isWaitingForKey(): boolean {
    return this.keyWait !== null;
  }

  // Fetch [PC, PC+1], decode, execute, then commit the new PC. If anything throws,
  // PC still addresses the faulting instruction.
  stepInstruction(): ExecutedInstruction {
    const pc = this.state.PC;
    const opcode = this.devices.memory.read16(pc);
    const instruction = decode(opcode, pc);
    const flow = this.execute(instruction, pc);
    this.commit(pc, flow);
    return { address: pc, opcode, instruction };
  }

  private commit(pc: Word, flow: Flow): void {
    let next: number;
    if (flow === 'next') next = pc + 2;
    else if (flow === 'skip') next = pc + 4;
    else if (flow === 'wait') next = pc;
    else next = flow.jump;
    this.state.PC = checkTarget(next);
  }

  private execute(ins: Instruction, pc: Word): Flow {
    switch (ins.kind) {
      case 'CLS': return this.clearScreen();
      case 'RET': return this.ret(pc);
      case 'JP': return { jump: ins.nnn };
      case 'CALL': return this.call(ins.nnn, pc);
      case 'JP_V0': return { jump: ins.nnn + this.state.V[0] };
      case 'SE_IMM': return this.skipIf(this.state.V[ins.x] === ins.nn);
      case 'SNE_IMM': return this.skipIf(this.state.V[ins.x] !== ins.nn);
      case 'SE_REG': return this.skipIf(this.state.V[ins.x] === this.state.V[ins.y]);
      case 'SNE_REG': return this.skipIf(this.state.V[ins.x] !== this.state.V[ins.y]);
      case 'LD_IMM': return this.setV(ins.x, ins.nn);
      case 'ADD_IMM': return this.setV(ins.x, this.state.V[ins.x] + ins.nn);
      case 'LD_REG': return this.setV(ins.x, this.state.V[ins.y]);
      case 'OR': return this.setV(ins.x, this.state.V[ins.x] | this.state.V[ins.y]);
      case 'AND': return this.setV(ins.x, this.state.V[ins.x] & this.state.V[ins.y]);
      case 'XOR': return this.setV(ins.x, this.state.V[ins.x] ^ this.state.V[ins.y]);
      case 'ADD_REG': return this.addWithCarry(ins.x, ins.y);
      case 'SUB': return this.subtract(ins.x, this.state.V[ins.x], this.state.V[ins.y]);
      case 'SUBN': return this.subtract(ins.x, this.state.V[ins.y], this.state.V[ins.x]);
      case 'SHR': return this.shiftRight(ins.x, ins.y);
      case 'SHL': return this.shiftLeft(ins.x, ins.y);
      case 'LD_I':
        this.state.I = ins.nnn;
        return 'next';
      case 'RND': return this.setV(ins.x, (this.random() & 0xff) & ins.nn);
      case 'DRW': return this.draw(ins.x, ins.y, ins.n);
      case 'SKP': return this.skipIf(this.devices.keypad.isPressed(this.state.V[ins.x] & 0xf));
      case 'SKNP': return this.skipIf(!this.devices.keypad.isPressed(this.state.V[ins.x] & 0xf));
      case 'LD_VX_DT': return this.setV(ins.x, this.devices.timers.delay.value);
      case 'LD_KEY': return this.waitForKey(ins.x, pc);
      case 'LD_DT':
        this.devices.timers.delay.set(this.state.V[ins.x]);
        return 'next';
      case 'LD_ST':
        this.devices.timers.sound.set(this.state.V[ins.x]);
        return 'next';
      case 'ADD_I':
        this.state.I = (this.state.I + this.state.V[ins.x]) & 0xffff;
        return 'next';
      case 'LD_FONT':
        this.state.I = glyphAddress(this.state.V[ins.x]);
        return 'next';
      case 'BCD': return this.storeBcd(ins.x);
      case 'STORE': return this.storeRegisters(ins.x);
      case 'LOAD': return this.loadRegisters(ins.x);
      default: {
        const unreachable: never = ins;
        return unreachable;
      }
    }
  }

  private setV(x: number, value: number): Flow {
    this.state.V[x] = value & 0xff;
    return 'next';
  }

  // Result first, flag second: with X = F the flag is what remains in VF.
  private setWithFlag(x: number, value: number, flag: boolean | number): Flow {
    this.state.V[x] = value & 0xff;
    this.state.V[VF] = flag ? 1 : 0;
    return 'next';
  }

  private skipIf(cond: boolean): Flow {
    return cond ? 'skip' : 'next';
  }

  private clearScreen(): Flow {
    this.devices.display.clear();
    return 'next';
  }

  // Targets are validated before the stack changes, so a faulting CALL or RET leaves it intact.
  private call(target: Word, pc: Word): Flow {
    checkTarget(target);
    this.stack.push(pc + 2, pc);
    return { jump: target };
  }

  private ret(pc: Word): Flow {
    checkTarget(this.stack.peek(pc));
    return { jump: this.stack.pop(pc) };
  }

  private addWithCarry(x: number, y: number): Flow {
    const sum = this.state.V[x] + this.state.V[y];
    return this.setWithFlag(x, sum, sum > 0xff);
  }

  // VF = 1 when no borrow occurs.
  private subtract(x: number, minuend: Byte, subtrahend: Byte): Flow {
    return this.setWithFlag(x, minuend - subtrahend, minuend >= subtrahend);
  }

  private shiftSource(x: number, y: number): Byte {
    return this.quirks.shiftUsesVy ? this.state.V[y] : this.state.V[x];
  }

  private shiftRight(x: number, y: number): Flow {
    const src = this.shiftSource(x, y);
    return this.setWithFlag(x, src >>> 1, src & 1);
  }

  private shiftLeft(x: number, y: number): Flow {
    const src = this.shiftSource(x, y);
    return this.setWithFlag(x, src << 1, (src >>> 7) & 1);
  }

  private draw(x: number, y: number, n: number): Flow {
    const rows = this.devices.memory.slice(this.state.I, n);
    const collision = this.devices.display.drawSprite(this.state.V[x], this.state.V[y], rows, {
      wrapVertically: this.quirks.wrapSpritesVertically,
    });
    this.state.V[VF] = collision ? 1 : 0;
    return 'next';
  }

  // FX0A: PC is held until a key goes down (or up, under keyWaitOnRelease) between
  // two steps. The first execution only records the keypad; the instruction is
  // re-executed every step, so timers keep running meanwhile.
  private waitForKey(x: number, pc: Word): Flow {
    const now = this.devices.keypad.snapshot();
    const wait = this.keyWait && this.keyWait.pc === pc ? this.keyWait : null;
    let key = -1;
    if (wait) {
      const release = this.quirks.keyWaitOnRelease;
      key = now.findIndex((down, k) => (release ? wait.previous[k] && !down : down && !wait.previous[k]));
    }
    if (key < 0) {
      this.keyWait = { pc, previous: now };
      return 'wait';
    }
    this.keyWait = null;
    return this.setV(x, key);
  }

  private storeBcd(x: number): Flow {
    const v = this.state.V[x];
    this.devices.memory.load(this.state.I, [Math.floor(v / 100), Math.floor(v / 10) % 10, v % 10]);
    return 'next';
  }

  private storeRegisters(x: number): Flow {
    this.devices.memory.load(this.state.I, this.state.V.subarray(0, x + 1));
    if (this.quirks.memoryIncrementsIndex) this.state.I = (this.state.I + x + 1) & 0xffff;
    return 'next';
  }

  private loadRegisters(x: number): Flow {
    const bytes = this.devices.memory.slice(this.state.I, x + 1);
    this.state.V.set(bytes, 0);
    if (this.quirks.memoryIncrementsIndex) this.state.I = (this.state.I + x + 1) & 0xffff;
    return 'next';
  }
}
