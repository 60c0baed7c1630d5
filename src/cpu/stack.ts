import { StackOverflowError, StackUnderflowError } from '../emulator/errors';
import { STACK_CAPACITY } from '../emulator/config';

// Bounded return-address stack used by CALL/RET.
export class CallStack {
  private frames: number[] = [];

  constructor(readonly capacity = STACK_CAPACITY) {}

  get depth(): number {
    return this.frames.length;
  }

  // pc is only used for the error report
  push(returnAddr: number, pc: number): void {
    if (this.frames.length >= this.capacity) throw new StackOverflowError(pc, this.frames.length);
    this.frames.push(returnAddr & 0xffff);
  }

  peek(pc: number): number {
    const addr = this.frames[this.frames.length - 1];
    if (addr === undefined) throw new StackUnderflowError(pc, 0);
    return addr;
  }

  pop(pc: number): number {
    const addr = this.peek(pc);
    this.frames.pop();
    return addr;
  }

  peekAll(): readonly number[] {
    return this.frames.slice();
  }

  reset(): void {
    this.frames = [];
  }
}
