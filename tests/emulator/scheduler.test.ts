import { describe, it, expect, vi, afterEach } from 'vitest';
import { Scheduler } from '../../src/emulator/scheduler';
import { UnknownOpcodeError } from '../../src/emulator/errors';
import { machine } from '../helpers/machine';

const LOOP = [0x1200]; // JP 0x200

afterEach(() => {
  vi.useRealTimers();
});

describe('Scheduler.stepFrame', () => {
  it('runs ips/60 instructions then one timer tick', () => {
    const emu = machine([0x603c, 0xf015, 0x1204]);
    const s = new Scheduler(emu, { instructionsPerSecond: 120 });
    s.stepFrame();
    expect(s.instructionsExecuted).toBe(2);
    expect(emu.timers.delay.value).toBe(59);
  });

  it('carries fractional instruction counts between frames', () => {
    const s = new Scheduler(machine(LOOP), { instructionsPerSecond: 90 });
    s.stepFrame();
    expect(s.instructionsExecuted).toBe(1);
    s.stepFrame();
    expect(s.instructionsExecuted).toBe(3);
    s.stepFrame();
    s.stepFrame();
    expect(s.instructionsExecuted).toBe(6);
  });

  it('calls onFrame after each tick', () => {
    const onFrame = vi.fn();
    const emu = machine(LOOP);
    const s = new Scheduler(emu, { instructionsPerSecond: 60, onFrame });
    s.stepFrame();
    s.stepFrame();
    expect(onFrame).toHaveBeenCalledTimes(2);
    expect(onFrame).toHaveBeenCalledWith(emu);
  });

  it('does nothing while paused, but single steps still work', () => {
    const s = new Scheduler(machine(LOOP), { instructionsPerSecond: 600 });
    s.pause();
    s.stepFrame();
    expect(s.instructionsExecuted).toBe(0);
    expect(s.stepInstruction()).toBe(true);
    expect(s.instructionsExecuted).toBe(1);
    s.resume();
    s.stepFrame();
    expect(s.instructionsExecuted).toBe(11);
  });

  it('applies a new rate from the next frame', () => {
    const s = new Scheduler(machine(LOOP), { instructionsPerSecond: 600 });
    s.setInstructionsPerSecond(1200);
    s.stepFrame();
    expect(s.instructionsPerSecond).toBe(1200);
    expect(s.instructionsExecuted).toBe(20);
  });
});

describe('Scheduler faults', () => {
  it("records the fault and halts in 'record' mode", () => {
    const log = vi.fn();
    const onFrame = vi.fn();
    const emu = machine([0x6001, 0xffff]);
    const s = new Scheduler(emu, { instructionsPerSecond: 600, onCpuError: 'record', log, onFrame });
    s.stepFrame();
    expect(s.isHalted).toBe(true);
    expect(s.lastCpuError).toBeInstanceOf(UnknownOpcodeError);
    expect(emu.cpu.state.PC).toBe(0x202);
    expect(onFrame).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith('[scheduler] halted after 1 instructions: [CPU] Unknown opcode 0xFFFF at PC=0x202');
    expect(s.stepInstruction()).toBe(false);
    s.stepFrame();
    expect(s.instructionsExecuted).toBe(1);
  });

  it("rethrows in 'throw' mode", () => {
    const s = new Scheduler(machine([0xffff]), { instructionsPerSecond: 600 });
    expect(() => s.stepFrame()).toThrow(UnknownOpcodeError);
    expect(s.isHalted).toBe(true);
  });

  it('reset clears the halt and restarts the program', () => {
    const emu = machine([0x6001, 0xffff]);
    const s = new Scheduler(emu, { instructionsPerSecond: 600, onCpuError: 'record', log: () => {} });
    s.stepFrame();
    s.reset();
    expect(s.isHalted).toBe(false);
    expect(s.lastCpuError).toBeUndefined();
    expect(s.instructionsExecuted).toBe(0);
    expect(emu.cpu.state.PC).toBe(0x200);
    expect(emu.cpu.state.V[0]).toBe(0);
    expect(s.stepInstruction()).toBe(true);
    expect(emu.cpu.state.V[0]).toBe(1);
  });
});

describe('Scheduler tracing and key waits', () => {
  it('logs a trace line after every Nth instruction', () => {
    const log = vi.fn();
    const s = new Scheduler(machine([0x6a0f, 0xa123]), { traceEveryInstr: 2, log });
    s.stepInstruction();
    expect(log).not.toHaveBeenCalled();
    s.stepInstruction();
    expect(log).toHaveBeenCalledWith(
      '[TRACE] 202: A123  LD I, 0x123      I=123 V=00 00 00 00 00 00 00 00 00 00 0F 00 00 00 00 00',
    );
  });

  it('keeps timers running while FX0A waits', () => {
    const emu = machine([0x6005, 0xf015, 0xf10a, 0x1206]);
    const s = new Scheduler(emu, { instructionsPerSecond: 120 });
    s.stepFrame();
    s.stepFrame();
    expect(emu.cpu.isWaitingForKey).toBe(true);
    expect(emu.timers.delay.value).toBe(3);
    emu.keypad.keyDown(0xb);
    s.stepFrame();
    expect(emu.cpu.state.V[1]).toBe(0xb);
    expect(emu.cpu.state.PC).toBe(0x206);
    expect(emu.timers.delay.value).toBe(2);
  });
});

describe('Scheduler.advance', () => {
  it('caps catch-up after a long stall', () => {
    const onFrame = vi.fn();
    const s = new Scheduler(machine(LOOP), { instructionsPerSecond: 600, maxCatchUpMs: 100, onFrame });
    s.advance(1000);
    expect(s.instructionsExecuted).toBe(60);
    expect(onFrame).toHaveBeenCalledTimes(6);
  });

  it('runs again after stop() once the session is reset', () => {
    const s = new Scheduler(machine(LOOP), { instructionsPerSecond: 600 });
    s.stop();
    s.reset();
    s.advance(100);
    expect(s.instructionsExecuted).toBe(60);
  });

  it('does not run while paused', () => {
    const s = new Scheduler(machine(LOOP), { instructionsPerSecond: 600 });
    s.pause();
    s.advance(50);
    expect(s.instructionsExecuted).toBe(0);
  });
});

describe('Scheduler.run', () => {
  it('runs until stop() and then resolves', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'Date'] });
    let frames = 0;
    const s: Scheduler = new Scheduler(machine(LOOP), {
      instructionsPerSecond: 600,
      now: () => Date.now(),
      onFrame: () => {
        frames++;
        if (frames === 3) s.stop();
      },
    });
    const done = s.run();
    expect(s.isRunning).toBe(true);
    await expect(s.run()).rejects.toThrow('[scheduler] already running');
    vi.advanceTimersByTime(500);
    await done;
    expect(frames).toBe(3);
    expect(s.isRunning).toBe(false);

    const before = s.instructionsExecuted;
    s.advance(100);
    expect(s.instructionsExecuted - before).toBe(60);
  });

  it("rejects with the fault in 'throw' mode", async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'Date'] });
    const s = new Scheduler(machine([0xffff]), { instructionsPerSecond: 600, now: () => Date.now() });
    const done = s.run();
    vi.advanceTimersByTime(100);
    await expect(done).rejects.toBeInstanceOf(UnknownOpcodeError);
    expect(s.isRunning).toBe(false);
  });

  it("resolves on a recorded halt", async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'Date'] });
    const s = new Scheduler(machine([0xffff]), {
      instructionsPerSecond: 600,
      onCpuError: 'record',
      log: () => {},
      now: () => Date.now(),
    });
    const done = s.run();
    vi.advanceTimersByTime(100);
    await done;
    expect(s.isHalted).toBe(true);
  });
});
