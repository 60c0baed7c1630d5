// 8-bit countdown timers decremented at 60Hz by the scheduler, never by opcodes.

export class CountdownTimer {
  private counter = 0;

  get value(): number {
    return this.counter;
  }

  get isActive(): boolean {
    return this.counter > 0;
  }

  // Out-of-range values are clamped rather than rejected.
  set(v: number): void {
    const n = Number.isFinite(v) ? Math.trunc(v) : 0;
    this.counter = Math.min(0xff, Math.max(0, n));
  }

  // Advance by `ticks` 60Hz periods; floors at zero.
  tick(ticks = 1): void {
    const t = Math.max(0, ticks | 0);
    this.counter = Math.max(0, this.counter - t);
  }

  reset(): void {
    this.counter = 0;
  }
}

export class Timers {
  readonly delay = new CountdownTimer();
  readonly sound = new CountdownTimer();

  tick(ticks = 1): void {
    this.delay.tick(ticks);
    this.sound.tick(ticks);
  }

  reset(): void {
    this.delay.reset();
    this.sound.reset();
  }
}
