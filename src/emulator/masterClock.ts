import { TIMER_HZ } from './config';

export type ClockEvent = 'instruction' | 'timer';

export interface ClockAdvance {
  instructions: number;
  timerTicks: number;
}

// Converts wall time into instruction and 60Hz timer events, in chronological order.
// Time is counted in units of 1/(ips*timerHz) s so both periods are whole numbers:
// an instruction every `timerHz` units, a timer tick every `ips` units.
export class MasterClock {
  private instrPeriod = 1;
  private timerPeriod = 1;
  private unitsPerSecond = 1;
  private untilInstr = 1;
  private untilTimer = 1;
  private carry = 0;

  constructor(instructionsPerSecond: number, private readonly timerHz = TIMER_HZ) {
    this.setRate(instructionsPerSecond);
  }

  get instructionsPerSecond(): number {
    return this.timerPeriod;
  }

  setRate(instructionsPerSecond: number): void {
    const ips = Math.max(1, Math.floor(instructionsPerSecond) || 1);
    this.instrPeriod = this.timerHz;
    this.timerPeriod = ips;
    this.unitsPerSecond = ips * this.timerHz;
    this.reset();
  }

  reset(): void {
    this.untilInstr = this.instrPeriod;
    this.untilTimer = this.timerPeriod;
    this.carry = 0;
  }

  // Instructions due at the same instant as a timer tick run first.
  // Returning false from onEvent for an instruction stops the walk and drops the rest of `ms`.
  advance(ms: number, onEvent: (ev: ClockEvent) => boolean | void): ClockAdvance {
    const out: ClockAdvance = { instructions: 0, timerTicks: 0 };
    if (!(ms > 0)) return out;
    const units = (ms * this.unitsPerSecond) / 1000 + this.carry;
    let whole = Math.floor(units + 1e-9);
    this.carry = Math.max(0, units - whole);
    while (whole > 0) {
      const step = Math.min(this.untilInstr, this.untilTimer, whole);
      whole -= step;
      this.untilInstr -= step;
      this.untilTimer -= step;
      if (this.untilInstr === 0) {
        this.untilInstr = this.instrPeriod;
        out.instructions++;
        if (onEvent('instruction') === false) {
          this.carry = 0;
          return out;
        }
      }
      if (this.untilTimer === 0) {
        this.untilTimer = this.timerPeriod;
        out.timerTicks++;
        onEvent('timer');
      }
    }
    return out;
  }
}
