import type { Keypad } from '../input/keypad';
import { keyForHostKey } from '../input/keypad';

// The subset of a TTY read stream this adapter needs.
export interface KeyInput {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalKeyboardOptions {
  holdMs?: number; // terminals send no key-up; a key counts as held this long after its last repeat
  onQuit?: () => void; // Ctrl-C or Esc
}

export class TerminalKeyboard {
  private readonly holdMs: number;
  private readonly releases = new Map<number, ReturnType<typeof setTimeout>>();
  private attached = false;

  constructor(private readonly input: KeyInput, private readonly keypad: Keypad, private readonly opts: TerminalKeyboardOptions = {}) {
    this.holdMs = opts.holdMs ?? 150;
  }

  attach(): void {
    if (this.attached) return;
    this.attached = true;
    this.input.setRawMode?.(true);
    this.input.on('data', this.onData);
    this.input.resume();
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.input.off('data', this.onData);
    this.input.setRawMode?.(false);
    this.input.pause();
    for (const [key, timer] of this.releases) {
      clearTimeout(timer);
      this.keypad.keyUp(key);
    }
    this.releases.clear();
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    // A lone ESC is the Escape key; ESC followed by more bytes is an escape sequence.
    if (text.startsWith('\u001b')) {
      if (text.length === 1) this.opts.onQuit?.();
      return;
    }
    for (const ch of text) {
      if (ch === '\u0003') {
        this.opts.onQuit?.();
        continue;
      }
      const key = keyForHostKey(ch);
      if (key !== undefined) this.press(key);
    }
  };

  private press(key: number): void {
    this.keypad.keyDown(key);
    const pending = this.releases.get(key);
    if (pending) clearTimeout(pending);
    this.releases.set(key, setTimeout(() => {
      this.releases.delete(key);
      this.keypad.keyUp(key);
    }, this.holdMs));
  }
}
