import { KEY_COUNT } from '../emulator/config';

// Hex keypad key 0x0-0xF.
export type Key = number;

export function isKey(k: number): k is Key {
  return Number.isInteger(k) && k >= 0 && k < KEY_COUNT;
}

// COSMAC VIP keypad layout laid over the left side of a QWERTY keyboard:
//   1 2 3 C      1 2 3 4
//   4 5 6 D  <-  q w e r
//   7 8 9 E      a s d f
//   A 0 B F      z x c v
export const HOST_KEYMAP: Readonly<Record<string, Key>> = {
  '1': 0x1, '2': 0x2, '3': 0x3, '4': 0xc,
  q: 0x4, w: 0x5, e: 0x6, r: 0xd,
  a: 0x7, s: 0x8, d: 0x9, f: 0xe,
  z: 0xa, x: 0x0, c: 0xb, v: 0xf,
};

export function keyForHostKey(name: string): Key | undefined {
  return HOST_KEYMAP[name.toLowerCase()];
}

// 16-key state written by the host's input device, read by opcodes.
export class Keypad {
  private readonly keys = new Array<boolean>(KEY_COUNT).fill(false);

  keyDown(k: number): void {
    if (isKey(k)) this.keys[k] = true;
  }

  keyUp(k: number): void {
    if (isKey(k)) this.keys[k] = false;
  }

  setKey(k: number, pressed: boolean): void {
    if (pressed) this.keyDown(k); else this.keyUp(k);
  }

  isPressed(k: number): boolean {
    return isKey(k) ? this.keys[k] : false;
  }

  snapshot(): boolean[] {
    return this.keys.slice();
  }

  releaseAll(): void {
    this.keys.fill(false);
  }
}
