export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const STACK_CAPACITY = 16;
export const REGISTER_COUNT = 16;
export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;
export const KEY_COUNT = 16;
export const TIMER_HZ = 60;
export const DEFAULT_IPS = 700;

// Behaviours where historical interpreters disagree. Defaults follow the COSMAC VIP.
export interface Quirks {
  shiftUsesVy: boolean; // 8XY6/8XYE read VY (true) or shift VX in place
  memoryIncrementsIndex: boolean; // FX55/FX65 leave I = I + X + 1
  wrapSpritesVertically: boolean; // rows below the bottom edge wrap instead of clip
  keyWaitOnRelease: boolean; // FX0A completes on key release rather than press
}

export type QuirkName = keyof Quirks;

export const DEFAULT_QUIRKS: Readonly<Quirks> = {
  shiftUsesVy: true,
  memoryIncrementsIndex: true,
  wrapSpritesVertically: false,
  keyWaitOnRelease: false,
};

export const QUIRK_NAMES: readonly QuirkName[] = ['shiftUsesVy', 'memoryIncrementsIndex', 'wrapSpritesVertically', 'keyWaitOnRelease'];

export function isQuirkName(name: string): name is QuirkName {
  return (QUIRK_NAMES as readonly string[]).includes(name);
}

export interface EmulatorOptions {
  quirks?: Partial<Quirks>;
  // Source for CXNN; must return an integer 0..255. Defaults to Math.random.
  random?: () => number;
}

export function resolveQuirks(overrides: Partial<Quirks> = {}): Quirks {
  return { ...DEFAULT_QUIRKS, ...overrides };
}

export const randomByte = (): number => Math.floor(Math.random() * 256) & 0xff;
