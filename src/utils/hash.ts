import type { Display } from '../display/display';

// FNV-1a 32-bit hash for byte buffers
export function fnv1a32(bytes: ArrayLike<number>): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i] & 0xff;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

export function fnv1aHex(bytes: ArrayLike<number>): string {
  return fnv1a32(bytes).toString(16).padStart(8, '0');
}

// Stable fingerprint of the current frame, for golden comparisons in tests and the CLI.
export function frameHash(display: Display): string {
  return fnv1aHex(display.snapshot());
}
