import fs from 'fs';
import { LoadError } from '../emulator/errors';
import { MEMORY_SIZE, PROGRAM_START } from '../emulator/config';

export const PROGRAM_CAPACITY = MEMORY_SIZE - PROGRAM_START;

export function validateProgram(program: Uint8Array): void {
  if (program.length > PROGRAM_CAPACITY) throw new LoadError(program.length, PROGRAM_CAPACITY);
}

// Read a ROM image from disk. Size is checked here so hosts can report it before any step.
export function loadRomFile(path: string): Uint8Array {
  let raw: Buffer;
  try {
    raw = fs.readFileSync(path);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new LoadError(0, PROGRAM_CAPACITY, `Cannot read ${path}: ${reason}`);
  }
  const program = new Uint8Array(raw);
  if (program.length === 0) throw new LoadError(0, PROGRAM_CAPACITY, `${path} is empty`);
  validateProgram(program);
  return program;
}
