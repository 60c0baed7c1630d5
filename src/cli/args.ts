import { DEFAULT_IPS, QUIRK_NAMES, isQuirkName, type Quirks } from '../emulator/config';
import { DEFAULT_PALETTE, parseHexColor, type Palette } from '../display/palette';

export const USAGE = [
  'Usage: npm run chip8 -- run <rom-path> [options]',
  '  --ips=N            instructions per second (default 700, env CHIP8_IPS)',
  '  --frames=N         stop after N 60Hz frames (env CHIP8_FRAMES; default: run until quit)',
  '  --screenshot=PATH  write the final frame as PNG',
  '  --scale=N          PNG pixel scale (default 8)',
  '  --fg=#RRGGBB --bg=#RRGGBB  PNG colours',
  '  --trace=N          log CPU state every N instructions (env CHIP8_TRACE)',
  `  --quirks=a,-b      enable/disable quirks: ${QUIRK_NAMES.join(', ')}`,
  '  --headless=1       no terminal drawing or keyboard; print the final frame',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface RunConfig {
  command: 'run';
  romPath: string;
  ips: number;
  frames: number | undefined;
  screenshot: string | undefined;
  scale: number;
  palette: Palette;
  trace: number;
  quirks: Partial<Quirks>;
  headless: boolean;
}

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string>;
}

// "--key=value" and bare "--flag" (read as "1"); everything else is positional.
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const out: ParsedArgs = { positional: [], flags: {} };
  for (const a of argv) {
    const m = a.match(/^--([^=]+)(?:=(.*))?$/);
    if (m) out.flags[m[1]] = m[2] ?? '1';
    else out.positional.push(a);
  }
  return out;
}

function intFlag(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const v = Number(raw);
  if (!Number.isInteger(v) || v < min) throw new UsageError(`--${name} must be an integer >= ${min}, got "${raw}"`);
  return v;
}

function colourFlag(name: string, raw: string | undefined, fallback: Palette['on']): Palette['on'] {
  if (raw === undefined) return fallback;
  const c = parseHexColor(raw);
  if (!c) throw new UsageError(`--${name} must be a hex colour, got "${raw}"`);
  return c;
}

export function parseQuirks(list: string): Partial<Quirks> {
  const quirks: Partial<Quirks> = {};
  for (const item of list.split(',').map((s) => s.trim()).filter(Boolean)) {
    const on = !item.startsWith('-');
    const name = on ? item : item.slice(1);
    if (!isQuirkName(name)) throw new UsageError(`Unknown quirk "${name}" (known: ${QUIRK_NAMES.join(', ')})`);
    quirks[name] = on;
  }
  return quirks;
}

export function resolveRunConfig(argv: readonly string[], env: Record<string, string | undefined> = {}): RunConfig {
  const { positional, flags } = parseArgs(argv);
  const [command, romPath, ...rest] = positional;
  if (command !== 'run') throw new UsageError(command ? `Unknown command "${command}"` : 'Missing command');
  if (!romPath) throw new UsageError('Missing <rom-path>');
  if (rest.length > 0) throw new UsageError(`Unexpected argument "${rest[0]}"`);
  return {
    command,
    romPath,
    ips: intFlag('ips', flags.ips ?? env.CHIP8_IPS, 1) ?? DEFAULT_IPS,
    frames: intFlag('frames', flags.frames ?? env.CHIP8_FRAMES, 1),
    screenshot: flags.screenshot,
    scale: intFlag('scale', flags.scale, 1) ?? 8,
    palette: {
      on: colourFlag('fg', flags.fg, DEFAULT_PALETTE.on),
      off: colourFlag('bg', flags.bg, DEFAULT_PALETTE.off),
    },
    trace: intFlag('trace', flags.trace ?? env.CHIP8_TRACE, 0) ?? 0,
    quirks: flags.quirks ? parseQuirks(flags.quirks) : {},
    headless: (flags.headless ?? '0') !== '0',
  };
}
