import fs from 'fs';
import { resolveRunConfig, UsageError, USAGE, type RunConfig } from '../src/cli/args';
import { TerminalKeyboard } from '../src/cli/terminalKeyboard';
import { loadRomFile } from '../src/rom/loader';
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { Chip8Error } from '../src/emulator/errors';
import { encodePNG, renderAscii } from '../src/display/renderer';
import { formatCrashReport } from '../src/tools/dump';
import { frameHash } from '../src/utils/hash';

const CLEAR_HOME = '\u001b[H\u001b[2J';
const BELL = '\u0007';

function readConfig(): RunConfig | null {
  try {
    return resolveRunConfig(process.argv.slice(2), process.env);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`[chip8] ${e.message}\n${USAGE}`);
    return null;
  }
}

// Load errors are reported before the first instruction runs.
function boot(cfg: RunConfig): Emulator | null {
  try {
    return Emulator.fromProgram(loadRomFile(cfg.romPath), { quirks: cfg.quirks });
  } catch (e) {
    if (!(e instanceof Chip8Error)) throw e;
    console.error(`[chip8] ${e.message}`);
    return null;
  }
}

async function main(): Promise<number> {
  const cfg = readConfig();
  if (!cfg) return 1;
  const emu = boot(cfg);
  if (!emu) return 1;
  const debug = (process.env.CHIP8_DEBUG ?? '0') !== '0';
  console.log(`[chip8] ROM: ${cfg.romPath} (${emu.programSize} bytes)  ips: ${cfg.ips}  frames: ${cfg.frames ?? 'unlimited'}  headless=${cfg.headless}`);
  if (debug) console.log(`[chip8] quirks: ${JSON.stringify(emu.quirks)}`);

  const interactive = !cfg.headless && process.stdin.isTTY === true;
  let frame = 0;
  let soundWasActive = false;

  const sched: Scheduler = new Scheduler(emu, {
    instructionsPerSecond: cfg.ips,
    onCpuError: 'record',
    traceEveryInstr: cfg.trace,
    onFrame: (e) => {
      frame++;
      const sound = e.isSoundActive();
      if (!cfg.headless) {
        if (sound && !soundWasActive) process.stdout.write(BELL);
        if (e.display.dirty) {
          process.stdout.write(CLEAR_HOME + renderAscii(e.display, { on: '██', off: '  ' }).join('\n') + '\n');
          e.display.dirty = false;
        }
      }
      soundWasActive = sound;
      if (cfg.frames !== undefined && frame >= cfg.frames) sched.stop();
    },
  });

  const keyboard = interactive
    ? new TerminalKeyboard(process.stdin, emu.keypad, { onQuit: () => sched.stop() })
    : null;
  const onSigint = () => sched.stop();
  process.on('SIGINT', onSigint);
  keyboard?.attach();
  try {
    await sched.run();
  } finally {
    keyboard?.detach();
    process.off('SIGINT', onSigint);
  }

  if (cfg.headless) console.log(renderAscii(emu.display).join('\n'));
  if (cfg.screenshot) {
    fs.writeFileSync(cfg.screenshot, encodePNG(emu.display, cfg.scale, cfg.palette));
    console.log(`[chip8] Wrote ${cfg.screenshot}`);
  }
  console.log(`[chip8] ${frame} frames, ${sched.instructionsExecuted} instructions, frame hash ${frameHash(emu.display)}`);

  if (sched.isHalted) {
    for (const line of formatCrashReport(emu, sched.lastCpuError)) console.error(`[chip8] ${line}`);
    return 1;
  }
  return 0;
}

main().then(
  (code) => process.exit(code),
  (e) => {
    console.error('[chip8] Unhandled error:', e);
    process.exit(1);
  },
);
