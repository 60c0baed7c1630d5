import { describe, it, expect } from 'vitest';
import { parseArgs, parseQuirks, resolveRunConfig, UsageError } from '../../src/cli/args';

describe('parseArgs', () => {
  it('splits flags from positionals', () => {
    expect(parseArgs(['run', '--ips=900', 'game.ch8', '--headless'])).toEqual({
      positional: ['run', 'game.ch8'],
      flags: { ips: '900', headless: '1' },
    });
  });
});

describe('parseQuirks', () => {
  it('enables names and disables names with a leading minus', () => {
    expect(parseQuirks('wrapSpritesVertically, -shiftUsesVy')).toEqual({ wrapSpritesVertically: true, shiftUsesVy: false });
  });

  it('rejects unknown quirks', () => {
    expect(() => parseQuirks('vblank')).toThrow(UsageError);
  });
});

describe('resolveRunConfig', () => {
  it('fills defaults', () => {
    const cfg = resolveRunConfig(['run', 'game.ch8']);
    expect(cfg.romPath).toBe('game.ch8');
    expect(cfg.ips).toBe(700);
    expect(cfg.frames).toBeUndefined();
    expect(cfg.screenshot).toBeUndefined();
    expect(cfg.scale).toBe(8);
    expect(cfg.trace).toBe(0);
    expect(cfg.quirks).toEqual({});
    expect(cfg.headless).toBe(false);
    expect(cfg.palette.on).toEqual({ r: 255, g: 255, b: 255, a: 255 });
  });

  it('reads flags', () => {
    const cfg = resolveRunConfig(['run', 'a.ch8', '--ips=1000', '--frames=30', '--headless', '--fg=#ff0000', '--screenshot=out.png', '--quirks=-memoryIncrementsIndex']);
    expect(cfg.ips).toBe(1000);
    expect(cfg.frames).toBe(30);
    expect(cfg.headless).toBe(true);
    expect(cfg.screenshot).toBe('out.png');
    expect(cfg.palette.on).toEqual({ r: 255, g: 0, b: 0, a: 255 });
    expect(cfg.quirks).toEqual({ memoryIncrementsIndex: false });
  });

  it('falls back to environment variables, with flags taking precedence', () => {
    const env = { CHIP8_IPS: '500', CHIP8_TRACE: '10', CHIP8_FRAMES: '2' };
    const cfg = resolveRunConfig(['run', 'a.ch8', '--trace=3'], env);
    expect(cfg.ips).toBe(500);
    expect(cfg.trace).toBe(3);
    expect(cfg.frames).toBe(2);
  });

  it.each<[string[], string]>([
    [[], 'Missing command'],
    [['go', 'a.ch8'], 'Unknown command "go"'],
    [['run'], 'Missing <rom-path>'],
    [['run', 'a.ch8', 'b.ch8'], 'Unexpected argument "b.ch8"'],
    [['run', 'a.ch8', '--ips=0'], '--ips must be an integer >= 1, got "0"'],
    [['run', 'a.ch8', '--scale=two'], '--scale must be an integer >= 1, got "two"'],
    [['run', 'a.ch8', '--bg=zzz'], '--bg must be a hex colour, got "zzz"'],
  ])('rejects %j', (argv, message) => {
    expect(() => resolveRunConfig(argv)).toThrow(new UsageError(message));
  });
});
