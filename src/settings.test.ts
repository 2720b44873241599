import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_SETTINGS,
  loadSettings,
  saveSettings,
  parseArgs,
  resolveSettings,
  settingsPath,
} from './settings';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'neon-blocks-test-'));
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe('DEFAULT_SETTINGS', () => {
  it('starts with the neon theme, ghost and adaptive speed on', () => {
    expect(DEFAULT_SETTINGS).toEqual({
      theme: 'neon',
      advisor: false,
      ghost: true,
      dynamicDifficulty: true,
      sound: true,
    });
  });
});

describe('loadSettings', () => {
  it('returns the defaults when no file exists', () => {
    expect(loadSettings(dir)).toEqual(DEFAULT_SETTINGS);
  });

  it('fills missing fields with defaults', () => {
    writeFileSync(settingsPath(dir), JSON.stringify({ theme: 'retro', advisor: true }));
    expect(loadSettings(dir)).toEqual({ ...DEFAULT_SETTINGS, theme: 'retro', advisor: true });
  });

  it('warns and falls back on malformed JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(settingsPath(dir), '{ not json');
    expect(loadSettings(dir)).toEqual(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[Settings\] Could not read /);
  });

  it('warns and falls back on values of the wrong shape', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(settingsPath(dir), JSON.stringify({ theme: 'amber' }));
    expect(loadSettings(dir)).toEqual(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[Settings\] Ignoring invalid .*theme: /);
  });
});

describe('saveSettings', () => {
  it('writes settings that load back unchanged', () => {
    const settings = { ...DEFAULT_SETTINGS, theme: 'dark' as const, sound: false, seed: 42 };
    expect(saveSettings(settings, dir)).toBe(true);
    expect(loadSettings(dir)).toEqual(settings);
  });

  it('creates the directory when needed', () => {
    const nested = join(dir, 'a', 'b');
    expect(saveSettings(DEFAULT_SETTINGS, nested)).toBe(true);
    expect(JSON.parse(readFileSync(settingsPath(nested), 'utf-8'))).toEqual(DEFAULT_SETTINGS);
  });

  it('warns and reports failure when the path is not writable', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const blocker = join(dir, 'file');
    writeFileSync(blocker, 'x');
    expect(saveSettings(DEFAULT_SETTINGS, blocker)).toBe(false);
    expect(warn.mock.calls[0][0]).toMatch(/^\[Settings\] Could not save /);
  });
});

describe('parseArgs', () => {
  it('defaults to playing with no overrides', () => {
    expect(parseArgs([])).toEqual({ command: 'play', overrides: {}, help: false, listThemes: false });
  });

  it('reads every flag', () => {
    const args = parseArgs([
      '--theme', 'retro',
      '--seed', '7',
      '--advisor',
      '--no-ghost',
      '--static-difficulty',
      '--mute',
    ]);
    expect(args.error).toBeUndefined();
    expect(args.overrides).toEqual({
      theme: 'retro',
      seed: 7,
      advisor: true,
      ghost: false,
      dynamicDifficulty: false,
      sound: false,
    });
  });

  it('recognises help, theme listing and the setup command', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
    expect(parseArgs(['--themes']).listThemes).toBe(true);
    expect(parseArgs(['setup']).command).toBe('setup');
  });

  it('rejects an unknown theme', () => {
    expect(parseArgs(['--theme', 'amber']).error).toBe(
      'Unknown theme: amber. Available themes: neon, dark, retro',
    );
    expect(parseArgs(['--theme']).error).toBe(
      'Unknown theme: (missing). Available themes: neon, dark, retro',
    );
  });

  it('rejects a seed that is not an integer', () => {
    expect(parseArgs(['--seed', '1.5']).error).toBe('Invalid seed: 1.5. Expected an integer.');
    expect(parseArgs(['--seed']).error).toBe('Invalid seed: (missing). Expected an integer.');
  });

  it('rejects unknown options and commands', () => {
    expect(parseArgs(['--fast']).error).toBe('Unknown option: --fast');
    expect(parseArgs(['play']).error).toBe('Unknown command: play');
    expect(parseArgs(['setup', 'now']).error).toBe('Unknown command: setup now');
  });
});

describe('resolveSettings', () => {
  it('lets flags win over saved values', () => {
    const saved = { ...DEFAULT_SETTINGS, theme: 'dark' as const, advisor: true };
    expect(resolveSettings(saved, { theme: 'retro', sound: false })).toEqual({
      ...saved,
      theme: 'retro',
      sound: false,
    });
  });
});
