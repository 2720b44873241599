import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import * as p from '@clack/prompts';
import { setupCommand } from './setup';
import { DEFAULT_SETTINGS, loadSettings } from './settings';

const CANCEL = Symbol('cancel');

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  cancel: vi.fn(),
  select: vi.fn(),
  confirm: vi.fn(),
  isCancel: (value: unknown) => typeof value === 'symbol',
  log: { success: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() },
}));

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'neon-blocks-setup-'));
});

afterEach(() => {
  vi.resetAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe('setupCommand', () => {
  it('saves every answer', async () => {
    vi.mocked(p.select).mockResolvedValueOnce('retro');
    vi.mocked(p.confirm)
      .mockResolvedValueOnce(true)   // advisor
      .mockResolvedValueOnce(false)  // ghost
      .mockResolvedValueOnce(false)  // adaptive speed
      .mockResolvedValueOnce(false); // bell

    await setupCommand(dir);

    expect(loadSettings(dir)).toEqual({
      theme: 'retro',
      advisor: true,
      ghost: false,
      dynamicDifficulty: false,
      sound: false,
    });
    expect(p.outro).toHaveBeenCalledWith('Run neon-blocks to play.');
  });

  it('offers the saved values as the defaults', async () => {
    vi.mocked(p.select).mockResolvedValueOnce('neon');
    vi.mocked(p.confirm).mockResolvedValue(true);

    await setupCommand(dir);

    expect(vi.mocked(p.select).mock.calls[0][0]).toMatchObject({ initialValue: 'neon' });
    expect(vi.mocked(p.confirm).mock.calls[1][0]).toMatchObject({ initialValue: true });
  });

  it('writes nothing when cancelled', async () => {
    vi.mocked(p.select).mockResolvedValueOnce('dark');
    vi.mocked(p.confirm).mockResolvedValueOnce(CANCEL);

    await setupCommand(dir);

    expect(p.cancel).toHaveBeenCalledWith('Setup cancelled, nothing saved.');
    expect(loadSettings(dir)).toEqual(DEFAULT_SETTINGS);
  });
});
