import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runNeonBlocksGame, TICK_MS } from './index';
import { getTheme, isInAlternateBuffer, setTheme, type GameTerminal, type KeyPress } from './utils';

interface FakeTerminal extends GameTerminal {
  output: string[];
  press: (key: string) => void;
  disposed: number;
}

function fakeTerminal(): FakeTerminal {
  let listener: ((event: KeyPress) => void) | null = null;
  const terminal: FakeTerminal = {
    output: [],
    disposed: 0,
    cols: 80,
    rows: 30,
    write: (data: string) => { terminal.output.push(data); },
    onKey: (callback) => {
      listener = callback;
      return { dispose: () => { terminal.disposed++; listener = null; } };
    },
    press: (key: string) => listener?.({ key, domEvent: { key } }),
  };
  return terminal;
}

let now = 0;
const clock = () => now;

beforeEach(() => {
  vi.useFakeTimers();
  now = 0;
});

afterEach(() => {
  vi.useRealTimers();
  setTheme('neon');
});

describe('runNeonBlocksGame', () => {
  it('enters the alternate buffer and draws at once', () => {
    const terminal = fakeTerminal();
    const controller = runNeonBlocksGame(terminal, { seed: 1, clock });

    expect(controller.isRunning).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(true);
    expect(terminal.output[0]).toBe('\x1b[?1049h');
    expect(terminal.output[3].startsWith('\x1b[2J\x1b[H')).toBe(true);
    controller.stop();
  });

  it('redraws on every tick', () => {
    const terminal = fakeTerminal();
    const controller = runNeonBlocksGame(terminal, { seed: 1, clock });
    const before = terminal.output.length;

    vi.advanceTimersByTime(TICK_MS * 4);
    expect(terminal.output.length - before).toBe(4);
    controller.stop();
  });

  it('applies the theme option and cycles it with t', () => {
    const terminal = fakeTerminal();
    const controller = runNeonBlocksGame(terminal, { seed: 1, clock, theme: 'dark' });
    expect(getTheme()).toBe('dark');

    terminal.press('t');
    expect(getTheme()).toBe('retro');
    controller.stop();
  });

  it('quits with q and restores the screen', () => {
    const terminal = fakeTerminal();
    const onQuit = vi.fn();
    const controller = runNeonBlocksGame(terminal, { seed: 1, clock, onQuit });

    terminal.press('q');

    expect(onQuit).toHaveBeenCalledTimes(1);
    expect(controller.isRunning).toBe(false);
    expect(isInAlternateBuffer(terminal)).toBe(false);
    expect(terminal.output.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(terminal.disposed).toBe(1);
  });

  it('quits from the pause menu', () => {
    const terminal = fakeTerminal();
    const onQuit = vi.fn();
    runNeonBlocksGame(terminal, { seed: 1, clock, onQuit });

    terminal.press('p');
    terminal.press('ArrowDown');
    terminal.press('ArrowDown');
    expect(onQuit).not.toHaveBeenCalled();
    terminal.press('Enter');

    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it('resumes from the pause menu', () => {
    const terminal = fakeTerminal();
    const controller = runNeonBlocksGame(terminal, { seed: 1, clock });

    terminal.press('Escape');
    expect(terminal.output[terminal.output.length - 1]).toContain('══ PAUSED ══');
    terminal.press('Enter');
    expect(terminal.output[terminal.output.length - 1]).not.toContain('══ PAUSED ══');
    controller.stop();
  });

  it('opens the pause menu on its first item after a restart', () => {
    const terminal = fakeTerminal();
    const controller = runNeonBlocksGame(terminal, { seed: 1, clock });

    terminal.press('p');
    terminal.press('ArrowDown');
    terminal.press('Enter');
    terminal.press('p');

    const frame = terminal.output[terminal.output.length - 1];
    expect(frame).toContain('► RESUME [ESC] ◄');
    expect(frame).not.toContain('► RESTART [R] ◄');
    controller.stop();
  });

  it('stops drawing after stop and ignores a second stop', () => {
    const terminal = fakeTerminal();
    const controller = runNeonBlocksGame(terminal, { seed: 1, clock });

    controller.stop();
    controller.stop();
    const after = terminal.output.length;
    vi.advanceTimersByTime(TICK_MS * 10);
    terminal.press('a');

    expect(terminal.output.length).toBe(after);
    expect(terminal.disposed).toBe(1);
  });
});
