/**
 * CLI entry point for neon-blocks
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout to the
 * GameTerminal contract, so the game runs in any terminal emulator.
 */

import type { IDisposable } from '@xterm/xterm';
import { runNeonBlocksGame } from './game';
import type { GameTerminal, KeyPress } from './game/utils';
import { loadSettings, parseArgs, resolveSettings } from './settings';
import { THEME_NAMES, themes } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends GameTerminal {
  cleanup: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function listen<T>(listeners: T[], callback: T): IDisposable {
  listeners.push(callback);
  return {
    dispose: () => {
      const idx = listeners.indexOf(callback);
      if (idx !== -1) listeners.splice(idx, 1);
    },
  };
}

function createNodeTerminal(): NodeTerminal {
  const keyListeners: ((event: KeyPress) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    const key = parseKey(data);
    for (const listener of [...keyListeners]) {
      listener({ key, domEvent: { key } });
    }
  });

  let cleanedUp = false;
  function cleanup() {
    if (cleanedUp) return;
    cleanedUp = true;
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (callback) => listen(keyListeners, callback),
    cleanup,
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  neon-blocks: falling-block puzzle with a placement advisor

  Usage:
    neon-blocks                    Play with saved settings
    neon-blocks setup              Edit saved settings
    neon-blocks --theme <theme>    Color theme for this run
    neon-blocks --seed <n>         Repeatable piece sequence
    neon-blocks --advisor          Start with the advisor on
    neon-blocks --no-ghost         Hide the ghost piece
    neon-blocks --static-difficulty  Fall speed follows the level only
    neon-blocks --mute             No terminal bell
    neon-blocks --themes           List themes
    neon-blocks --help             Show this help

  Themes:
    ${THEME_NAMES.join(', ')}

  Controls:
    ← → / H L      Move
    ↑ / K          Rotate
    ↓ / J          Soft drop
    Space          Hard drop
    A              Toggle advisor
    G              Toggle ghost
    Y              Toggle adaptive speed
    T              Next theme
    P / ESC        Pause menu
    R              Restart
    Q              Quit
`);
}

function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.error) {
    console.error(`[neon-blocks] ${args.error}`);
    process.exit(1);
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.listThemes) {
    for (const name of THEME_NAMES) {
      console.log(`  ${name.padEnd(8)} ${themes[name].name}`);
    }
    process.exit(0);
  }

  if (args.command === 'setup') {
    import('./setup')
      .then(m => m.setupCommand())
      .catch((err: unknown) => {
        console.error('[neon-blocks] Setup failed:', err);
        process.exit(1);
      });
    return;
  }

  const settings = resolveSettings(loadSettings(), args.overrides);
  const terminal = createNodeTerminal();

  runNeonBlocksGame(terminal, {
    ...settings,
    onQuit: () => {
      terminal.cleanup();
      process.exit(0);
    },
  });
}

main();
