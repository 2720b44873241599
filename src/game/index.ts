/**
 * Neon Blocks
 *
 * Terminal front end for a GameSession: one fixed-rate loop that ticks
 * and redraws, and a key listener that turns presses into intents.
 */

import { type ThemeName, nextTheme } from '../themes';
import { createBellCues } from './audio';
import { keyToCommand } from './input';
import { PAUSE_MENU_ITEMS, type PauseAction, checkShortcut, navigateMenu, pauseActionAt } from './menu';
import { renderFrame } from './render';
import { GameSession } from './session';
import {
  type GameTerminal,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getTheme,
  getThemeColors,
  setTheme,
} from './utils';

export interface GameController {
  stop: () => void;
  readonly isRunning: boolean;
}

export interface NeonBlocksOptions {
  theme?: ThemeName;
  seed?: number;
  advisor?: boolean;
  ghost?: boolean;
  dynamicDifficulty?: boolean;
  /** Ring the bell on line clears and game over */
  sound?: boolean;
  /** Called once after the player quits and the screen is restored */
  onQuit?: () => void;
  clock?: () => number;
}

export const TICK_MS = 25;

export function runNeonBlocksGame(terminal: GameTerminal, options: NeonBlocksOptions = {}): GameController {
  if (options.theme) setTheme(options.theme);

  const cues = createBellCues((data) => terminal.write(data), undefined, !(options.sound ?? true));
  const session = new GameSession({
    seed: options.seed,
    clock: options.clock,
    advisor: options.advisor,
    ghost: options.ghost,
    dynamicDifficulty: options.dynamicDifficulty,
    palette: getThemeColors().pieces,
    cues,
  });

  let running = true;
  let pauseSelection = 0;

  const draw = () => {
    terminal.write(renderFrame(session.snapshot(), {
      cols: terminal.cols,
      rows: terminal.rows,
      theme: getThemeColors(),
      pauseSelection,
    }));
  };

  const stop = () => {
    if (!running) return;
    running = false;
    clearInterval(loop);
    keyListener.dispose();
    exitAlternateBuffer(terminal, 'neon-blocks');
  };

  const quit = () => {
    stop();
    options.onQuit?.();
  };

  const applyPauseAction = (action: PauseAction | undefined) => {
    pauseSelection = 0;
    switch (action) {
      case 'resume':
        session.handle('pause');
        break;
      case 'restart':
        session.restart();
        break;
      case 'quit':
        quit();
        break;
    }
  };

  enterAlternateBuffer(terminal, 'neon-blocks');

  const loop = setInterval(() => {
    session.tick();
    draw();
  }, TICK_MS);

  const keyListener = terminal.onKey(({ key, domEvent }) => {
    if (!running) return;

    if (session.status === 'paused') {
      const { newSelection, confirmed } = navigateMenu(
        pauseSelection,
        PAUSE_MENU_ITEMS.length,
        key,
        domEvent,
      );
      if (newSelection !== pauseSelection) {
        pauseSelection = newSelection;
        draw();
        return;
      }
      if (confirmed) {
        applyPauseAction(pauseActionAt(pauseSelection));
        if (running) draw();
        return;
      }
      const shortcut = checkShortcut(PAUSE_MENU_ITEMS, key.toLowerCase());
      if (shortcut !== -1) {
        applyPauseAction(pauseActionAt(shortcut));
        if (running) draw();
        return;
      }
    }

    const command = keyToCommand(domEvent.key);
    if (!command) return;

    switch (command) {
      case 'cycleTheme':
        setTheme(nextTheme(getTheme()));
        session.setPalette(getThemeColors().pieces);
        break;
      case 'quit':
        quit();
        return;
      case 'pause':
        pauseSelection = 0;
        session.handle(command);
        break;
      default:
        session.handle(command);
    }
    draw();
  });

  draw();

  return {
    stop,
    get isRunning() { return running; },
  };
}
