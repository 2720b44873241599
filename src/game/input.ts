/**
 * Key bindings
 */

import type { Intent } from './session';

/** Intents plus the runner-level theme switch */
export type Command = Intent | 'cycleTheme';

const KEY_BINDINGS: Record<string, Command> = {
  ArrowLeft: 'moveLeft',
  h: 'moveLeft',
  ArrowRight: 'moveRight',
  l: 'moveRight',
  ArrowDown: 'softDrop',
  j: 'softDrop',
  ArrowUp: 'rotate',
  k: 'rotate',
  ' ': 'hardDrop',
  a: 'toggleAdvisor',
  g: 'toggleGhost',
  y: 'toggleDynamicDifficulty',
  t: 'cycleTheme',
  p: 'pause',
  Escape: 'pause',
  r: 'restart',
  q: 'quit',
};

/**
 * Map a DOM-style key name to a command. Letters are case-insensitive.
 */
export function keyToCommand(key: string): Command | null {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  return KEY_BINDINGS[normalized] ?? null;
}

export const CONTROLS_HINT = '←→ MOVE  ↑ ROT  ↓ SOFT  SPC DROP  A AI  G GHOST  Y SPEED  T THEME  P PAUSE';
