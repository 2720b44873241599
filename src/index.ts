/**
 * neon-blocks
 *
 * Falling-block puzzle core with a placement advisor and adaptive fall
 * speed, plus a terminal front end for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runNeonBlocksGame, setTheme } from 'neon-blocks';
 *   setTheme('retro');
 *   const controller = runNeonBlocksGame(terminal, { advisor: true });
 *
 * Headless usage:
 *   const session = new GameSession({ seed: 7 });
 *   session.handle('hardDrop');
 *   session.tick();
 */

export {
  // Terminal front end
  runNeonBlocksGame,
  TICK_MS,
  type GameController,
  type NeonBlocksOptions,
} from './game';

export {
  // Session
  GameSession,
  levelInterval,
  type Intent,
  type IntentResult,
  type TickResult,
  type SessionOptions,
  type SessionSnapshot,
  type SessionStatus,
  type PieceView,
} from './game/session';

export {
  // Grid
  DEFAULT_WIDTH,
  DEFAULT_HEIGHT,
  createGrid,
  cloneGrid,
  isFilled,
  colorAt,
  setCell,
  gridRows,
  collides,
  place,
  countCompleteRows,
  clearCompletedRows,
  columnHeights,
  aggregateHeight,
  countHoles,
  bumpiness,
  type Grid,
} from './game/grid';

export {
  // Pieces
  PIECE_KINDS,
  PIECES,
  DEFAULT_PALETTE,
  rotationCount,
  shapeOf,
  currentShape,
  shapeWidth,
  pieceCells,
  createPiece,
  randomKind,
  spawnPiece,
  clonePiece,
  type Piece,
  type PieceKind,
  type PiecePalette,
  type PieceDefinition,
  type ShapeBitmap,
  type CellColor,
} from './game/shapes';

export { WALL_KICKS, tryMove, isBlockedBelow, hardDrop, rotate, type PiecePhase } from './game/piece';
export { XorShift32, randomSeed, type RandomSource } from './game/rng';

export {
  // Advisor
  EVALUATION_WEIGHTS,
  measureGrid,
  scoreFeatures,
  evaluateGrid,
  type GridFeatures,
} from './game/evaluator';
export {
  COLUMN_OVERHANG,
  findBestPlacement,
  landingRow,
  ghostOf,
  adviceOf,
  type CandidateMove,
} from './game/search';

export {
  // Difficulty
  DifficultyController,
  MIN_DIFFICULTY,
  MAX_DIFFICULTY,
  type DifficultyOptions,
  type Placement,
} from './game/difficulty';

export { CUES, silentCues, createBellCues, type Cue, type CueSink, type BellCues } from './game/audio';
export { keyToCommand, CONTROLS_HINT, type Command } from './game/input';
export { renderFrame, minimumSize, type RenderOptions } from './game/render';

export {
  // Theme and terminal utilities
  setTheme,
  getTheme,
  getThemeColors,
  getCurrentThemeColor,
  getVerticalAnchor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
  type KeyPress,
} from './game/utils';

export {
  // Menu system
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  pauseActionAt,
  PAUSE_MENU_ITEMS,
  type SimpleMenuItem,
  type PauseAction,
} from './game/menu';

export {
  THEME_NAMES,
  themes,
  isThemeName,
  nextTheme,
  hexToAnsi,
  hexToRgb,
  type ThemeName,
  type ThemeColors,
} from './themes';

export {
  DEFAULT_SETTINGS,
  loadSettings,
  saveSettings,
  parseArgs,
  resolveSettings,
  type Settings,
  type ParsedArgs,
} from './settings';
