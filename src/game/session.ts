/**
 * Game Session
 *
 * The simulation side of the game loop.
 *
 * Owns the grid, the falling and next pieces, the advisor suggestion and
 * the difficulty controller. Input arrives as intents, time as ticks;
 * renderers read immutable snapshots. Nothing here throws for gameplay
 * conditions: blocked moves are results, a blocked spawn ends the game.
 */

import { type CueSink, silentCues } from './audio';
import { DifficultyController, type DifficultyOptions, type Placement } from './difficulty';
import {
  type Grid,
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
  clearCompletedRows,
  cloneGrid,
  collides,
  createGrid,
  gridRows,
  place,
} from './grid';
import { type PiecePhase, hardDrop, isBlockedBelow, rotate, tryMove } from './piece';
import { type RandomSource, XorShift32, randomSeed } from './rng';
import { type CandidateMove, adviceOf, findBestPlacement, ghostOf } from './search';
import {
  type CellColor,
  type Piece,
  type PieceKind,
  type PiecePalette,
  DEFAULT_PALETTE,
  clonePiece,
  pieceCells,
  spawnPiece,
} from './shapes';

// ============================================================================
// Types
// ============================================================================

export type Intent =
  | 'moveLeft'
  | 'moveRight'
  | 'softDrop'
  | 'rotate'
  | 'hardDrop'
  | 'toggleAdvisor'
  | 'toggleGhost'
  | 'toggleDynamicDifficulty'
  | 'pause'
  | 'restart'
  | 'quit';

export type SessionStatus = 'playing' | 'paused' | 'gameOver';

export interface IntentResult {
  ok: boolean;
  quit?: boolean;
}

export interface TickResult {
  stepped: boolean;
  committed: boolean;
  linesCleared: number;
}

export interface SessionOptions {
  width?: number;
  height?: number;
  random?: RandomSource;
  seed?: number;
  clock?: () => number;
  palette?: PiecePalette;
  cues?: CueSink;
  advisor?: boolean;
  ghost?: boolean;
  dynamicDifficulty?: boolean;
  difficulty?: Omit<DifficultyOptions, 'clock'>;
  /** Board to start from instead of an empty one (first game only) */
  grid?: Grid;
}

export interface PieceView {
  readonly kind: PieceKind;
  readonly rotation: number;
  readonly x: number;
  readonly y: number;
  readonly color: CellColor;
  readonly cells: readonly (readonly [number, number])[];
}

export interface SessionSnapshot {
  readonly width: number;
  readonly height: number;
  readonly rows: readonly (readonly (CellColor | null)[])[];
  readonly current: PieceView;
  readonly ghost: PieceView | null;
  readonly advice: PieceView | null;
  readonly next: PieceView;
  readonly score: number;
  readonly level: number;
  readonly lines: number;
  readonly status: SessionStatus;
  readonly phase: PiecePhase;
  readonly advisorEnabled: boolean;
  readonly ghostEnabled: boolean;
  readonly dynamicDifficulty: boolean;
  readonly dropIntervalMs: number;
  readonly difficulty: number;
}

const LINE_SCORE = 100;
const LINES_PER_LEVEL = 10;

const IDLE: TickResult = { stepped: false, committed: false, linesCleared: 0 };

/** Fall interval when difficulty follows the level instead of performance */
export function levelInterval(level: number): number {
  return Math.max(100, 1000 - level * 50);
}

function viewOf(piece: Piece): PieceView {
  return {
    kind: piece.kind,
    rotation: piece.rotation,
    x: piece.x,
    y: piece.y,
    color: piece.color,
    cells: pieceCells(piece),
  };
}

// ============================================================================
// Session
// ============================================================================

export class GameSession {
  readonly difficulty: DifficultyController;

  private readonly width: number;
  private readonly height: number;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly cues: CueSink;
  private palette: PiecePalette;

  private grid: Grid;
  private current: Piece;
  private next: Piece;
  private phase: PiecePhase = 'falling';
  private advice: CandidateMove | null = null;

  private _status: SessionStatus = 'playing';
  private _score = 0;
  private _level = 1;
  private _lines = 0;

  private advisorEnabled: boolean;
  private ghostEnabled: boolean;
  private dynamicDifficulty: boolean;

  private dropIntervalMs: number;
  private lastDropAt: number;

  constructor(options: SessionOptions = {}) {
    this.width = options.grid?.width ?? options.width ?? DEFAULT_WIDTH;
    this.height = options.grid?.height ?? options.height ?? DEFAULT_HEIGHT;
    this.random = options.random ?? new XorShift32(options.seed ?? randomSeed());
    this.clock = options.clock ?? Date.now;
    this.cues = options.cues ?? silentCues;
    this.palette = options.palette ?? DEFAULT_PALETTE;

    this.advisorEnabled = options.advisor ?? false;
    this.ghostEnabled = options.ghost ?? true;
    this.dynamicDifficulty = options.dynamicDifficulty ?? true;

    this.difficulty = new DifficultyController({
      ...options.difficulty,
      clock: this.clock,
    });
    this.dropIntervalMs = this.difficulty.currentInterval();
    this.lastDropAt = this.clock();

    this.grid = options.grid ? cloneGrid(options.grid) : createGrid(this.width, this.height);
    this.current = spawnPiece(this.random, this.width, this.palette);
    this.next = spawnPiece(this.random, this.width, this.palette);
    this.enterPlay();
  }

  // --------------------------------------------------------------------------
  // Read access
  // --------------------------------------------------------------------------

  get status(): SessionStatus {
    return this._status;
  }

  get score(): number {
    return this._score;
  }

  get level(): number {
    return this._level;
  }

  get lines(): number {
    return this._lines;
  }

  get interval(): number {
    return this.dropIntervalMs;
  }

  get currentPiece(): Piece {
    return clonePiece(this.current);
  }

  get nextPiece(): Piece {
    return clonePiece(this.next);
  }

  get suggestion(): CandidateMove | null {
    return this.advice ? { ...this.advice } : null;
  }

  get piecePhase(): PiecePhase {
    return this.phase;
  }

  /** Independent copy of the board */
  board(): Grid {
    return cloneGrid(this.grid);
  }

  snapshot(): SessionSnapshot {
    const showGhost = this.ghostEnabled && this._status !== 'gameOver';
    const showAdvice = this.advisorEnabled && this.advice !== null && this._status !== 'gameOver';
    return {
      width: this.width,
      height: this.height,
      rows: gridRows(this.grid),
      current: viewOf(this.current),
      ghost: showGhost ? viewOf(ghostOf(this.grid, this.current)) : null,
      advice: showAdvice && this.advice ? viewOf(adviceOf(this.current, this.advice)) : null,
      next: viewOf(this.next),
      score: this._score,
      level: this._level,
      lines: this._lines,
      status: this._status,
      phase: this.phase,
      advisorEnabled: this.advisorEnabled,
      ghostEnabled: this.ghostEnabled,
      dynamicDifficulty: this.dynamicDifficulty,
      dropIntervalMs: this.dropIntervalMs,
      difficulty: this.difficulty.difficulty,
    };
  }

  // --------------------------------------------------------------------------
  // Input
  // --------------------------------------------------------------------------

  handle(intent: Intent): IntentResult {
    switch (intent) {
      case 'quit':
        return { ok: true, quit: true };
      case 'restart':
        this.restart();
        return { ok: true };
      case 'pause':
        return { ok: this.togglePause() };
      case 'toggleAdvisor':
        this.setAdvisor(!this.advisorEnabled);
        return { ok: true };
      case 'toggleGhost':
        this.ghostEnabled = !this.ghostEnabled;
        return { ok: true };
      case 'toggleDynamicDifficulty':
        this.setDynamicDifficulty(!this.dynamicDifficulty);
        return { ok: true };
      case 'moveLeft':
        return { ok: this.isPlaying() && this.move(-1, 0) };
      case 'moveRight':
        return { ok: this.isPlaying() && this.move(1, 0) };
      case 'softDrop':
        return { ok: this.isPlaying() && this.move(0, 1) };
      case 'rotate':
        return { ok: this.isPlaying() && this.turn() };
      case 'hardDrop':
        if (!this.isPlaying()) return { ok: false };
        hardDrop(this.grid, this.current);
        this.cues.play('drop');
        this.commit();
        return { ok: true };
    }
  }

  setAdvisor(enabled: boolean): void {
    this.advisorEnabled = enabled;
    this.advice = enabled && this._status !== 'gameOver'
      ? findBestPlacement(this.grid, this.current)
      : null;
  }

  setDynamicDifficulty(enabled: boolean): void {
    this.dynamicDifficulty = enabled;
    this.dropIntervalMs = enabled
      ? this.difficulty.currentInterval()
      : levelInterval(this._level);
  }

  /** Recolor the live and next pieces, e.g. after a theme switch */
  setPalette(palette: PiecePalette): void {
    this.palette = palette;
    this.current.color = palette[this.current.kind];
    this.next.color = palette[this.next.kind];
  }

  // --------------------------------------------------------------------------
  // Time
  // --------------------------------------------------------------------------

  /**
   * One gravity step at most: move down if the interval has elapsed,
   * or commit a piece that is already blocked. Never catches up.
   */
  tick(): TickResult {
    if (this._status !== 'playing') return IDLE;

    if (this.dynamicDifficulty) {
      this.dropIntervalMs = this.difficulty.adjustDifficulty();
    }

    const now = this.clock();
    if (now - this.lastDropAt <= this.dropIntervalMs) return IDLE;
    this.lastDropAt = now;

    if (tryMove(this.grid, this.current, 0, 1)) {
      this.updatePhase();
      return { stepped: true, committed: false, linesCleared: 0 };
    }

    const linesCleared = this.commit();
    return { stepped: false, committed: true, linesCleared };
  }

  restart(): void {
    this.grid = createGrid(this.width, this.height);
    this._score = 0;
    this._level = 1;
    this._lines = 0;
    this.difficulty.reset();
    this.dropIntervalMs = this.difficulty.currentInterval();

    this.current = spawnPiece(this.random, this.width, this.palette);
    this.next = spawnPiece(this.random, this.width, this.palette);
    this._status = 'playing';
    this.enterPlay();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private isPlaying(): boolean {
    return this._status === 'playing';
  }

  private turn(): boolean {
    const ok = rotate(this.grid, this.current);
    if (ok) {
      this.cues.play('rotate');
      this.updatePhase();
    }
    return ok;
  }

  private move(dx: number, dy: number): boolean {
    const ok = tryMove(this.grid, this.current, dx, dy);
    if (ok) {
      this.cues.play('move');
      this.updatePhase();
    }
    return ok;
  }

  private togglePause(): boolean {
    if (this._status === 'gameOver') return false;
    if (this._status === 'paused') {
      this._status = 'playing';
      this.lastDropAt = this.clock();
    } else {
      this._status = 'paused';
    }
    return true;
  }

  private updatePhase(): void {
    this.phase = isBlockedBelow(this.grid, this.current) ? 'landed' : 'falling';
  }

  private commit(): number {
    this.phase = 'committed';

    const played: Placement = { column: this.current.x, rotation: this.current.rotation };
    const advised: Placement | undefined = this.advisorEnabled && this.advice
      ? { column: this.advice.column, rotation: this.advice.rotation }
      : undefined;
    this.difficulty.recordPlacement(played, advised);

    place(this.grid, this.current);
    const cleared = clearCompletedRows(this.grid);

    if (cleared > 0) {
      this.cues.play('clear');
      this._score += cleared * LINE_SCORE * this._level;
      this._lines += cleared;
      this._level = 1 + Math.floor(this._lines / LINES_PER_LEVEL);
      this.difficulty.recordScore(this._score, this._lines);
      if (!this.dynamicDifficulty) {
        this.dropIntervalMs = levelInterval(this._level);
      }
    }

    this.current = this.next;
    this.next = spawnPiece(this.random, this.width, this.palette);
    this.enterPlay();
    return cleared;
  }

  private enterPlay(): void {
    this.phase = 'falling';
    this.lastDropAt = this.clock();

    if (collides(this.grid, this.current)) {
      this._status = 'gameOver';
      this.advice = null;
      this.cues.play('game_over');
      return;
    }

    this.advice = this.advisorEnabled ? findBestPlacement(this.grid, this.current) : null;
    this.updatePhase();
  }
}
