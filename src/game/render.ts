/**
 * Terminal renderer
 *
 * Builds one ANSI frame from a session snapshot. Reads state only;
 * the caller writes the returned string to the terminal.
 */

import { type ThemeColors, hexToAnsi } from '../themes';
import { CONTROLS_HINT } from './input';
import { PAUSE_MENU_ITEMS, renderSimpleMenu } from './menu';
import type { PieceView, SessionSnapshot } from './session';
import { getVerticalAnchor } from './utils';

export interface RenderOptions {
  cols: number;
  rows: number;
  theme: ThemeColors;
  pauseSelection?: number;
}

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const SIDE_PANEL_WIDTH = 16;
const TITLE = 'N E O N   B L O C K S';

function at(row: number, col: number): string {
  return `\x1b[${row};${col}H`;
}

/**
 * Smallest terminal that fits the board, its frame and the footer
 */
export function minimumSize(boardWidth: number, boardHeight: number): { cols: number; rows: number } {
  return { cols: boardWidth * 2 + 4, rows: boardHeight + 3 };
}

function renderTooSmall(cols: number, rows: number, need: { cols: number; rows: number }, accent: string): string {
  const msg1 = 'Terminal too small!';
  const msg2 = `Need: ${need.cols}×${need.rows}  Have: ${cols}×${rows}`;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);
  let output = '';
  output += `${at(Math.max(1, centerY - 1), Math.max(1, centerX - Math.floor(msg1.length / 2)))}${accent}${msg1}${RESET}`;
  output += `${at(centerY + 1, Math.max(1, centerX - Math.floor(msg2.length / 2)))}${DIM}${msg2}${RESET}`;
  return output;
}

function drawPiece(
  piece: PieceView,
  boardTop: number,
  boardLeft: number,
  style: string,
  glyph: string,
): string {
  let output = '';
  for (const [x, y] of piece.cells) {
    if (y < 0) continue;
    output += `${at(boardTop + 1 + y, boardLeft + 1 + x * 2)}${style}${glyph}${RESET}`;
  }
  return output;
}

function panelLine(label: string, value: string): string {
  return `${label.padEnd(7)}${value.padStart(SIDE_PANEL_WIDTH - 9)}`;
}

export function renderFrame(snapshot: SessionSnapshot, options: RenderOptions): string {
  const { cols, rows, theme } = options;
  const accent = hexToAnsi(theme.ui);
  const border = hexToAnsi(theme.border);
  const text = hexToAnsi(theme.text);

  let output = '\x1b[2J\x1b[H';

  const need = minimumSize(snapshot.width, snapshot.height);
  if (cols < need.cols || rows < need.rows) {
    return output + renderTooSmall(cols, rows, need, accent);
  }

  const boardCols = snapshot.width * 2 + 2;
  const showSidePanel = cols >= boardCols + SIDE_PANEL_WIDTH + 4;
  const showTitle = rows >= need.rows + 2;
  const displayWidth = showSidePanel ? boardCols + SIDE_PANEL_WIDTH + 2 : boardCols;
  const layoutRows = (showTitle ? 2 : 0) + snapshot.height + 3;

  const top = getVerticalAnchor(rows, layoutRows, { minTop: 1 });
  const boardTop = top + (showTitle ? 2 : 0);
  const boardLeft = Math.max(1, Math.floor((cols - displayWidth) / 2));

  if (showTitle) {
    const titleX = boardLeft + Math.floor((displayWidth - TITLE.length) / 2);
    output += `${at(top, titleX)}${accent}${BOLD}${TITLE}${RESET}`;
  }

  // Frame (double-width cells)
  output += `${at(boardTop, boardLeft)}${border}╔${'══'.repeat(snapshot.width)}╗${RESET}`;
  for (let y = 0; y < snapshot.height; y++) {
    output += `${at(boardTop + 1 + y, boardLeft)}${border}║${RESET}`;
    output += `${at(boardTop + 1 + y, boardLeft + 1 + snapshot.width * 2)}${border}║${RESET}`;
  }
  output += `${at(boardTop + snapshot.height + 1, boardLeft)}${border}╚${'══'.repeat(snapshot.width)}╝${RESET}`;

  // Settled cells
  const gridColor = hexToAnsi(theme.grid);
  const wellBackground = hexToAnsi(theme.background, 'bg');
  for (let y = 0; y < snapshot.height; y++) {
    let line = wellBackground;
    for (const cell of snapshot.rows[y]) {
      line += cell ? `${hexToAnsi(cell)}██` : `${gridColor} ·`;
    }
    output += `${at(boardTop + 1 + y, boardLeft + 1)}${line}${RESET}`;
  }

  if (snapshot.status !== 'gameOver') {
    if (snapshot.ghost) {
      output += drawPiece(snapshot.ghost, boardTop, boardLeft, `${DIM}${hexToAnsi(snapshot.ghost.color)}`, '░░');
    }
    if (snapshot.advice) {
      output += drawPiece(snapshot.advice, boardTop, boardLeft, accent, '▒▒');
    }
    output += drawPiece(snapshot.current, boardTop, boardLeft, hexToAnsi(snapshot.current.color), '██');
  }

  const centerX = boardLeft + snapshot.width + 1;
  const centerY = boardTop + Math.floor(snapshot.height / 2);

  if (snapshot.status === 'paused') {
    const pauseMsg = '══ PAUSED ══';
    output += `${at(centerY - 3, centerX - Math.floor(pauseMsg.length / 2))}${accent}${pauseMsg}${RESET}`;
    output += renderSimpleMenu(PAUSE_MENU_ITEMS, options.pauseSelection ?? 0, {
      centerX,
      startY: centerY - 1,
      showShortcuts: false,
    });
  } else if (snapshot.status === 'gameOver') {
    const lines = [
      ['\x1b[1;31m', '══ GAME OVER ══'],
      [text, `SCORE: ${snapshot.score}`],
      [text, `LINES: ${snapshot.lines}  LEVEL: ${snapshot.level}`],
      [`${DIM}${accent}`, '[ R ] RESTART  [ Q ] QUIT'],
    ] as const;
    lines.forEach(([style, msg], i) => {
      // blank line under the heading
      const row = centerY - 2 + i + (i > 0 ? 1 : 0);
      output += `${at(row, centerX - Math.floor(msg.length / 2))}${style}${msg}${RESET}`;
    });
  }

  if (showSidePanel) {
    const panelX = boardLeft + boardCols + 2;
    const rule = '─'.repeat(SIDE_PANEL_WIDTH - 2);
    const panel = [
      panelLine('SCORE', String(snapshot.score)),
      panelLine('LEVEL', String(snapshot.level)),
      panelLine('LINES', String(snapshot.lines)),
      rule,
      'NEXT',
      '',
      '',
      '',
      rule,
      panelLine('AI', snapshot.advisorEnabled ? 'ON' : 'OFF'),
      panelLine('GHOST', snapshot.ghostEnabled ? 'ON' : 'OFF'),
      panelLine('SPEED', `${snapshot.dropIntervalMs}ms`),
      panelLine('ADAPT', snapshot.dynamicDifficulty ? `x${snapshot.difficulty.toFixed(2)}` : 'OFF'),
      panelLine('THEME', theme.name.toUpperCase()),
    ];
    panel.forEach((line, i) => {
      output += `${at(boardTop + i, panelX)}${accent}${line}${RESET}`;
    });

    // Next piece preview sits in the blank rows under NEXT
    const nextTop = boardTop + 5;
    for (const [x, y] of snapshot.next.cells) {
      const dx = x - snapshot.next.x;
      const dy = y - snapshot.next.y;
      output += `${at(nextTop + dy, panelX + 2 + dx * 2)}${hexToAnsi(snapshot.next.color)}██${RESET}`;
    }
  }

  const hint = cols >= CONTROLS_HINT.length ? CONTROLS_HINT : 'P PAUSE  Q QUIT';
  const hintX = Math.max(1, Math.floor((cols - hint.length) / 2));
  output += `${at(boardTop + snapshot.height + 2, hintX)}${hexToAnsi(theme.uiBackground, 'bg')}${DIM}${accent}${hint}${RESET}`;

  return output;
}
