/**
 * Grid Model
 *
 * Board occupancy plus a parallel color layer, stored as flat row-major
 * arrays so a scratch copy for search is two array copies.
 * A cell is colored iff it is filled.
 */

import { type CellColor, type Piece, currentShape } from './shapes';

export const DEFAULT_WIDTH = 10;
export const DEFAULT_HEIGHT = 20;

export interface Grid {
  readonly width: number;
  readonly height: number;
  cells: boolean[];
  colors: (CellColor | null)[];
}

// ============================================================================
// Creation
// ============================================================================

export function createGrid(width = DEFAULT_WIDTH, height = DEFAULT_HEIGHT): Grid {
  return {
    width,
    height,
    cells: new Array<boolean>(width * height).fill(false),
    colors: new Array<CellColor | null>(width * height).fill(null),
  };
}

export function cloneGrid(grid: Grid): Grid {
  return {
    width: grid.width,
    height: grid.height,
    cells: grid.cells.slice(),
    colors: grid.colors.slice(),
  };
}

// ============================================================================
// Cell access
// ============================================================================

function inBounds(grid: Grid, x: number, y: number): boolean {
  return x >= 0 && x < grid.width && y >= 0 && y < grid.height;
}

export function isFilled(grid: Grid, x: number, y: number): boolean {
  return inBounds(grid, x, y) && grid.cells[y * grid.width + x];
}

export function colorAt(grid: Grid, x: number, y: number): CellColor | null {
  return inBounds(grid, x, y) ? grid.colors[y * grid.width + x] : null;
}

/** Set one cell; `null` empties it. Out-of-range writes are ignored. */
export function setCell(grid: Grid, x: number, y: number, color: CellColor | null): void {
  if (!inBounds(grid, x, y)) return;
  const i = y * grid.width + x;
  grid.cells[i] = color !== null;
  grid.colors[i] = color;
}

/** Row-major copy of the color layer, for renderers and tests */
export function gridRows(grid: Grid): (CellColor | null)[][] {
  const rows: (CellColor | null)[][] = [];
  for (let y = 0; y < grid.height; y++) {
    rows.push(grid.colors.slice(y * grid.width, (y + 1) * grid.width));
  }
  return rows;
}

// ============================================================================
// Collision & placement
// ============================================================================

/**
 * True if any occupied cell of the piece is outside the side walls,
 * below the floor, or on a filled cell. Rows above the grid (y < 0)
 * only collide with the walls.
 */
export function collides(grid: Grid, piece: Piece): boolean {
  const shape = currentShape(piece);
  for (let row = 0; row < shape.length; row++) {
    for (let col = 0; col < shape[row].length; col++) {
      if (!shape[row][col]) continue;
      const x = piece.x + col;
      const y = piece.y + row;
      if (x < 0 || x >= grid.width || y >= grid.height) return true;
      if (y >= 0 && grid.cells[y * grid.width + x]) return true;
    }
  }
  return false;
}

/** Bake the piece into the grid. Cells above row 0 are dropped. */
export function place(grid: Grid, piece: Piece): void {
  const shape = currentShape(piece);
  for (let row = 0; row < shape.length; row++) {
    for (let col = 0; col < shape[row].length; col++) {
      if (shape[row][col]) {
        setCell(grid, piece.x + col, piece.y + row, piece.color);
      }
    }
  }
}

// ============================================================================
// Line clearing
// ============================================================================

function isRowComplete(grid: Grid, y: number): boolean {
  const start = y * grid.width;
  for (let x = 0; x < grid.width; x++) {
    if (!grid.cells[start + x]) return false;
  }
  return true;
}

export function countCompleteRows(grid: Grid): number {
  let count = 0;
  for (let y = 0; y < grid.height; y++) {
    if (isRowComplete(grid, y)) count++;
  }
  return count;
}

/**
 * Remove every complete row, shifting the rows above down by one each time.
 * The same index is checked again after a shift since a new row slid into it.
 */
export function clearCompletedRows(grid: Grid): number {
  const { width } = grid;
  let cleared = 0;
  let y = grid.height - 1;

  while (y >= 0) {
    if (!isRowComplete(grid, y)) {
      y--;
      continue;
    }

    // rows [0, y) move to [1, y]
    grid.cells.copyWithin(width, 0, y * width);
    grid.colors.copyWithin(width, 0, y * width);
    grid.cells.fill(false, 0, width);
    grid.colors.fill(null, 0, width);
    cleared++;
  }

  return cleared;
}

// ============================================================================
// Surface metrics
// ============================================================================

/** Distance from the floor to the topmost filled cell, per column */
export function columnHeights(grid: Grid): number[] {
  const heights = new Array<number>(grid.width).fill(0);
  for (let x = 0; x < grid.width; x++) {
    for (let y = 0; y < grid.height; y++) {
      if (grid.cells[y * grid.width + x]) {
        heights[x] = grid.height - y;
        break;
      }
    }
  }
  return heights;
}

export function aggregateHeight(grid: Grid): number {
  return columnHeights(grid).reduce((sum, h) => sum + h, 0);
}

/** Empty cells with a filled cell somewhere above them in the same column */
export function countHoles(grid: Grid): number {
  let holes = 0;
  for (let x = 0; x < grid.width; x++) {
    let covered = false;
    for (let y = 0; y < grid.height; y++) {
      if (grid.cells[y * grid.width + x]) {
        covered = true;
      } else if (covered) {
        holes++;
      }
    }
  }
  return holes;
}

export function bumpiness(grid: Grid): number {
  const heights = columnHeights(grid);
  let total = 0;
  for (let x = 0; x < heights.length - 1; x++) {
    total += Math.abs(heights[x] - heights[x + 1]);
  }
  return total;
}
