/**
 * Piece movement
 *
 * Unit moves, hard drop and rotation with wall kicks. Every operation
 * leaves the piece in a non-colliding state and reports whether it moved.
 */

import { collides, type Grid } from './grid';
import { type Piece, rotationCount } from './shapes';

/** Horizontal corrections tried, in order, when a rotation collides */
export const WALL_KICKS = [1, -1, 2, -2] as const;

export type PiecePhase = 'falling' | 'landed' | 'committed';

export function tryMove(grid: Grid, piece: Piece, dx: number, dy: number): boolean {
  piece.x += dx;
  piece.y += dy;
  if (collides(grid, piece)) {
    piece.x -= dx;
    piece.y -= dy;
    return false;
  }
  return true;
}

/** True if a unit step down would collide */
export function isBlockedBelow(grid: Grid, piece: Piece): boolean {
  piece.y += 1;
  const blocked = collides(grid, piece);
  piece.y -= 1;
  return blocked;
}

/**
 * Move down until the next step would collide.
 * Returns the number of rows travelled.
 */
export function hardDrop(grid: Grid, piece: Piece): number {
  let rows = 0;
  while (tryMove(grid, piece, 0, 1)) rows++;
  return rows;
}

/**
 * Advance to the next rotation. If it collides, try each wall kick;
 * if none fit, restore rotation and position and return false.
 */
export function rotate(grid: Grid, piece: Piece): boolean {
  const oldRotation = piece.rotation;
  const oldX = piece.x;

  piece.rotation = (piece.rotation + 1) % rotationCount(piece.kind);
  if (!collides(grid, piece)) return true;

  for (const kick of WALL_KICKS) {
    piece.x = oldX + kick;
    if (!collides(grid, piece)) return true;
  }

  piece.x = oldX;
  piece.rotation = oldRotation;
  return false;
}
