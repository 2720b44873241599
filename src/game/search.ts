/**
 * Placement Search
 *
 * Brute-force evaluates every rotation × column landing for the falling
 * piece's kind and keeps the best. Advisory only: nothing here moves the
 * live piece.
 */

import { type Grid, cloneGrid, collides, place } from './grid';
import { evaluateGrid } from './evaluator';
import { type Piece, clonePiece, rotationCount, shapeOf, shapeWidth } from './shapes';

export interface CandidateMove {
  rotation: number;
  column: number;
  landingRow: number;
  score: number;
}

/** Columns tried on each side beyond the trimmed shape width */
export const COLUMN_OVERHANG = 2;

/**
 * Row the probe comes to rest on when dropped from its current row:
 * one above the first colliding row. The probe is not mutated.
 */
export function landingRow(grid: Grid, piece: Piece): number {
  const probe = clonePiece(piece);
  while (!collides(grid, probe)) probe.y++;
  return probe.y - 1;
}

/** Where the piece would land if hard-dropped now */
export function ghostOf(grid: Grid, piece: Piece): Piece {
  const ghost = clonePiece(piece);
  ghost.y = landingRow(grid, piece);
  return ghost;
}

/** Advisory ghost for a candidate move */
export function adviceOf(piece: Piece, move: CandidateMove): Piece {
  return {
    ...piece,
    rotation: move.rotation,
    x: move.column,
    y: move.landingRow,
  };
}

/**
 * Best (rotation, column) for the piece's kind, ignoring its live position.
 * Ties keep the first found (rotation ascending, then column ascending).
 * Returns null when no placement is legal.
 */
export function findBestPlacement(grid: Grid, piece: Piece): CandidateMove | null {
  let best: CandidateMove | null = null;

  for (let rotation = 0; rotation < rotationCount(piece.kind); rotation++) {
    const width = shapeWidth(shapeOf(piece.kind, rotation));
    const lastColumn = grid.width - width + COLUMN_OVERHANG;

    for (let column = -COLUMN_OVERHANG; column <= lastColumn; column++) {
      const probe: Piece = { ...piece, rotation, x: column, y: 0 };
      if (collides(grid, probe)) continue;

      probe.y = landingRow(grid, probe);

      const scratch = cloneGrid(grid);
      place(scratch, probe);
      const score = evaluateGrid(scratch);

      if (best === null || score > best.score) {
        best = { rotation, column, landingRow: probe.y, score };
      }
    }
  }

  return best;
}
