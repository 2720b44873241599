/**
 * Piece shapes
 *
 * The seven kinds, their precomputed rotation bitmaps and default colors.
 * Tables are fixed data; nothing here rotates a matrix at runtime.
 */

import type { RandomSource } from './rng';

// ============================================================================
// Types
// ============================================================================

export const PIECE_KINDS = ['I', 'J', 'L', 'O', 'S', 'T', 'Z'] as const;
export type PieceKind = (typeof PIECE_KINDS)[number];

/** Hex color tag, e.g. `#00FFFF` */
export type CellColor = string;

export type ShapeBitmap = readonly (readonly (0 | 1)[])[];

export interface PieceDefinition {
  kind: PieceKind;
  rotations: readonly ShapeBitmap[];
  color: CellColor;
}

export type PiecePalette = Record<PieceKind, CellColor>;

export interface Piece {
  kind: PieceKind;
  rotation: number;
  x: number;
  y: number; // negative while partly above the grid
  color: CellColor;
}

// ============================================================================
// Rotation tables
// ============================================================================

export const PIECES: Record<PieceKind, PieceDefinition> = {
  I: {
    kind: 'I',
    color: '#00FFFF',
    rotations: [
      [
        [0, 0, 0, 0],
        [1, 1, 1, 1],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      [
        [0, 0, 1, 0],
        [0, 0, 1, 0],
        [0, 0, 1, 0],
        [0, 0, 1, 0],
      ],
      [
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [1, 1, 1, 1],
        [0, 0, 0, 0],
      ],
      [
        [0, 1, 0, 0],
        [0, 1, 0, 0],
        [0, 1, 0, 0],
        [0, 1, 0, 0],
      ],
    ],
  },
  J: {
    kind: 'J',
    color: '#0000FF',
    rotations: [
      [
        [1, 0, 0],
        [1, 1, 1],
        [0, 0, 0],
      ],
      [
        [0, 1, 1],
        [0, 1, 0],
        [0, 1, 0],
      ],
      [
        [0, 0, 0],
        [1, 1, 1],
        [0, 0, 1],
      ],
      [
        [0, 1, 0],
        [0, 1, 0],
        [1, 1, 0],
      ],
    ],
  },
  L: {
    kind: 'L',
    color: '#FFA500',
    rotations: [
      [
        [0, 0, 1],
        [1, 1, 1],
        [0, 0, 0],
      ],
      [
        [0, 1, 0],
        [0, 1, 0],
        [0, 1, 1],
      ],
      [
        [0, 0, 0],
        [1, 1, 1],
        [1, 0, 0],
      ],
      [
        [1, 1, 0],
        [0, 1, 0],
        [0, 1, 0],
      ],
    ],
  },
  O: {
    kind: 'O',
    color: '#FFFF00',
    rotations: [
      [
        [0, 1, 1, 0],
        [0, 1, 1, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
    ],
  },
  S: {
    kind: 'S',
    color: '#00FF00',
    rotations: [
      [
        [0, 1, 1],
        [1, 1, 0],
        [0, 0, 0],
      ],
      [
        [0, 1, 0],
        [0, 1, 1],
        [0, 0, 1],
      ],
      [
        [0, 0, 0],
        [0, 1, 1],
        [1, 1, 0],
      ],
      [
        [1, 0, 0],
        [1, 1, 0],
        [0, 1, 0],
      ],
    ],
  },
  T: {
    kind: 'T',
    color: '#800080',
    rotations: [
      [
        [0, 1, 0],
        [1, 1, 1],
        [0, 0, 0],
      ],
      [
        [0, 1, 0],
        [0, 1, 1],
        [0, 1, 0],
      ],
      [
        [0, 0, 0],
        [1, 1, 1],
        [0, 1, 0],
      ],
      [
        [0, 1, 0],
        [1, 1, 0],
        [0, 1, 0],
      ],
    ],
  },
  Z: {
    kind: 'Z',
    color: '#FF0000',
    rotations: [
      [
        [1, 1, 0],
        [0, 1, 1],
        [0, 0, 0],
      ],
      [
        [0, 0, 1],
        [0, 1, 1],
        [0, 1, 0],
      ],
      [
        [0, 0, 0],
        [1, 1, 0],
        [0, 1, 1],
      ],
      [
        [0, 1, 0],
        [1, 1, 0],
        [1, 0, 0],
      ],
    ],
  },
};

export const DEFAULT_PALETTE: PiecePalette = {
  I: PIECES.I.color,
  J: PIECES.J.color,
  L: PIECES.L.color,
  O: PIECES.O.color,
  S: PIECES.S.color,
  T: PIECES.T.color,
  Z: PIECES.Z.color,
};

// ============================================================================
// Shape queries
// ============================================================================

export function rotationCount(kind: PieceKind): number {
  return PIECES[kind].rotations.length;
}

export function shapeOf(kind: PieceKind, rotation: number): ShapeBitmap {
  const rotations = PIECES[kind].rotations;
  return rotations[rotation % rotations.length];
}

export function currentShape(piece: Piece): ShapeBitmap {
  return shapeOf(piece.kind, piece.rotation);
}

/**
 * Width of the occupied columns of a bitmap, ignoring empty padding
 * on either side. 0 for an empty bitmap.
 */
export function shapeWidth(shape: ShapeBitmap): number {
  let minX = Infinity;
  let maxX = -Infinity;
  for (const row of shape) {
    for (let x = 0; x < row.length; x++) {
      if (row[x]) {
        minX = Math.min(minX, x);
        maxX = Math.max(maxX, x);
      }
    }
  }
  return minX <= maxX ? maxX - minX + 1 : 0;
}

/**
 * Absolute grid coordinates of every occupied cell of the piece,
 * as `[x, y]` pairs in bitmap scan order.
 */
export function pieceCells(piece: Piece): [number, number][] {
  const cells: [number, number][] = [];
  const shape = currentShape(piece);
  for (let row = 0; row < shape.length; row++) {
    for (let col = 0; col < shape[row].length; col++) {
      if (shape[row][col]) {
        cells.push([piece.x + col, piece.y + row]);
      }
    }
  }
  return cells;
}

// ============================================================================
// Creation
// ============================================================================

export function createPiece(
  kind: PieceKind,
  gridWidth: number,
  color: CellColor = PIECES[kind].color,
): Piece {
  const size = PIECES[kind].rotations[0].length;
  return {
    kind,
    rotation: 0,
    x: Math.floor((gridWidth - size) / 2),
    y: 0,
    color,
  };
}

export function randomKind(random: RandomSource): PieceKind {
  return PIECE_KINDS[random.nextInt(PIECE_KINDS.length)];
}

export function spawnPiece(
  random: RandomSource,
  gridWidth: number,
  palette: PiecePalette = DEFAULT_PALETTE,
): Piece {
  const kind = randomKind(random);
  return createPiece(kind, gridWidth, palette[kind]);
}

export function clonePiece(piece: Piece): Piece {
  return { ...piece };
}
