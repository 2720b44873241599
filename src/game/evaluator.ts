/**
 * Move Evaluator
 *
 * Linear heuristic over the surface of a hypothetical board.
 * Higher is better.
 */

import {
  type Grid,
  aggregateHeight,
  bumpiness,
  countCompleteRows,
  countHoles,
} from './grid';

// Empirically tuned; keep the exact values.
export const EVALUATION_WEIGHTS = {
  aggregateHeight: -0.510066,
  completeLines: 0.760666,
  holes: -0.35663,
  bumpiness: -0.184483,
} as const;

export interface GridFeatures {
  aggregateHeight: number;
  completeLines: number;
  holes: number;
  bumpiness: number;
}

/** Complete lines are counted before any clearing. */
export function measureGrid(grid: Grid): GridFeatures {
  return {
    aggregateHeight: aggregateHeight(grid),
    completeLines: countCompleteRows(grid),
    holes: countHoles(grid),
    bumpiness: bumpiness(grid),
  };
}

export function scoreFeatures(features: GridFeatures): number {
  return (
    EVALUATION_WEIGHTS.aggregateHeight * features.aggregateHeight +
    EVALUATION_WEIGHTS.completeLines * features.completeLines +
    EVALUATION_WEIGHTS.holes * features.holes +
    EVALUATION_WEIGHTS.bumpiness * features.bumpiness
  );
}

export function evaluateGrid(grid: Grid): number {
  return scoreFeatures(measureGrid(grid));
}
