import { describe, it, expect } from 'vitest';
import { EVALUATION_WEIGHTS, evaluateGrid, measureGrid, scoreFeatures } from './evaluator';
import { createGrid, setCell } from './grid';

describe('scoreFeatures', () => {
  it('is the weighted sum of the four features', () => {
    const score = scoreFeatures({ aggregateHeight: 4, completeLines: 1, holes: 2, bumpiness: 3 });
    expect(score).toBeCloseTo(-2.546307, 6);
  });

  it('rewards complete lines and penalises the rest', () => {
    expect(EVALUATION_WEIGHTS.completeLines).toBeGreaterThan(0);
    expect(EVALUATION_WEIGHTS.aggregateHeight).toBeLessThan(0);
    expect(EVALUATION_WEIGHTS.holes).toBeLessThan(0);
    expect(EVALUATION_WEIGHTS.bumpiness).toBeLessThan(0);
  });
});

describe('measureGrid', () => {
  it('counts a full row before it is cleared', () => {
    const grid = createGrid();
    for (let x = 0; x < grid.width; x++) setCell(grid, x, 19, '#FFFFFF');
    expect(measureGrid(grid)).toEqual({
      aggregateHeight: 10,
      completeLines: 1,
      holes: 0,
      bumpiness: 0,
    });
  });

  it('picks up holes and bumps', () => {
    const grid = createGrid();
    setCell(grid, 0, 17, '#FFFFFF');
    setCell(grid, 0, 19, '#FFFFFF');
    setCell(grid, 1, 18, '#FFFFFF');
    expect(measureGrid(grid)).toEqual({
      aggregateHeight: 5,
      completeLines: 0,
      holes: 2,
      bumpiness: 3,
    });
  });
});

describe('evaluateGrid', () => {
  it('scores an empty grid as zero', () => {
    expect(evaluateGrid(createGrid())).toBeCloseTo(0, 10);
  });

  it('prefers a flat surface over a tower of the same cells', () => {
    const flat = createGrid();
    const tower = createGrid();
    for (let i = 0; i < 4; i++) {
      setCell(flat, i, 19, '#FFFFFF');
      setCell(tower, 0, 19 - i, '#FFFFFF');
    }
    expect(evaluateGrid(flat)).toBeGreaterThan(evaluateGrid(tower));
  });
});
