/**
 * Performance-adaptive difficulty
 *
 * Tracks score, lines and how often the player follows the advisor,
 * and turns that into a fall interval. Pull-based: callers ask for the
 * interval every tick, the factor itself only moves once per window.
 */

export interface DifficultyOptions {
  baseIntervalMs?: number;
  minIntervalMs?: number;
  adjustEveryMs?: number;
  warmupMs?: number;
  accuracyWindow?: number;
  clock?: () => number;
}

export interface Placement {
  column: number;
  rotation: number;
}

interface Sample {
  at: number;
  value: number;
}

interface PlacementSample extends Placement {
  at: number;
}

interface AdvicePair {
  at: number;
  advised: Placement;
  played: Placement;
}

export const MIN_DIFFICULTY = 0.5;
export const MAX_DIFFICULTY = 2.0;

const MS_PER_MINUTE = 60_000;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export class DifficultyController {
  readonly baseIntervalMs: number;
  readonly minIntervalMs: number;

  private readonly adjustEveryMs: number;
  private readonly warmupMs: number;
  private readonly accuracyWindow: number;
  private readonly clock: () => number;

  private scores: Sample[] = [];
  private lines: Sample[] = [];
  private placements: PlacementSample[] = [];
  private advice: AdvicePair[] = [];

  private startedAt: number;
  private lastAdjustedAt: number;
  private factor = 1.0;

  constructor(options: DifficultyOptions = {}) {
    this.baseIntervalMs = options.baseIntervalMs ?? 1000;
    this.minIntervalMs = options.minIntervalMs ?? 100;
    this.adjustEveryMs = options.adjustEveryMs ?? 30_000;
    this.warmupMs = options.warmupMs ?? 6_000;
    this.accuracyWindow = options.accuracyWindow ?? 20;
    this.clock = options.clock ?? Date.now;

    this.startedAt = this.clock();
    this.lastAdjustedAt = this.startedAt;
  }

  get difficulty(): number {
    return this.factor;
  }

  get placementCount(): number {
    return this.placements.length;
  }

  recordScore(score: number, totalLines: number): void {
    const at = this.clock();
    this.scores.push({ at, value: score });
    this.lines.push({ at, value: totalLines });
  }

  /** Pairs are only kept when the advisor had a suggestion for this piece */
  recordPlacement(played: Placement, advised?: Placement): void {
    const at = this.clock();
    this.placements.push({ at, ...played });
    if (advised) {
      this.advice.push({ at, advised: { ...advised }, played: { ...played } });
    }
  }

  scorePerMinute(): number {
    return this.perMinute(this.scores);
  }

  linesPerMinute(): number {
    return this.perMinute(this.lines);
  }

  moveAccuracy(): number {
    if (this.advice.length === 0) return 0.5;

    const recent = this.advice.slice(-this.accuracyWindow);
    const matches = recent.filter(
      ({ advised, played }) =>
        advised.column === played.column && advised.rotation === played.rotation,
    ).length;
    return matches / recent.length;
  }

  /**
   * Recompute the factor if the adjustment window has elapsed,
   * then return the fall interval either way.
   */
  adjustDifficulty(): number {
    const now = this.clock();
    if (now - this.lastAdjustedAt < this.adjustEveryMs) {
      return this.currentInterval();
    }
    this.lastAdjustedAt = now;

    const scoreFactor = clamp(this.scorePerMinute() / 1000, 0.5, 1.5);
    const linesFactor = clamp(this.linesPerMinute() / 5, 0.5, 1.5);
    const accuracyFactor = 1.0 + (this.moveAccuracy() - 0.5);

    this.factor = clamp(
      0.5 * scoreFactor + 0.3 * linesFactor + 0.2 * accuracyFactor,
      MIN_DIFFICULTY,
      MAX_DIFFICULTY,
    );

    return this.currentInterval();
  }

  currentInterval(): number {
    return clamp(
      Math.floor(this.baseIntervalMs / this.factor),
      this.minIntervalMs,
      this.baseIntervalMs,
    );
  }

  reset(): void {
    this.scores = [];
    this.lines = [];
    this.placements = [];
    this.advice = [];
    this.factor = 1.0;
    this.startedAt = this.clock();
    this.lastAdjustedAt = this.startedAt;
  }

  private perMinute(samples: Sample[]): number {
    if (samples.length === 0) return 0;
    const elapsed = this.clock() - this.startedAt;
    if (elapsed < this.warmupMs) return 0;
    return samples[samples.length - 1].value / (elapsed / MS_PER_MINUTE);
  }
}
