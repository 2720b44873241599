/**
 * Seeded randomness for piece selection.
 */

export interface RandomSource {
  /** Uniform integer in `[0, maxExclusive)` */
  nextInt(maxExclusive: number): number;
}

export class XorShift32 implements RandomSource {
  private s: number;

  constructor(seed: number) {
    // avoid zero state
    this.s = seed | 0 || 0x12345678;
  }

  nextU32(): number {
    let x = this.s | 0;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.s = x | 0;
    return this.s >>> 0;
  }

  nextInt(maxExclusive: number): number {
    return this.nextU32() % maxExclusive;
  }
}

export function randomSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0xffffffff)) >>> 0;
}
