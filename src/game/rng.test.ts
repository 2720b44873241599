import { describe, it, expect } from 'vitest';
import { XorShift32, randomSeed } from './rng';

describe('XorShift32', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = new XorShift32(99);
    const b = new XorShift32(99);
    const first = Array.from({ length: 8 }, () => a.nextInt(7));
    const second = Array.from({ length: 8 }, () => b.nextInt(7));
    expect(first).toEqual(second);
  });

  it('produces the xorshift sequence for seed 1', () => {
    const random = new XorShift32(1);
    expect(random.nextU32()).toBe(270369);
  });

  it('does not get stuck on a zero seed', () => {
    const random = new XorShift32(0);
    expect(random.nextU32()).not.toBe(0);
  });

  it('stays within range', () => {
    const random = new XorShift32(123);
    for (let i = 0; i < 500; i++) {
      const value = random.nextInt(7);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(7);
      expect(Number.isInteger(value)).toBe(true);
    }
  });
});

describe('randomSeed', () => {
  it('returns an unsigned 32-bit integer', () => {
    const seed = randomSeed();
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });
});
