/**
 * Seeded RNG Tests
 */

import { describe, it, expect } from 'vitest';
import { SeededRNG, deriveSeed } from '../../src/simulation/rng.js';

describe('SeededRNG', () => {
  it('should produce the same sequence for the same seed', () => {
    const a = new SeededRNG(1234);
    const b = new SeededRNG(1234);
    const seqA = Array.from({ length: 10 }, () => a.next());
    const seqB = Array.from({ length: 10 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('should keep values in range', () => {
    const rng = new SeededRNG(99);
    for (let i = 0; i < 500; i++) {
      const f = rng.next();
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);
      const n = rng.int(2, 6);
      expect(n).toBeGreaterThanOrEqual(2);
      expect(n).toBeLessThanOrEqual(6);
      expect(Number.isInteger(n)).toBe(true);
    }
  });

  it('should resume from a saved state', () => {
    const rng = new SeededRNG(7);
    rng.next();
    const saved = rng.getState();
    const expected = [rng.next(), rng.next()];

    const restored = new SeededRNG(0);
    restored.setState(saved);
    expect([restored.next(), restored.next()]).toEqual(expected);
  });

  it('should derive distinct streams from one seed', () => {
    expect(deriveSeed(42, 1)).not.toBe(deriveSeed(42, 2));
    expect(deriveSeed(42, 1)).toBe(deriveSeed(42, 1));
  });
});
