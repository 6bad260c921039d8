import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  fnv1a32,
  MAX_SEED,
  normalizeSeed,
  SeededRandom,
  XorShift32,
} from '../rng.js';

describe('RNG utilities', () => {
  describe('fnv1a32', () => {
    it('computes correct FNV-1a hash for known strings', () => {
      expect(fnv1a32('')).toBe(2166136261);
      expect(fnv1a32('a')).toBe(3826002220);
      expect(fnv1a32('hello')).toBe(1335831723);
      expect(fnv1a32('world')).toBe(933488787);
    });

    it('returns uint32 values', () => {
      const hash = fnv1a32('scenario');
      expect(hash).toBe(hash >>> 0);
    });
  });

  describe('XorShift32', () => {
    it('follows the xorshift32 step from the seeded state', () => {
      // seed 1, empty stream: x0 = 1 ^ 2166136261
      const rng = new XorShift32(1, '');
      let x = 2166136260;
      x ^= (x << 13) >>> 0;
      x ^= x >>> 17;
      x ^= (x << 5) >>> 0;
      expect(rng.next()).toBe(x >>> 0);
    });

    it('is deterministic per seed and stream', () => {
      const a = new XorShift32(42, 'scenario');
      const b = new XorShift32(42, 'scenario');
      const c = new XorShift32(42, 'other');
      const seqA = Array.from({ length: 5 }, () => a.next());
      const seqB = Array.from({ length: 5 }, () => b.next());
      expect(seqA).toEqual(seqB);
      expect(c.next()).not.toBe(seqA[0]);
    });

    it('leaves the all-zero state', () => {
      // seed equal to the stream hash would start at 0
      const rng = new XorShift32(fnv1a32(''), '');
      const first = rng.next();
      expect(first).toBeGreaterThan(0);
      expect(rng.next()).not.toBe(first);
    });

    it('nextFloat01() stays inside the unit interval', () => {
      const rng = new XorShift32(1337, 'unit');
      for (let i = 0; i < 1000; i++) {
        const val = rng.nextFloat01();
        expect(val).toBeGreaterThan(0);
        expect(val).toBeLessThan(1);
      }
    });
  });

  describe('normalizeSeed', () => {
    it('truncates and wraps to uint32', () => {
      expect(normalizeSeed(3.9)).toBe(3);
      expect(normalizeSeed(-1)).toBe(MAX_SEED);
      expect(normalizeSeed(0)).toBe(0);
    });

    it('draws a seed when none is given', () => {
      const seed = normalizeSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThan(MAX_SEED);
    });
  });

  describe('SeededRandom', () => {
    it('keeps uniform draws in [low, high)', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: MAX_SEED }),
          fc.double({ min: -1e6, max: 1e6, noNaN: true }),
          fc.double({ min: 1e-3, max: 1e6, noNaN: true }),
          (seed, low, width) => {
            const rng = new SeededRandom(seed);
            const high = low + width;
            for (let i = 0; i < 20; i++) {
              const value = rng.uniform(low, high);
              expect(value).toBeGreaterThanOrEqual(low);
              expect(value).toBeLessThan(high);
            }
          }
        ),
        { seed: 424242, numRuns: 100 }
      );
    });

    it('draws across a range wider than the largest double', () => {
      const rng = new SeededRandom(3);
      const values = Array.from({ length: 50 }, () => rng.uniform(-1e308, 1e308));
      for (const value of values) {
        expect(Number.isFinite(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(-1e308);
        expect(value).toBeLessThan(1e308);
      }
      expect(values.filter((value) => value !== -1e308).length).toBeGreaterThan(45);
    });

    it('returns the bound of a degenerate uniform range', () => {
      expect(new SeededRandom(5).uniform(2, 2)).toBe(2);
    });

    it('honours integer endpoints', () => {
      const rng = new SeededRandom(11);
      const inclusive = new Set<number>();
      const exclusive = new Set<number>();
      for (let i = 0; i < 400; i++) {
        inclusive.add(rng.integer(0, 2, true));
        exclusive.add(rng.integer(0, 2, false));
      }
      expect([...inclusive].sort()).toEqual([0, 1, 2]);
      expect([...exclusive].sort()).toEqual([0, 1]);
    });

    it('bernoulli is fixed at p = 0 and p = 1', () => {
      const rng = new SeededRandom(3);
      for (let i = 0; i < 50; i++) {
        expect(rng.bernoulli(0)).toBe(0);
        expect(rng.bernoulli(1)).toBe(1);
      }
    });

    it('categorical never picks a zero-weight index', () => {
      const rng = new SeededRandom(9);
      for (let i = 0; i < 50; i++) {
        expect(rng.categorical([0, 1, 0])).toBe(1);
        expect([0, 2]).toContain(rng.categorical([0.5, 0, 0.5]));
      }
    });

    it('normal with zero spread returns the mean', () => {
      const rng = new SeededRandom(21);
      expect(rng.normal(4.5, 0)).toBe(4.5);
      expect(Number.isFinite(rng.normal(0, 1))).toBe(true);
    });

    it('same seed gives the same stream', () => {
      const a = new SeededRandom(77);
      const b = new SeededRandom(77);
      expect([a.uniform(0, 1), a.normal(0, 1), a.integer(0, 9, true)]).toEqual(
        [b.uniform(0, 1), b.normal(0, 1), b.integer(0, 9, true)]
      );
      expect(a.seed).toBe(77);
    });
  });
});
