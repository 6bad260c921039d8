import { randomInt } from 'node:crypto';

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

// xorshift32 never leaves the all-zero state
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(stream)
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number, stream: string) {
    const initial = ((seed >>> 0) ^ fnv1a32(stream)) >>> 0;
    this.x = initial === 0 ? ZERO_STATE_REPLACEMENT : initial;
  }

  /** Returns the next uint32 value (never 0). */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in (0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }
}

/**
 * Draws consumed by the distribution catalog.
 */
export interface RandomSource {
  readonly seed: number;
  /** Uniform float in [low, high). */
  uniform(low: number, high: number): number;
  /** 1 with probability p, else 0. */
  bernoulli(p: number): 0 | 1;
  /** Integer in [low, high] when endpoint is true, else [low, high). */
  integer(low: number, high: number, endpoint: boolean): number;
  /** Index drawn according to non-negative weights summing to 1. */
  categorical(weights: readonly number[]): number;
  normal(mean: number, std: number): number;
}

export const MAX_SEED = 0xffffffff;

export function normalizeSeed(seed?: number): number {
  if (seed === undefined) {
    return randomInt(0, MAX_SEED);
  }
  return Math.trunc(seed) >>> 0;
}

export class SeededRandom implements RandomSource {
  public readonly seed: number;
  private readonly source: XorShift32;

  constructor(seed?: number, stream = 'scenario') {
    this.seed = normalizeSeed(seed);
    this.source = new XorShift32(this.seed, stream);
  }

  uniform(low: number, high: number): number {
    if (low === high) return low;
    const u = this.source.nextFloat01();
    // `high - low` can overflow near the float limits
    const value = low * (1 - u) + high * u;
    // Float rounding can land on or past a bound
    return value >= low && value < high ? value : low;
  }

  bernoulli(p: number): 0 | 1 {
    return this.source.nextFloat01() < p ? 1 : 0;
  }

  integer(low: number, high: number, endpoint: boolean): number {
    const span = high - low + (endpoint ? 1 : 0);
    return low + Math.floor(this.source.nextFloat01() * span);
  }

  categorical(weights: readonly number[]): number {
    const u = this.source.nextFloat01();
    let cumulative = 0;
    let last = 0;
    for (let i = 0; i < weights.length; i++) {
      const weight = weights[i] ?? 0;
      if (weight <= 0) continue;
      cumulative += weight;
      last = i;
      if (u < cumulative) return i;
    }
    return last;
  }

  normal(mean: number, std: number): number {
    // Box–Muller; nextFloat01 never returns 0 so the log is finite
    const u1 = this.source.nextFloat01();
    const u2 = this.source.nextFloat01();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + std * z;
  }
}
