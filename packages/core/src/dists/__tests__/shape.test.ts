import { describe, it, expect } from 'vitest';
import { finalShape } from '../shape.js';

describe('finalShape', () => {
  it('keeps rank-0 draws scalar unless replicated', () => {
    expect(finalShape(0)).toEqual([]);
    expect(finalShape(0, 4)).toEqual([4]);
  });

  it('uses the rank as the vector length', () => {
    expect(finalShape(1)).toEqual([1]);
    expect(finalShape(3)).toEqual([3]);
    expect(finalShape(2, 4)).toEqual([4, 2]);
  });

  it('takes an explicit size verbatim for rank any', () => {
    expect(finalShape('any')).toEqual([]);
    expect(finalShape('any', undefined, 5)).toEqual([5]);
    expect(finalShape('any', 3, [2, 2])).toEqual([3, 2, 2]);
  });

  it('ignores the size for a fixed rank', () => {
    expect(finalShape(2, undefined, [7, 7])).toEqual([2]);
  });
});
