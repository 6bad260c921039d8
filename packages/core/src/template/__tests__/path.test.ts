import { describe, it, expect } from 'vitest';

import { buildTemplate } from '../model.js';
import {
  findNodePath,
  findValuePath,
  joinIndex,
  joinKey,
  walkNodes,
} from '../path.js';

describe('path rendering', () => {
  it('joins keys with dots and indexes with brackets', () => {
    expect(joinKey('', 'a')).toBe('a');
    expect(joinKey('a', 'b')).toBe('a.b');
    expect(joinIndex('a', 1)).toBe('a[1]');
    expect(joinIndex('a[1]', 0)).toBe('a[1][0]');
  });

  it('uses bare indexes under a root sequence', () => {
    expect(joinIndex('', 0)).toBe('0');
    expect(joinKey(joinIndex('', 0), 'd')).toBe('0.d');
  });
});

describe('walkNodes', () => {
  it('visits mappings in insertion order and sequences by index', () => {
    const template = buildTemplate([{ d: 1 }, { a: [[1, 2]] }]);
    const paths = Array.from(walkNodes(template.root), ([, path]) => path);
    expect(paths).toEqual([
      '',
      '0',
      '0.d',
      '1',
      '1.a',
      '1.a[0]',
      '1.a[0][0]',
      '1.a[0][1]',
    ]);
  });
});

describe('findNodePath', () => {
  it('finds a node by identifier', () => {
    const template = buildTemplate({ a: { b: 1 }, c: [1, { d: 2 }] });
    // root 0, a 1, a.b 2, c 3, c[0] 4, c[1] 5, c[1].d 6
    expect(findNodePath(template.root, 6)).toBe('c[1].d');
    expect(findNodePath(template.root, 2)).toBe('a.b');
    expect(findNodePath(template.root, 42)).toBe('');
  });

  it('distinguishes a dotted key from a nested mapping', () => {
    const template = buildTemplate({ 'a.b': 1, a: { b: 1 } });
    // root 0, 'a.b' 1, a 2, a.b 3
    expect(findNodePath(template.root, 1)).toBe('a.b');
    expect(findNodePath(template.root, 3)).toBe('a.b');
    expect(template.expressions).toHaveLength(0);
  });
});

describe('findValuePath', () => {
  it('returns the first matching path', () => {
    expect(findValuePath({ a: { b: 5 }, c: [5] }, 5)).toBe('a.b');
    expect(findValuePath([{ x: [1, 2] }], [1, 2])).toBe('0.x');
    expect(findValuePath({ a: { b: { c: 1 } } }, { c: 1 })).toBe('a.b');
  });

  it('returns an empty string when nothing matches', () => {
    expect(findValuePath({ a: 1 }, 2)).toBe('');
  });
});
