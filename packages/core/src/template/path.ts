/**
 * Template paths: `a.b.c` through mappings, `a[1].b` through sequences.
 * Items of a root-level sequence use their bare index (`0.d`) and nested
 * sequences chain brackets (`a[0][1]`).
 */

import type { PlainValue } from '../types/values.js';
import type { NodeId, TemplateNode } from './model.js';

export function joinKey(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

export function joinIndex(parent: string, index: number): string {
  return parent === '' ? String(index) : `${parent}[${index}]`;
}

/**
 * Pre-order walk over every node with its path (mapping keys in insertion
 * order, sequence items in index order).
 */
export function* walkNodes(
  node: TemplateNode,
  path = ''
): Generator<[TemplateNode, string]> {
  yield [node, path];
  if (node.kind === 'mapping') {
    for (const [key, child] of node.entries) {
      yield* walkNodes(child, joinKey(path, key));
    }
  } else if (node.kind === 'sequence') {
    for (let i = 0; i < node.items.length; i++) {
      const child = node.items[i];
      if (child) yield* walkNodes(child, joinIndex(path, i));
    }
  }
}

/**
 * Path of the node carrying `id`, or '' when no such node exists.
 */
export function findNodePath(root: TemplateNode, id: NodeId): string {
  for (const [node, path] of walkNodes(root)) {
    if (node.id === id) return path;
  }
  return '';
}

export function indexNodePaths(root: TemplateNode): Map<NodeId, string> {
  const paths = new Map<NodeId, string>();
  for (const [node, path] of walkNodes(root)) {
    paths.set(node.id, path);
  }
  return paths;
}

/**
 * First path whose value deep-equals `target` in a plain tree, or ''.
 * Equal values at different positions resolve to the first one visited, so
 * this is only suitable for auditing; resolution uses node identifiers.
 */
export function findValuePath(root: PlainValue, target: PlainValue): string {
  const visit = (value: PlainValue, path: string): string | null => {
    if (Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) {
        const item = value[i];
        if (item === undefined) continue;
        const childPath = joinIndex(path, i);
        if (deepEqual(item, target)) return childPath;
        const found = visit(item, childPath);
        if (found !== null) return found;
      }
      return null;
    }
    if (value !== null && typeof value === 'object') {
      for (const [key, child] of Object.entries(value)) {
        const childPath = joinKey(path, key);
        if (deepEqual(child, target)) return childPath;
        const found = visit(child, childPath);
        if (found !== null) return found;
      }
    }
    return null;
  };
  return visit(root, '') ?? '';
}

function deepEqual(a: PlainValue, b: PlainValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    return (
      a.length === b.length &&
      a.every((item, i) => {
        const other = b[i];
        return other !== undefined && deepEqual(item, other);
      })
    );
  }
  if (
    a === null ||
    b === null ||
    typeof a !== 'object' ||
    typeof b !== 'object'
  ) {
    return false;
  }
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  return (
    aKeys.length === bKeys.length &&
    aKeys.every((key) => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && deepEqual(left, right);
    })
  );
}
