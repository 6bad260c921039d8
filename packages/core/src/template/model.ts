/**
 * Template tree
 *
 * Built once from a YAML/JSON-like value; Map entries keep their order. Leaves holding an
 * expression are parsed here; every node gets a pre-order identifier that
 * is used for path lookup and as the distribution cache key.
 */

import {
  type Expression,
  detectExpression,
  parseExpression,
} from '../expression/parser.js';
import { ConfigError, type ExpressionParseError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { Result } from '../types/result.js';
import type { PlainValue, ScalarValue } from '../types/values.js';
import { isPlainObject } from '../types/values.js';
import { indexNodePaths, joinIndex, joinKey } from './path.js';

export type NodeId = number;

export interface MappingNode {
  kind: 'mapping';
  id: NodeId;
  entries: ReadonlyArray<readonly [string, TemplateNode]>;
}

export interface SequenceNode {
  kind: 'sequence';
  id: NodeId;
  items: readonly TemplateNode[];
}

export interface ScalarNode {
  kind: 'scalar';
  id: NodeId;
  value: ScalarValue;
}

export interface ExpressionNode {
  kind: 'expression';
  id: NodeId;
  source: string;
  expression: Result<Expression, ExpressionParseError>;
}

export type TemplateNode = MappingNode | SequenceNode | ScalarNode | ExpressionNode;

export interface Template {
  readonly root: TemplateNode;
  /** Plain copy of the source tree, expressions left as text. */
  readonly source: PlainValue;
  readonly nodeCount: number;
  readonly expressions: readonly ExpressionNode[];
  pathOf(id: NodeId): string;
}

export function buildTemplate(source: unknown): Template {
  let nextId = 0;
  const expressions: ExpressionNode[] = [];

  const build = (value: unknown, path: string): TemplateNode => {
    const id = nextId++;
    if (Array.isArray(value)) {
      return {
        kind: 'sequence',
        id,
        items: value.map((item, i) => build(item, joinIndex(path, i))),
      };
    }
    if (value instanceof Map) {
      return {
        kind: 'mapping',
        id,
        entries: Array.from(value, ([key, child]) => {
          const name = mappingKey(key, path);
          return [name, build(child, joinKey(path, name))] as const;
        }),
      };
    }
    if (isPlainObject(value)) {
      return {
        kind: 'mapping',
        id,
        entries: Object.entries(value).map(
          ([key, child]) => [key, build(child, joinKey(path, key))] as const
        ),
      };
    }
    if (typeof value === 'string' && detectExpression(value) !== null) {
      const node: ExpressionNode = {
        kind: 'expression',
        id,
        source: value,
        expression: parseExpression(value),
      };
      expressions.push(node);
      return node;
    }
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'boolean' ||
      (typeof value === 'number' && Number.isFinite(value))
    ) {
      return { kind: 'scalar', id, value };
    }
    throw new ConfigError({
      message: `Unsupported template value at '${path}': ${String(value)}`,
      errorCode: ErrorCode.TEMPLATE_LOAD_FAILED,
      context: { path, value: String(value) },
    });
  };

  const root = build(source, '');
  const paths = indexNodePaths(root);

  return {
    root,
    source: toPlain(root),
    nodeCount: nextId,
    expressions,
    pathOf: (id) => paths.get(id) ?? '',
  };
}

function mappingKey(key: unknown, path: string): string {
  if (
    key === null ||
    typeof key === 'string' ||
    typeof key === 'number' ||
    typeof key === 'boolean'
  ) {
    return String(key);
  }
  throw new ConfigError({
    message: `Unsupported mapping key at '${path}': keys must be scalars`,
    errorCode: ErrorCode.TEMPLATE_LOAD_FAILED,
    context: { path },
  });
}

/**
 * Rebuild the plain value of a (sub)tree, expressions as their source text.
 */
export function toPlain(node: TemplateNode): PlainValue {
  switch (node.kind) {
    case 'mapping':
      return Object.fromEntries(
        node.entries.map(([key, child]) => [key, toPlain(child)])
      );
    case 'sequence':
      return node.items.map(toPlain);
    case 'scalar':
      return node.value;
    case 'expression':
      return node.source;
  }
}
