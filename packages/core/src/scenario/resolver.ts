/**
 * Expression resolver
 *
 * Walks an immutable template and builds a fresh concrete tree, replacing
 * each expression node by one sample from the distribution cached for that
 * node. Paths are computed against the template, never the output.
 */

import {
  type CatalogEntry,
  createDistribution,
  lookupDistribution,
} from '../dists/catalog.js';
import type { DistributionInstance, RawParams } from '../dists/distribution.js';
import { ErrorCode } from '../errors/codes.js';
import { suggestDistributionNames } from '../errors/suggestions.js';
import type { Expression } from '../expression/parser.js';
import type {
  ExpressionNode,
  Template,
  TemplateNode,
} from '../template/model.js';
import {
  type ErrorContext,
  ExpressionParseError,
  InvalidDistributionSpecError,
} from '../types/errors.js';
import type { ExpressionArg, PlainValue, SampleValue } from '../types/values.js';
import type { RandomSource } from '../util/rng.js';
import type { CacheTransaction } from './cache.js';
import {
  DIAGNOSTIC_CODES,
  type DiagnosticListener,
  type ResolutionDiagnostic,
} from './diagnostics.js';

export type Provenance = Record<string, SampleValue>;

export interface ResolutionResult {
  /** Concrete tree, every expression replaced by its sample. */
  scenario: PlainValue;
  /** path -> value sampled during this resolution only. */
  provenance: Provenance;
  diagnostics: ResolutionDiagnostic[];
}

export interface ResolveContext {
  template: Template;
  cache: CacheTransaction;
  rng: RandomSource;
  numEnv?: number;
  onDiagnostic?: DiagnosticListener;
}

export function resolveTemplate(ctx: ResolveContext): ResolutionResult {
  const sampled: [string, SampleValue][] = [];
  const diagnostics: ResolutionDiagnostic[] = [];

  const report = (diagnostic: ResolutionDiagnostic): void => {
    diagnostics.push(diagnostic);
    ctx.onDiagnostic?.(diagnostic);
  };

  const visit = (node: TemplateNode): PlainValue => {
    switch (node.kind) {
      case 'mapping':
        return Object.fromEntries(
          node.entries.map(([key, child]) => [key, visit(child)])
        );
      case 'sequence':
        return node.items.map(visit);
      case 'scalar':
        return node.value;
      case 'expression': {
        const path = ctx.template.pathOf(node.id);
        const sample = sampleNode(node, path, ctx, report);
        sampled.push([path, structuredClone(sample)]);
        return sample;
      }
    }
  };

  const scenario = visit(ctx.template.root);
  // Paths such as `__proto__` must land as own keys
  const provenance: Provenance = Object.fromEntries(sampled);
  return { scenario, provenance, diagnostics };
}

function sampleNode(
  node: ExpressionNode,
  path: string,
  ctx: ResolveContext,
  report: DiagnosticListener
): SampleValue {
  if (node.expression.isErr()) {
    const parseError = node.expression.error;
    throw new ExpressionParseError({
      message: `Malformed expression at '${path}': ${parseError.message}`,
      position: parseError.position,
      context: { path, source: node.source },
      cause: parseError,
    });
  }

  const expression = node.expression.value;
  const entry = lookupDistribution(expression.distribution);
  if (!entry) {
    const error = new InvalidDistributionSpecError({
      message: `Unknown distribution '${expression.distribution}' at '${path}'`,
      errorCode: ErrorCode.UNKNOWN_DISTRIBUTION,
      context: specContext(path, node.source, expression),
    });
    error.suggestions = suggestDistributionNames(expression.distribution);
    throw error;
  }

  const params = bindArguments(entry, expression, path, node.source, report);
  const instance = ctx.cache.getOrCreate(node.id, () =>
    instantiate(entry, params, path, node.source, expression, ctx)
  );
  return instance.sample();
}

/**
 * Map positional and keyword arguments onto the parameter list of `entry`.
 * Positionals beyond the arity are dropped with a diagnostic.
 */
export function bindArguments(
  entry: CatalogEntry,
  expression: Expression,
  path: string,
  source: string,
  report: DiagnosticListener
): RawParams {
  const { paramNames } = entry.definition;
  const arity = paramNames.length;
  let args = expression.args;

  if (args.length > arity) {
    report({
      code: DIAGNOSTIC_CODES.EXCESS_DISTRIBUTION_ARGS,
      path,
      details: {
        distribution: entry.name,
        expected: arity,
        received: args.length,
      },
    });
    args = args.slice(0, arity);
  }

  const params: (ExpressionArg | undefined)[] = paramNames.map(
    (_, index) => args[index]
  );

  for (const [key, value] of Object.entries(expression.kwargs)) {
    const index = paramNames.indexOf(key);
    if (index < 0) {
      throw new InvalidDistributionSpecError({
        message: `${entry.name} has no parameter '${key}' (at '${path}')`,
        context: specContext(path, source, expression),
      });
    }
    if (params[index] !== undefined) {
      throw new InvalidDistributionSpecError({
        message: `'${key}' of ${entry.name} is given both by position and by keyword (at '${path}')`,
        context: specContext(path, source, expression),
      });
    }
    params[index] = value;
  }

  for (let index = 0; index < entry.definition.required; index++) {
    if (params[index] === undefined) {
      throw new InvalidDistributionSpecError({
        message: `${entry.name} is missing required parameter '${paramNames[index]}' (at '${path}')`,
        context: specContext(path, source, expression),
      });
    }
  }

  return params;
}

function instantiate(
  entry: CatalogEntry,
  params: RawParams,
  path: string,
  source: string,
  expression: Expression,
  ctx: ResolveContext
): DistributionInstance {
  const created = createDistribution({
    kind: entry.kind,
    rank: entry.rank,
    params,
    rng: ctx.rng,
    numEnv: ctx.numEnv,
  });
  if (created.isErr()) {
    throw new InvalidDistributionSpecError({
      message: `Invalid parameters for ${entry.name} at '${path}': ${created.error}`,
      context: specContext(path, source, expression),
    });
  }
  return created.value;
}

function specContext(
  path: string,
  source: string,
  expression: Expression
): ErrorContext {
  return {
    path,
    source,
    distribution: expression.distribution,
    args: structuredClone(expression.args),
    kwargs: structuredClone(expression.kwargs),
  };
}
