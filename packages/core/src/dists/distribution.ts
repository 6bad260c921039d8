/**
 * Distribution base class and shared parameter validation
 *
 * Every kind is available in four rank variants. Parameters of rank N > 0
 * are either scalars (broadcast) or lists of length N, and broadcast along
 * the last axis of the output shape.
 */

import { type Result, ok, err } from '../types/result.js';
import type { ExpressionArg, SampleValue } from '../types/values.js';
import { isFiniteNumber } from '../types/values.js';
import type { RandomSource } from '../util/rng.js';

export const DISTRIBUTION_KINDS = [
  'uniform',
  'bernoulli',
  'categorical',
  'discrete',
  'log_uniform',
  'gaussian',
  'truncated_gaussian',
] as const;

export type DistributionKind = (typeof DISTRIBUTION_KINDS)[number];

export type Rank = 0 | 1 | 2 | 3;
/** 'any' skips the rank check; used with an explicit output size. */
export type RankSpec = Rank | 'any';

export type Shape = readonly number[];

export type NumericParam = number | number[];

export type ParamRecord = Record<string, ExpressionArg>;

/** Parameters bound by position; missing optional ones are undefined. */
export type RawParams = readonly (ExpressionArg | undefined)[];

export interface DistributionDescriptor {
  kind: DistributionKind;
  params: ParamRecord;
  shape: number[];
}

export interface DistributionInstance {
  readonly kind: DistributionKind;
  readonly shape: Shape;
  /** Draw one value shaped by `shape`. */
  sample(): SampleValue;
  /** Fixed parameters of this instance. */
  describe(): DistributionDescriptor;
}

export interface DistributionDefinition<P extends ParamRecord> {
  readonly kind: DistributionKind;
  readonly paramNames: readonly string[];
  /** Number of leading parameters that must be supplied. */
  readonly required: number;
  /** Parameters broadcast element-wise along the last axis. */
  readonly vectorParams: readonly string[];
  validate(rank: RankSpec, params: RawParams): Result<P, string>;
  create(rng: RandomSource, params: P, shape: Shape): DistributionInstance;
}

export abstract class Distribution<P extends ParamRecord>
  implements DistributionInstance
{
  abstract readonly kind: DistributionKind;

  constructor(
    protected readonly rng: RandomSource,
    protected readonly params: P,
    public readonly shape: Shape
  ) {}

  /** Draw a single element; `index` is the position along the last axis. */
  protected abstract draw(index: number): SampleValue;

  sample(): SampleValue {
    return fillShape(this.shape, (index) => this.draw(index));
  }

  describe(): DistributionDescriptor {
    return {
      kind: this.kind,
      params: structuredClone(this.params),
      shape: [...this.shape],
    };
  }
}

/**
 * Build a nested array of `shape` in row-major order.
 */
export function fillShape(
  shape: Shape,
  draw: (index: number) => SampleValue
): SampleValue {
  const build = (depth: number): SampleValue => {
    const size = shape[depth];
    if (size === undefined) return draw(0);
    if (depth === shape.length - 1) {
      return Array.from({ length: size }, (_, i) => draw(i));
    }
    return Array.from({ length: size }, () => build(depth + 1));
  };
  return build(0);
}

export function paramAt(param: NumericParam, index: number): number {
  if (typeof param === 'number') return param;
  return param[index] ?? Number.NaN;
}

function paramLength(param: NumericParam): number {
  return typeof param === 'number' ? 1 : param.length;
}

export interface NumericRule {
  integer?: boolean;
  check?: (value: number) => boolean;
  /** Completes "'<name>' must ..." when `check` fails. */
  expectation?: string;
}

export function numericParam(
  name: string,
  value: ExpressionArg | undefined,
  rank: RankSpec,
  rule: NumericRule = {}
): Result<NumericParam, string> {
  if (value === undefined) {
    return err(`missing parameter '${name}'`);
  }

  const checkElement = (element: ExpressionArg): Result<number, string> => {
    if (!isFiniteNumber(element)) {
      return err(`'${name}' must be numeric`);
    }
    if (rule.integer && !Number.isInteger(element)) {
      return err(`'${name}' must be an integer`);
    }
    if (rule.check && !rule.check(element)) {
      return err(`'${name}' must ${rule.expectation ?? 'be in range'}`);
    }
    return ok(element);
  };

  if (!Array.isArray(value)) {
    return checkElement(value);
  }

  if (rank === 0) {
    return err(`'${name}' must be a scalar for a rank-0 distribution`);
  }
  if (rank !== 'any' && value.length !== rank) {
    return err(`'${name}' has length ${value.length}, expected ${rank}`);
  }
  if (value.length === 0) {
    return err(`'${name}' must not be an empty list`);
  }
  const numbers: number[] = [];
  for (const element of value) {
    const checked = checkElement(element);
    if (checked.isErr()) return checked;
    numbers.push(checked.value);
  }
  return ok(numbers);
}

/**
 * Apply `predicate` to each broadcast pair of elements.
 */
export function everyPair(
  a: NumericParam,
  b: NumericParam,
  predicate: (x: number, y: number) => boolean
): boolean {
  const length = Math.max(paramLength(a), paramLength(b));
  for (let i = 0; i < length; i++) {
    if (!predicate(paramAt(a, i), paramAt(b, i))) return false;
  }
  return true;
}

/**
 * Check that every vector parameter matches the last axis of `shape`.
 */
export function checkBroadcast(
  params: ParamRecord,
  names: readonly string[],
  shape: Shape
): string | null {
  const lastAxis = shape[shape.length - 1];
  for (const name of names) {
    const value = params[name];
    if (!Array.isArray(value)) continue;
    if (lastAxis === undefined) {
      return `'${name}' is a list but the output is a scalar`;
    }
    if (value.length !== lastAxis) {
      return `'${name}' has length ${value.length}, output last axis is ${lastAxis}`;
    }
  }
  return null;
}
