import { type Result, ok, err } from '../types/result.js';
import type { ExpressionArg, SampleValue } from '../types/values.js';
import { isFiniteNumber } from '../types/values.js';
import type { RandomSource } from '../util/rng.js';
import {
  Distribution,
  type DistributionDefinition,
  type RankSpec,
  type RawParams,
  type Shape,
} from './distribution.js';

export type CategoricalParams = {
  categories: ExpressionArg[];
  weights: number[] | null;
};

/**
 * Draws one of `categories` per element. Weights are normalized, so they
 * only need to be non-negative with a positive sum; omitted weights mean a
 * uniform choice. The rank only affects the output shape.
 */
export class Categorical extends Distribution<CategoricalParams> {
  readonly kind = 'categorical';
  private readonly probabilities: number[];

  constructor(rng: RandomSource, params: CategoricalParams, shape: Shape) {
    super(rng, params, shape);
    const { categories, weights } = params;
    const raw = weights ?? categories.map(() => 1);
    const total = raw.reduce((sum, weight) => sum + weight, 0);
    this.probabilities = raw.map((weight) => weight / total);
  }

  protected draw(): SampleValue {
    const index = this.rng.categorical(this.probabilities);
    return structuredClone(this.params.categories[index] ?? null);
  }
}

export const categorical: DistributionDefinition<CategoricalParams> = {
  kind: 'categorical',
  paramNames: ['categories', 'weights'],
  required: 1,
  vectorParams: [],

  validate(
    _rank: RankSpec,
    [categories, weights]: RawParams
  ): Result<CategoricalParams, string> {
    if (!Array.isArray(categories)) {
      return err(`'categories' must be a list`);
    }
    if (categories.length === 0) {
      return err(`'categories' must not be empty`);
    }
    if (weights === undefined || weights === null) {
      return ok({ categories, weights: null });
    }
    if (!Array.isArray(weights)) {
      return err(`'weights' must be a list`);
    }
    if (weights.length !== categories.length) {
      return err(
        `'weights' has length ${weights.length}, expected ${categories.length}`
      );
    }
    const numbers: number[] = [];
    for (const weight of weights) {
      if (!isFiniteNumber(weight) || weight < 0) {
        return err(`'weights' must be non-negative numbers`);
      }
      numbers.push(weight);
    }
    if (numbers.reduce((sum, weight) => sum + weight, 0) <= 0) {
      return err(`'weights' must have a positive sum`);
    }
    return ok({ categories, weights: numbers });
  },

  create(
    rng: RandomSource,
    params: CategoricalParams,
    shape: Shape
  ): Categorical {
    return new Categorical(rng, params, shape);
  },
};
