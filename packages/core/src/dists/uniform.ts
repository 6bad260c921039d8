import { type Result, ok, err } from '../types/result.js';
import type { RandomSource } from '../util/rng.js';
import {
  Distribution,
  type DistributionDefinition,
  type NumericParam,
  type RankSpec,
  type RawParams,
  type Shape,
  everyPair,
  numericParam,
  paramAt,
} from './distribution.js';

export type UniformParams = { low: NumericParam; high: NumericParam };

export class Uniform extends Distribution<UniformParams> {
  readonly kind = 'uniform';

  protected draw(index: number): number {
    return this.rng.uniform(
      paramAt(this.params.low, index),
      paramAt(this.params.high, index)
    );
  }
}

export const uniform: DistributionDefinition<UniformParams> = {
  kind: 'uniform',
  paramNames: ['low', 'high'],
  required: 2,
  vectorParams: ['low', 'high'],

  validate(rank: RankSpec, [low, high]: RawParams): Result<UniformParams, string> {
    const lowParam = numericParam('low', low, rank);
    if (lowParam.isErr()) return lowParam;
    const highParam = numericParam('high', high, rank);
    if (highParam.isErr()) return highParam;
    if (!everyPair(lowParam.value, highParam.value, (l, h) => l <= h)) {
      return err(`'low' must not exceed 'high'`);
    }
    return ok({ low: lowParam.value, high: highParam.value });
  },

  create(rng: RandomSource, params: UniformParams, shape: Shape): Uniform {
    return new Uniform(rng, params, shape);
  },
};
