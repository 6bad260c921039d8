import { type Result, ok } from '../types/result.js';
import type { RandomSource } from '../util/rng.js';
import {
  Distribution,
  type DistributionDefinition,
  type NumericParam,
  type RankSpec,
  type RawParams,
  type Shape,
  numericParam,
  paramAt,
} from './distribution.js';

export type GaussianParams = { mean: NumericParam; std: NumericParam };

export const nonNegative = {
  check: (value: number) => value >= 0,
  expectation: 'be non-negative',
};

export class Gaussian extends Distribution<GaussianParams> {
  readonly kind = 'gaussian';

  protected draw(index: number): number {
    return this.rng.normal(
      paramAt(this.params.mean, index),
      paramAt(this.params.std, index)
    );
  }
}

export const gaussian: DistributionDefinition<GaussianParams> = {
  kind: 'gaussian',
  paramNames: ['mean', 'std'],
  required: 2,
  vectorParams: ['mean', 'std'],

  validate(
    rank: RankSpec,
    [mean, std]: RawParams
  ): Result<GaussianParams, string> {
    const meanParam = numericParam('mean', mean, rank);
    if (meanParam.isErr()) return meanParam;
    const stdParam = numericParam('std', std, rank, nonNegative);
    if (stdParam.isErr()) return stdParam;
    return ok({ mean: meanParam.value, std: stdParam.value });
  },

  create(rng: RandomSource, params: GaussianParams, shape: Shape): Gaussian {
    return new Gaussian(rng, params, shape);
  },
};
