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

export type BernoulliParams = { p: NumericParam };

export class Bernoulli extends Distribution<BernoulliParams> {
  readonly kind = 'bernoulli';

  protected draw(index: number): number {
    return this.rng.bernoulli(paramAt(this.params.p, index));
  }
}

export const bernoulli: DistributionDefinition<BernoulliParams> = {
  kind: 'bernoulli',
  paramNames: ['p'],
  required: 1,
  vectorParams: ['p'],

  validate(rank: RankSpec, [p]: RawParams): Result<BernoulliParams, string> {
    const probability = numericParam('p', p, rank, {
      check: (value) => value >= 0 && value <= 1,
      expectation: 'be a probability in [0, 1]',
    });
    if (probability.isErr()) return probability;
    return ok({ p: probability.value });
  },

  create(rng: RandomSource, params: BernoulliParams, shape: Shape): Bernoulli {
    return new Bernoulli(rng, params, shape);
  },
};
