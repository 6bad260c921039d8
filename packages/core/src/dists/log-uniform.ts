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

export type LogUniformParams = { low: NumericParam; high: NumericParam };

const positive = {
  check: (value: number) => value > 0,
  expectation: 'be positive',
};

/**
 * exp(uniform(log low, log high))
 */
export class LogUniform extends Distribution<LogUniformParams> {
  readonly kind = 'log_uniform';

  protected draw(index: number): number {
    const low = paramAt(this.params.low, index);
    const high = paramAt(this.params.high, index);
    const value = Math.exp(this.rng.uniform(Math.log(low), Math.log(high)));
    // exp(log(x)) is not always x
    return Math.min(Math.max(value, low), high);
  }
}

export const logUniform: DistributionDefinition<LogUniformParams> = {
  kind: 'log_uniform',
  paramNames: ['low', 'high'],
  required: 2,
  vectorParams: ['low', 'high'],

  validate(
    rank: RankSpec,
    [low, high]: RawParams
  ): Result<LogUniformParams, string> {
    const lowParam = numericParam('low', low, rank, positive);
    if (lowParam.isErr()) return lowParam;
    const highParam = numericParam('high', high, rank, positive);
    if (highParam.isErr()) return highParam;
    if (!everyPair(lowParam.value, highParam.value, (l, h) => l <= h)) {
      return err(`'low' must not exceed 'high'`);
    }
    return ok({ low: lowParam.value, high: highParam.value });
  },

  create(
    rng: RandomSource,
    params: LogUniformParams,
    shape: Shape
  ): LogUniform {
    return new LogUniform(rng, params, shape);
  },
};
