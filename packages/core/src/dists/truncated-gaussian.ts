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
import { nonNegative } from './gaussian.js';

export type TruncatedGaussianParams = {
  mean: NumericParam;
  std: NumericParam;
  low: NumericParam;
  high: NumericParam;
};

// Rejection attempts before falling back to clamping
export const MAX_REJECTION_ATTEMPTS = 64;

export class TruncatedGaussian extends Distribution<TruncatedGaussianParams> {
  readonly kind = 'truncated_gaussian';

  protected draw(index: number): number {
    const mean = paramAt(this.params.mean, index);
    const std = paramAt(this.params.std, index);
    const low = paramAt(this.params.low, index);
    const high = paramAt(this.params.high, index);

    let value = mean;
    for (let attempt = 0; attempt < MAX_REJECTION_ATTEMPTS; attempt++) {
      value = this.rng.normal(mean, std);
      if (value >= low && value <= high) return value;
    }
    return Math.min(Math.max(value, low), high);
  }
}

export const truncatedGaussian: DistributionDefinition<TruncatedGaussianParams> =
  {
    kind: 'truncated_gaussian',
    paramNames: ['mean', 'std', 'low', 'high'],
    required: 4,
    vectorParams: ['mean', 'std', 'low', 'high'],

    validate(
      rank: RankSpec,
      [mean, std, low, high]: RawParams
    ): Result<TruncatedGaussianParams, string> {
      const meanParam = numericParam('mean', mean, rank);
      if (meanParam.isErr()) return meanParam;
      const stdParam = numericParam('std', std, rank, nonNegative);
      if (stdParam.isErr()) return stdParam;
      const lowParam = numericParam('low', low, rank);
      if (lowParam.isErr()) return lowParam;
      const highParam = numericParam('high', high, rank);
      if (highParam.isErr()) return highParam;
      if (!everyPair(lowParam.value, highParam.value, (l, h) => l <= h)) {
        return err(`'low' must not exceed 'high'`);
      }
      return ok({
        mean: meanParam.value,
        std: stdParam.value,
        low: lowParam.value,
        high: highParam.value,
      });
    },

    create(
      rng: RandomSource,
      params: TruncatedGaussianParams,
      shape: Shape
    ): TruncatedGaussian {
      return new TruncatedGaussian(rng, params, shape);
    },
  };
