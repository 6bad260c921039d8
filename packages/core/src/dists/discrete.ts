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

export type DiscreteParams = {
  low: NumericParam;
  high: NumericParam;
  endpoint: boolean;
};

/**
 * Integers in [low, high], or [low, high) when endpoint is false.
 */
export class Discrete extends Distribution<DiscreteParams> {
  readonly kind = 'discrete';

  protected draw(index: number): number {
    return this.rng.integer(
      paramAt(this.params.low, index),
      paramAt(this.params.high, index),
      this.params.endpoint
    );
  }
}

export const discrete: DistributionDefinition<DiscreteParams> = {
  kind: 'discrete',
  paramNames: ['low', 'high', 'endpoint'],
  required: 2,
  vectorParams: ['low', 'high'],

  validate(
    rank: RankSpec,
    [low, high, endpoint]: RawParams
  ): Result<DiscreteParams, string> {
    const lowParam = numericParam('low', low, rank, { integer: true });
    if (lowParam.isErr()) return lowParam;
    const highParam = numericParam('high', high, rank, { integer: true });
    if (highParam.isErr()) return highParam;
    if (endpoint !== undefined && typeof endpoint !== 'boolean') {
      return err(`'endpoint' must be a boolean`);
    }
    const inclusive = endpoint ?? true;
    const ordered = everyPair(lowParam.value, highParam.value, (l, h) =>
      inclusive ? l <= h : l < h
    );
    if (!ordered) {
      return err(
        inclusive
          ? `'low' must not exceed 'high'`
          : `'low' must be below 'high' when endpoint is false`
      );
    }
    return ok({
      low: lowParam.value,
      high: highParam.value,
      endpoint: inclusive,
    });
  },

  create(rng: RandomSource, params: DiscreteParams, shape: Shape): Discrete {
    return new Discrete(rng, params, shape);
  },
};
