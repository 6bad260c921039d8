/**
 * Distribution Catalog
 *
 * Closed set of seven kinds, each addressable from a template in four rank
 * variants: `uniform`, `uniform_1d`, `uniform_2d`, `uniform_3d`, ...
 */

import { type Result, ok, err } from '../types/result.js';
import type { RandomSource } from '../util/rng.js';
import { bernoulli } from './bernoulli.js';
import { categorical } from './categorical.js';
import { discrete } from './discrete.js';
import {
  DISTRIBUTION_KINDS,
  type DistributionDefinition,
  type DistributionInstance,
  type DistributionKind,
  type ParamRecord,
  type Rank,
  type RankSpec,
  type RawParams,
  type Shape,
  checkBroadcast,
} from './distribution.js';
import { gaussian } from './gaussian.js';
import { logUniform } from './log-uniform.js';
import { finalShape } from './shape.js';
import { truncatedGaussian } from './truncated-gaussian.js';
import { uniform } from './uniform.js';

export const DISTRIBUTIONS = {
  uniform,
  bernoulli,
  categorical,
  discrete,
  log_uniform: logUniform,
  gaussian,
  truncated_gaussian: truncatedGaussian,
} satisfies {
  [K in DistributionKind]: DistributionDefinition<ParamRecord>;
};

const RANK_SUFFIXES = ['', '_1d', '_2d', '_3d'] as const;

type RankSuffix = (typeof RANK_SUFFIXES)[number];

export type DistributionName = `${DistributionKind}${RankSuffix}`;

export interface CatalogEntry {
  name: DistributionName;
  kind: DistributionKind;
  rank: Rank;
  definition: DistributionDefinition<ParamRecord>;
}

const RANKS: readonly Rank[] = [0, 1, 2, 3];

const CATALOG = new Map<string, CatalogEntry>();
for (const kind of DISTRIBUTION_KINDS) {
  for (const rank of RANKS) {
    const name: DistributionName = `${kind}${RANK_SUFFIXES[rank]}`;
    CATALOG.set(name, { name, kind, rank, definition: DISTRIBUTIONS[kind] });
  }
}

export const DISTRIBUTION_NAMES: readonly DistributionName[] = Array.from(
  CATALOG.values(),
  (entry) => entry.name
);

export function lookupDistribution(name: string): CatalogEntry | undefined {
  return CATALOG.get(name);
}

export function isDistributionName(name: string): name is DistributionName {
  return CATALOG.has(name);
}

/**
 * Boolean form of parameter validation for `kind` at `rank`.
 */
export function validateParams(
  kind: DistributionKind,
  rank: RankSpec,
  params: RawParams
): boolean {
  return DISTRIBUTIONS[kind].validate(rank, params).isOk();
}

export interface CreateDistributionParams {
  kind: DistributionKind;
  rank: RankSpec;
  params: RawParams;
  rng: RandomSource;
  /** Parallel environments the output is replicated across. */
  numEnv?: number;
  /** Explicit output size; only used when rank is 'any'. */
  size?: number | Shape;
}

/**
 * Validate parameters, compute the broadcast shape and build an instance.
 * The error is a human-readable reason.
 */
export function createDistribution({
  kind,
  rank,
  params,
  rng,
  numEnv,
  size,
}: CreateDistributionParams): Result<DistributionInstance, string> {
  const definition: DistributionDefinition<ParamRecord> = DISTRIBUTIONS[kind];
  const validated = definition.validate(rank, params);
  if (validated.isErr()) return validated;

  const shape = finalShape(rank, numEnv, size);
  const broadcastProblem = checkBroadcast(
    validated.value,
    definition.vectorParams,
    shape
  );
  if (broadcastProblem) return err(broadcastProblem);

  return ok(definition.create(rng, validated.value, shape));
}
