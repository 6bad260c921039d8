// @episodic/core entry point
//
// Public API:
// - Scenario: template + seeded RNG + per-node distribution cache; resolve()
//   returns a concrete tree, its provenance and diagnostics.
// - Episode / ScenarioStats: in-memory record of one resolved scenario and
//   per-path sample statistics across episodes.
// - Building blocks: distribution catalog, expression parser, template model
//   and path helpers, error taxonomy and presenter.

// Scenario
export { Scenario } from './scenario/scenario.js';
export {
  type ScenarioOptions,
  type ScenarioSettings,
  type ScenarioIdentity,
  parseScenarioId,
  validateScenarioSettings,
} from './scenario/options.js';
export {
  type ResolutionResult,
  type Provenance,
  resolveTemplate,
} from './scenario/resolver.js';
export {
  DIAGNOSTIC_CODES,
  type DiagnosticCode,
  type DiagnosticListener,
  type ResolutionDiagnostic,
  formatDiagnostic,
} from './scenario/diagnostics.js';
export {
  DistributionCache,
  CacheTransaction,
  type NodeKey,
} from './scenario/cache.js';

// Episodes
export {
  Episode,
  EPISODE_STATUSES,
  RESERVED_LOG_KEYS,
  type EpisodeStatus,
  type FinalEpisodeStatus,
  type EpisodeRecord,
  type LogOptions,
} from './episode/episode.js';
export {
  ScenarioStats,
  type ScenarioStatsSnapshot,
  createScenarioStats,
  recordEpisode,
} from './episode/scenario-stats.js';

// Distributions
export {
  DISTRIBUTIONS,
  DISTRIBUTION_NAMES,
  type DistributionName,
  type CatalogEntry,
  type CreateDistributionParams,
  createDistribution,
  lookupDistribution,
  isDistributionName,
  validateParams,
} from './dists/catalog.js';
export {
  DISTRIBUTION_KINDS,
  type DistributionKind,
  type DistributionDescriptor,
  type DistributionInstance,
  type DistributionDefinition,
  type Rank,
  type RankSpec,
  type Shape,
} from './dists/distribution.js';
export { finalShape } from './dists/shape.js';

// Expressions and templates
export {
  type Expression,
  type ExpressionForm,
  detectExpression,
  parseExpression,
} from './expression/parser.js';
export {
  type Template,
  type TemplateNode,
  type NodeId,
  buildTemplate,
  toPlain,
} from './template/model.js';
export {
  type LoadedTemplate,
  type TemplateSource,
  loadTemplate,
  toYaml,
} from './template/load.js';
export { findNodePath, findValuePath } from './template/path.js';

// Errors
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type ProductionView,
} from './errors/presenter.js';
export { didYouMean } from './errors/suggestions.js';
export * from './types/errors.js';

export type {
  PlainValue,
  SampleValue,
  ScalarValue,
  ExpressionArg,
} from './types/values.js';
export { type Result, Ok, Err, ok, err } from './types/result.js';

// RNG
export {
  SeededRandom,
  type RandomSource,
  MAX_SEED,
} from './util/rng.js';
