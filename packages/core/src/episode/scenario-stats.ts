import type { Scenario } from '../scenario/scenario.js';
import { DuplicateLogKeyError, EpisodeStateError } from '../types/errors.js';
import type { SampleValue } from '../types/values.js';
import type { Episode, EpisodeStatus } from './episode.js';

export interface ScenarioStatsSnapshot {
  values: Record<string, SampleValue>;
  results: Record<string, EpisodeStatus>;
  distributionType: string;
}

/**
 * Values sampled at one template path, keyed by episode id, together with
 * each episode's outcome.
 */
export class ScenarioStats {
  private values = new Map<string, SampleValue>();
  private results = new Map<string, EpisodeStatus>();

  constructor(
    public readonly name: string,
    public readonly distributionType: string
  ) {}

  get size(): number {
    return this.values.size;
  }

  /** Vector draws of a `_1d` distribution are stored as their first element. */
  public log(episodeId: string, value: SampleValue, replace = false): void {
    if (this.values.has(episodeId) && !replace) {
      throw new DuplicateLogKeyError(episodeId, 'duplicate');
    }
    this.values.set(episodeId, this.flatten(value));
  }

  public logStatus(
    episodeId: string,
    status: EpisodeStatus,
    replace = false
  ): void {
    if (this.results.has(episodeId) && !replace) {
      throw new DuplicateLogKeyError(episodeId, 'duplicate');
    }
    this.results.set(episodeId, status);
  }

  /** Return everything recorded so far and start over. */
  public finalize(): ScenarioStatsSnapshot {
    const snapshot: ScenarioStatsSnapshot = {
      values: Object.fromEntries(this.values),
      results: Object.fromEntries(this.results),
      distributionType: this.distributionType,
    };
    this.values = new Map();
    this.results = new Map();
    return snapshot;
  }

  private flatten(value: SampleValue): SampleValue {
    if (!this.distributionType.endsWith('_1d') || !Array.isArray(value)) {
      return value;
    }
    return value[0] ?? null;
  }
}

/**
 * One ScenarioStats per expression path of `scenario`.
 */
export function createScenarioStats(
  scenario: Scenario
): Map<string, ScenarioStats> {
  return new Map(
    Object.entries(scenario.distributionTypes()).map(([path, type]) => [
      path,
      new ScenarioStats(path, type),
    ])
  );
}

/**
 * Add a finished episode's parameters and status to `stats`.
 */
export function recordEpisode(
  stats: ReadonlyMap<string, ScenarioStats>,
  episode: Episode,
  replace = false
): void {
  if (!episode.isFinished) {
    throw new EpisodeStateError(
      `Episode ${episode.id} is still running and cannot be recorded`,
      { episodeId: episode.id }
    );
  }
  for (const [path, value] of Object.entries(episode.parameters)) {
    const entry = stats.get(path);
    if (!entry) continue;
    entry.log(episode.id, value, replace);
    entry.logStatus(episode.id, episode.status, replace);
  }
}
