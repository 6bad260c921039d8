import { randomUUID } from 'node:crypto';

import type { DistributionDescriptor } from '../dists/distribution.js';
import { Episode } from '../episode/episode.js';
import { loadTemplate } from '../template/load.js';
import { type Template, buildTemplate } from '../template/model.js';
import { ScenarioBusyError } from '../types/errors.js';
import type { PlainValue } from '../types/values.js';
import { SeededRandom } from '../util/rng.js';
import { DistributionCache } from './cache.js';
import type { DiagnosticListener } from './diagnostics.js';
import {
  type ScenarioIdentity,
  type ScenarioOptions,
  parseScenarioId,
  validateScenarioSettings,
} from './options.js';
import { type ResolutionResult, resolveTemplate } from './resolver.js';

interface ScenarioState {
  template: Template;
  yaml: string;
  rng: SeededRandom;
  identity: ScenarioIdentity;
  numEnv: number | undefined;
  onDiagnostic: DiagnosticListener | undefined;
}

function prepareState(options: ScenarioOptions): ScenarioState {
  const settings = validateScenarioSettings(options);
  const identity = parseScenarioId(settings.scenarioId);
  const loaded = loadTemplate(options.template);
  return {
    template: buildTemplate(loaded.tree),
    yaml: loaded.yaml,
    rng: new SeededRandom(settings.seed),
    identity,
    numEnv: settings.numEnv,
    onDiagnostic: options.onDiagnostic,
  };
}

/**
 * A template plus everything needed to resolve it repeatedly: the seeded
 * random stream and one cached distribution per expression node.
 *
 * `resolve()` is synchronous, so calls issued from concurrent tasks run one
 * after another and never interleave draws or cache writes.
 */
export class Scenario {
  private state: ScenarioState;
  private readonly cache = new DistributionCache();
  private resolving = false;

  constructor(options: ScenarioOptions = {}) {
    this.state = prepareState(options);
  }

  /**
   * Replace template, seed, id and environment count. Cached distributions
   * of the previous template are dropped. On error the Scenario is left as
   * it was.
   */
  public init(options: ScenarioOptions = {}): void {
    this.assertIdle();
    const next = prepareState(options);
    this.cache.clear();
    this.state = next;
  }

  get id(): string {
    return this.state.identity.id;
  }

  get version(): number | undefined {
    return this.state.identity.version;
  }

  get seed(): number {
    return this.state.rng.seed;
  }

  get numEnv(): number | undefined {
    return this.state.numEnv;
  }

  /** Plain copy of the template, expressions as written. */
  get template(): PlainValue {
    return structuredClone(this.state.template.source);
  }

  /** Template as YAML; text templates come back as written. */
  get yaml(): string {
    return this.state.yaml;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /** Paths of all expression nodes, in traversal order. */
  get expressionPaths(): string[] {
    const { template } = this.state;
    return template.expressions.map((node) => template.pathOf(node.id));
  }

  /**
   * Distribution name written at each expression path. Nodes whose text
   * does not parse are left out.
   */
  public distributionTypes(): Record<string, string> {
    const { template } = this.state;
    const types: [string, string][] = [];
    for (const node of template.expressions) {
      if (node.expression.isOk()) {
        types.push([template.pathOf(node.id), node.expression.value.distribution]);
      }
    }
    return Object.fromEntries(types);
  }

  /**
   * Fixed parameters of the distribution cached for the node at `path`, if
   * it has been resolved at least once.
   */
  public describeDistribution(
    path: string
  ): DistributionDescriptor | undefined {
    const { template } = this.state;
    const node = template.expressions.find(
      (candidate) => template.pathOf(candidate.id) === path
    );
    return node ? this.cache.describe(node.id) : undefined;
  }

  /**
   * Produce one concrete tree and its provenance. Distributions created by
   * a failing call are not kept.
   */
  public resolve(): ResolutionResult {
    this.assertIdle();
    this.resolving = true;
    const transaction = this.cache.begin();
    try {
      const result = resolveTemplate({
        template: this.state.template,
        cache: transaction,
        rng: this.state.rng,
        numEnv: this.state.numEnv,
        onDiagnostic: this.state.onDiagnostic,
      });
      transaction.commit();
      return result;
    } catch (error) {
      transaction.discard();
      throw error;
    } finally {
      this.resolving = false;
    }
  }

  public createEpisode(episodeId?: string): Episode {
    const { scenario, provenance, diagnostics } = this.resolve();
    return new Episode({
      id: episodeId ?? randomUUID(),
      scenario,
      parameters: provenance,
      diagnostics,
    });
  }

  private assertIdle(): void {
    if (this.resolving) {
      throw new ScenarioBusyError(this.id);
    }
  }
}
