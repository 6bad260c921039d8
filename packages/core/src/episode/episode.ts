import type { ResolutionDiagnostic } from '../scenario/diagnostics.js';
import type { Provenance } from '../scenario/resolver.js';
import { toYaml } from '../template/load.js';
import { DuplicateLogKeyError, EpisodeStateError } from '../types/errors.js';
import type { PlainValue } from '../types/values.js';

export const EPISODE_STATUSES = [
  'running',
  'success',
  'failed',
  'canceled',
  'errored',
] as const;

export type EpisodeStatus = (typeof EPISODE_STATUSES)[number];
export type FinalEpisodeStatus = Exclude<EpisodeStatus, 'running'>;

/** Keys an episode log may never use. */
export const RESERVED_LOG_KEYS: ReadonlySet<string> = new Set(['scenario']);

export interface EpisodeInit {
  id: string;
  scenario: PlainValue;
  parameters: Provenance;
  diagnostics?: ResolutionDiagnostic[];
}

/** Snapshot handed over when an episode finishes. */
export interface EpisodeRecord {
  id: string;
  status: FinalEpisodeStatus;
  errorMessage?: string;
  /** YAML text of the concrete scenario. */
  scenario: string;
  parameters: Provenance;
  logs: Record<string, unknown>;
}

export interface LogOptions {
  replace?: boolean;
}

/**
 * One resolved scenario plus the values logged while it runs.
 */
export class Episode {
  public readonly id: string;
  public readonly scenario: PlainValue;
  public readonly parameters: Provenance;
  public readonly diagnostics: readonly ResolutionDiagnostic[];

  private _status: EpisodeStatus = 'running';
  private readonly logs = new Map<string, unknown>();

  constructor(init: EpisodeInit) {
    this.id = init.id;
    this.scenario = init.scenario;
    this.parameters = init.parameters;
    this.diagnostics = init.diagnostics ?? [];
  }

  get status(): EpisodeStatus {
    return this._status;
  }

  get isFinished(): boolean {
    return this._status !== 'running';
  }

  get yaml(): string {
    return toYaml(this.scenario);
  }

  /** Top-level entry of the concrete scenario. */
  public get(key: string): PlainValue | undefined {
    const { scenario } = this;
    if (
      scenario === null ||
      typeof scenario !== 'object' ||
      Array.isArray(scenario)
    ) {
      return undefined;
    }
    return Object.prototype.hasOwnProperty.call(scenario, key)
      ? scenario[key]
      : undefined;
  }

  /**
   * Record named values. All keys are checked before any is stored.
   */
  public log(data: Record<string, unknown>, options: LogOptions = {}): void {
    if (this.isFinished) {
      throw new EpisodeStateError(
        `Episode ${this.id} is already finished (${this._status})`,
        { episodeId: this.id }
      );
    }
    const entries = Object.entries(data);
    for (const [key] of entries) {
      if (RESERVED_LOG_KEYS.has(key)) {
        throw new DuplicateLogKeyError(key, 'reserved');
      }
      if (this.logs.has(key) && !options.replace) {
        throw new DuplicateLogKeyError(key, 'duplicate');
      }
    }
    for (const [key, value] of entries) {
      this.logs.set(key, value);
    }
  }

  public logged(key: string): unknown {
    return this.logs.get(key);
  }

  public success(): EpisodeRecord {
    return this.finish('success');
  }

  public fail(): EpisodeRecord {
    return this.finish('failed');
  }

  public discard(): EpisodeRecord {
    return this.finish('canceled');
  }

  public finish(
    status: FinalEpisodeStatus,
    errorMessage?: string
  ): EpisodeRecord {
    if (this.isFinished) {
      throw new EpisodeStateError(
        `Episode ${this.id} has already been finished`,
        { episodeId: this.id, status: this._status }
      );
    }
    this._status = status;
    return {
      id: this.id,
      status,
      ...(errorMessage !== undefined ? { errorMessage } : {}),
      scenario: this.yaml,
      parameters: structuredClone(this.parameters),
      logs: Object.fromEntries(this.logs),
    };
  }

  /**
   * Run `body` and finish the episode with 'success', or with 'errored' and
   * the error text when it throws. An episode `body` finished itself is left
   * alone.
   */
  public async run<T>(body: (episode: Episode) => T | Promise<T>): Promise<T> {
    try {
      const result = await body(this);
      if (!this.isFinished) this.finish('success');
      return result;
    } catch (error) {
      if (!this.isFinished) {
        this.finish(
          'errored',
          error instanceof Error ? (error.stack ?? error.message) : String(error)
        );
      }
      throw error;
    }
  }
}
