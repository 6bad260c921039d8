import type {
  DistributionDescriptor,
  DistributionInstance,
} from '../dists/distribution.js';
import type { NodeId } from '../template/model.js';

/**
 * Cache key of a distribution: the identifier of the template node that
 * declares it, i.e. its structural position. Two positions carrying the same
 * expression text get independent instances.
 */
export type NodeKey = NodeId;

/**
 * One instantiated distribution per template node, owned by one Scenario.
 * Instances are never evicted: their parameters stay fixed until the
 * Scenario is re-initialized.
 */
export class DistributionCache {
  private readonly entries = new Map<NodeKey, DistributionInstance>();

  get size(): number {
    return this.entries.size;
  }

  public get(key: NodeKey): DistributionInstance | undefined {
    return this.entries.get(key);
  }

  public has(key: NodeKey): boolean {
    return this.entries.has(key);
  }

  public keys(): NodeKey[] {
    return Array.from(this.entries.keys());
  }

  public describe(key: NodeKey): DistributionDescriptor | undefined {
    return this.entries.get(key)?.describe();
  }

  public clear(): void {
    this.entries.clear();
  }

  /**
   * Start staging new instances. Nothing reaches the cache until `commit()`.
   */
  public begin(): CacheTransaction {
    return new CacheTransaction(
      (key) => this.entries.get(key),
      (staged) => {
        for (const [key, instance] of staged) {
          this.entries.set(key, instance);
        }
      }
    );
  }
}

export class CacheTransaction {
  private readonly staged = new Map<NodeKey, DistributionInstance>();
  private settled = false;

  constructor(
    private readonly lookup: (key: NodeKey) => DistributionInstance | undefined,
    private readonly apply: (
      staged: ReadonlyMap<NodeKey, DistributionInstance>
    ) => void
  ) {}

  get stagedCount(): number {
    return this.staged.size;
  }

  public getOrCreate(
    key: NodeKey,
    factory: () => DistributionInstance
  ): DistributionInstance {
    const existing = this.lookup(key) ?? this.staged.get(key);
    if (existing) return existing;
    const created = factory();
    this.staged.set(key, created);
    return created;
  }

  public commit(): void {
    if (this.settled) return;
    this.settled = true;
    this.apply(this.staged);
    this.staged.clear();
  }

  public discard(): void {
    this.settled = true;
    this.staged.clear();
  }
}
