import { logger } from '../lib/logger.js';
import type { FleetConfig } from '../lib/config.js';
import type { HostDescriptor, HostSnapshot, SelectionCriteria } from '../lib/types.js';
import { SnapshotCache, type Clock } from '../lib/cache.js';
import { TaskPool } from '../lib/pool.js';
import { SshExecutor, type RemoteExecutor } from '../lib/remote.js';
import { HostChecker } from './checker.js';
import { DEFAULT_FREE_LIMITS, selectBest, selectFree, type FreeLimits } from './selector.js';

export interface BestHostResult {
  best: HostSnapshot | null;
  candidates: number;          // hosts checked for this selection
  approximateMemory: boolean;  // true when minMemoryGb went through the usage proxy
}

export interface FleetScoutOptions {
  executor?: RemoteExecutor;
  clock?: Clock;
}

// what the cli and the http api talk to
export class FleetScout {
  readonly hosts: HostDescriptor[];
  private config: FleetConfig;
  private checker: HostChecker;

  constructor(config: FleetConfig, options: FleetScoutOptions = {}) {
    const clock = options.clock ?? Date.now;

    this.config = config;
    this.hosts = config.hosts;
    this.checker = new HostChecker({
      executor: options.executor ?? new SshExecutor(config.ssh),
      commands: config.commands,
      cache: new SnapshotCache(config.cacheTtlMs, clock),
      pool: new TaskPool(config.concurrency),
      clock
    });
  }

  getHost(name: string): HostDescriptor | undefined {
    return this.config.getHost(name);
  }

  gpuHosts(): HostDescriptor[] {
    return this.config.getGpuHosts();
  }

  async checkAll(useCache: boolean = true): Promise<HostSnapshot[]> {
    return this.checker.checkMany(this.hosts, useCache);
  }

  async checkGpuHosts(useCache: boolean = true): Promise<HostSnapshot[]> {
    return this.checker.checkMany(this.gpuHosts(), useCache);
  }

  // undefined means the name isn't configured, not that the host is down
  async checkHost(name: string, useCache: boolean = true): Promise<HostSnapshot | undefined> {
    const host = this.getHost(name);
    if (!host) return undefined;
    return this.checker.checkOne(host, useCache);
  }

  async findBest(criteria: SelectionCriteria = {}, useCache: boolean = true): Promise<BestHostResult> {
    const pool = criteria.needGpu ? this.gpuHosts() : this.hosts;
    const snapshots = await this.checker.checkMany(pool, useCache);
    const best = selectBest(snapshots, criteria);

    logger.info(
      { criteria, candidates: snapshots.length, best: best?.name ?? null },
      best ? 'selected host' : 'no host matches criteria'
    );

    return {
      best,
      candidates: snapshots.length,
      approximateMemory: criteria.minMemoryGb !== undefined
    };
  }

  async findFree(useCache: boolean = true, limits: FreeLimits = DEFAULT_FREE_LIMITS): Promise<HostSnapshot[]> {
    return selectFree(await this.checkAll(useCache), limits);
  }

  invalidateAll(): void {
    this.checker.invalidateAll();
  }
}
