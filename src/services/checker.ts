import { logger } from '../lib/logger.js';
import type { SnapshotCache, Clock } from '../lib/cache.js';
import type { TaskPool } from '../lib/pool.js';
import type { RemoteExecutor } from '../lib/remote.js';
import {
  parseCpuUsage,
  parseGpuMemory,
  parseGpuProcesses,
  parseGpuUsage,
  parseLoadAverage,
  parseMemoryUsage
} from '../lib/parsers.js';
import type { CommandSet, HostDescriptor, HostSnapshot, RemoteError } from '../lib/types.js';

export interface HostCheckerOptions {
  executor: RemoteExecutor;
  commands: CommandSet;
  cache: SnapshotCache;
  pool: TaskPool;
  clock?: Clock;
}

type Metrics = Omit<HostSnapshot, 'name' | 'host' | 'hasGpu' | 'checkedAt' | 'online'>;

type SequenceResult =
  | { ok: true; outputs: string[] }
  | { ok: false; outputs: string[]; error: RemoteError };

// snapshots are shared through the cache, so their arrays and entries are frozen as well
function freezeDeep(value: unknown): void {
  if (typeof value !== 'object' || value === null) return;
  if (Array.isArray(value)) {
    for (const item of value) freezeDeep(item);
  }
  Object.freeze(value);
}

export class HostChecker {
  private executor: RemoteExecutor;
  private commands: CommandSet;
  private cache: SnapshotCache;
  private pool: TaskPool;
  private now: Clock;
  private inFlight: Map<string, Promise<HostSnapshot>> = new Map();

  constructor(options: HostCheckerOptions) {
    this.executor = options.executor;
    this.commands = options.commands;
    this.cache = options.cache;
    this.pool = options.pool;
    this.now = options.clock ?? Date.now;
  }

  async checkOne(host: HostDescriptor, useCache: boolean = true): Promise<HostSnapshot> {
    if (useCache) {
      const cached = this.cache.get(host.name);
      if (cached) {
        logger.debug({ host: host.name }, 'serving cached snapshot');
        return cached;
      }

      // someone is already probing this host, share their result
      const pending = this.inFlight.get(host.name);
      if (pending) return pending;
    }

    const check: Promise<HostSnapshot> = this.pool
      .run(() => this.probe(host).catch(err => this.crashed(host, err)))
      .then(snapshot => {
        this.cache.put(host.name, snapshot);
        return snapshot;
      })
      .finally(() => {
        if (this.inFlight.get(host.name) === check) {
          this.inFlight.delete(host.name);
        }
      });

    this.inFlight.set(host.name, check);
    return check;
  }

  // results line up with the input, whatever order the hosts answer in
  async checkMany(hosts: HostDescriptor[], useCache: boolean = true): Promise<HostSnapshot[]> {
    const started = this.now();
    const snapshots = await Promise.all(hosts.map(host => this.checkOne(host, useCache)));

    logger.debug(
      {
        hosts: hosts.length,
        online: snapshots.filter(s => s.online).length,
        elapsedMs: this.now() - started
      },
      'batch check finished'
    );

    return snapshots;
  }

  invalidateAll(): void {
    this.cache.invalidateAll();
    logger.debug('snapshot cache cleared');
  }

  private async probe(host: HostDescriptor): Promise<HostSnapshot> {
    const mandatory = await this.runSequence(host, [this.commands.cpu, this.commands.memory, this.commands.load]);
    if (!mandatory.ok) {
      // offline hosts report nothing but the error
      logger.warn({ host: host.name, kind: mandatory.error.kind, error: mandatory.error.message }, 'host check failed');
      return this.snapshot(host, false, { error: mandatory.error.message, errorKind: mandatory.error.kind });
    }

    const [cpuOutput, memoryOutput, loadOutput] = mandatory.outputs;
    const metrics: Metrics = {
      cpuUsage: parseCpuUsage(cpuOutput),
      memoryUsage: parseMemoryUsage(memoryOutput),
      loadAverage: parseLoadAverage(loadOutput)
    };

    if (host.hasGpu) {
      const gpuCommands = [this.commands.gpuUsage, this.commands.gpuMemory];
      if (this.commands.gpuProcesses) gpuCommands.push(this.commands.gpuProcesses);

      // whatever answered before a failure is still worth reporting
      const gpu = await this.runSequence(host, gpuCommands);
      const [usageOutput, memOutput, processOutput] = gpu.outputs;
      if (usageOutput !== undefined) metrics.gpuUsage = parseGpuUsage(usageOutput);
      if (memOutput !== undefined) metrics.gpuMemory = parseGpuMemory(memOutput);
      if (processOutput !== undefined) metrics.gpuProcesses = parseGpuProcesses(processOutput);

      if (!gpu.ok) {
        // gpu trouble never takes the host offline
        logger.warn({ host: host.name, kind: gpu.error.kind, error: gpu.error.message }, 'gpu check failed');
        metrics.gpuError = gpu.error.message;
        metrics.gpuErrorKind = gpu.error.kind;
      }
    }

    return this.snapshot(host, true, metrics);
  }

  // an executor that rejects instead of returning a RemoteResult still only takes its own host down
  private crashed(host: HostDescriptor, err: unknown): HostSnapshot {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ host: host.name, err }, 'host probe threw');
    return this.snapshot(host, false, { error: `SSH error: ${message}`, errorKind: 'RemoteCommandError' });
  }

  // runs commands one after another and stops at the first failure
  private async runSequence(host: HostDescriptor, commands: string[]): Promise<SequenceResult> {
    const outputs: string[] = [];

    for (const command of commands) {
      const result = await this.executor.execute(host.host, command);
      if (!result.ok) {
        return { ok: false, outputs, error: result.error };
      }
      outputs.push(result.output);
    }

    return { ok: true, outputs };
  }

  private snapshot(host: HostDescriptor, online: boolean, metrics: Metrics): HostSnapshot {
    const snapshot: HostSnapshot = {
      name: host.name,
      host: host.host,
      hasGpu: host.hasGpu,
      checkedAt: this.now(),
      online
    };

    // leave missing metrics out entirely instead of carrying undefined keys
    for (const [key, value] of Object.entries(metrics)) {
      if (value !== undefined) {
        freezeDeep(value);
        Object.assign(snapshot, { [key]: value });
      }
    }

    return Object.freeze(snapshot);
  }
}
