import type { HostSnapshot } from './types.js';

export type Clock = () => number;

interface CacheEntry {
  snapshot: HostSnapshot;
  capturedAt: number;
}

// per-host snapshots with a single ttl. the host list is fixed so the
// map never grows past the fleet size; expired entries are dropped on read
export class SnapshotCache {
  private entries: Map<string, CacheEntry> = new Map();
  private ttlMs: number;
  private now: Clock;

  constructor(ttlMs: number, now: Clock = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(hostName: string): HostSnapshot | undefined {
    const entry = this.entries.get(hostName);
    if (!entry) return undefined;

    if (this.now() - entry.capturedAt >= this.ttlMs) {
      this.entries.delete(hostName);
      return undefined;
    }

    return entry.snapshot;
  }

  // whole-entry replace, whoever finishes last wins
  put(hostName: string, snapshot: HostSnapshot): void {
    this.entries.set(hostName, { snapshot, capturedAt: snapshot.checkedAt });
  }

  invalidateAll(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  get ttl(): number {
    return this.ttlMs;
  }
}
