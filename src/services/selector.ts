import type { HostSnapshot, SelectionCriteria } from '../lib/types.js';

// stands in for "min free memory": only usage percent is known, not totals,
// so any host above this counts as too full
export const MEMORY_USAGE_CEILING = 80;

export const MEMORY_FILTER_NOTE =
  `memory filter is approximate: hosts above ${MEMORY_USAGE_CEILING}% memory usage are skipped, free GB is not measured`;

export interface FreeLimits {
  maxCpu: number;
  maxMemory: number;
}

export const DEFAULT_FREE_LIMITS: FreeLimits = { maxCpu: 20, maxMemory: 50 };

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// lower is better
export function scoreSnapshot(snapshot: HostSnapshot): number {
  const cpu = snapshot.cpuUsage ?? 100;
  const memory = snapshot.memoryUsage ?? 100;
  const gpu = snapshot.gpuUsage ? mean(snapshot.gpuUsage) : 0;
  return cpu + memory + gpu;
}

export function filterCandidates(snapshots: HostSnapshot[], criteria: SelectionCriteria): HostSnapshot[] {
  return snapshots.filter(snapshot => {
    if (!snapshot.online) return false;

    if (criteria.maxCpu !== undefined) {
      if (snapshot.cpuUsage === undefined || snapshot.cpuUsage > criteria.maxCpu) return false;
    }

    if (criteria.minMemoryGb !== undefined) {
      if (snapshot.memoryUsage === undefined || snapshot.memoryUsage > MEMORY_USAGE_CEILING) return false;
    }

    if (criteria.needGpu && !snapshot.gpuUsage) return false;

    return true;
  });
}

/**
 * Picks the least loaded host that satisfies the criteria. The batch should
 * already be narrowed to the candidate pool (gpu hosts when a gpu is needed).
 * Equal scores keep batch order, so the first one seen wins.
 */
export function selectBest(snapshots: HostSnapshot[], criteria: SelectionCriteria = {}): HostSnapshot | null {
  const ranked = filterCandidates(snapshots, criteria)
    .map((snapshot, index) => ({ snapshot, index, score: scoreSnapshot(snapshot) }))
    .sort((a, b) => a.score - b.score || a.index - b.index);

  return ranked.length > 0 ? ranked[0].snapshot : null;
}

export function selectFree(snapshots: HostSnapshot[], limits: FreeLimits = DEFAULT_FREE_LIMITS): HostSnapshot[] {
  return snapshots.filter(
    snapshot =>
      snapshot.online &&
      (snapshot.cpuUsage ?? 100) < limits.maxCpu &&
      (snapshot.memoryUsage ?? 100) < limits.maxMemory
  );
}
