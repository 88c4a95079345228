import type { HostSnapshot } from './types.js';

export interface HostStatusRow {
  server: string;
  status: 'online' | 'offline';
  cpuUsage: string;
  memoryUsage: string;
  loadAvg: string;
  gpuUsage: string;
  gpuMemory: string;
  gpuError?: string;
  error?: string;
}

const NOT_AVAILABLE = 'N/A';
const NO_GPU = 'No GPU';

function percent(value: number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : `${value.toFixed(1)}%`;
}

function gpuUsageText(usage: number[] | undefined): string {
  if (!usage) return NO_GPU;
  if (usage.length === 1) return `${usage[0]}%`;

  const avg = usage.reduce((sum, u) => sum + u, 0) / usage.length;
  return `${avg.toFixed(0)}% (avg of ${usage.length})`;
}

function gpuMemoryText(snapshot: HostSnapshot): string {
  if (!snapshot.gpuMemory) return NO_GPU;

  const used = snapshot.gpuMemory.reduce((sum, g) => sum + g.usedMb, 0);
  const total = snapshot.gpuMemory.reduce((sum, g) => sum + g.totalMb, 0);
  if (total <= 0) return NOT_AVAILABLE;

  return `${((used / total) * 100).toFixed(0)}% (${used}/${total} MB)`;
}

export function formatHostStatus(snapshot: HostSnapshot): HostStatusRow {
  const row: HostStatusRow = {
    server: snapshot.name,
    status: snapshot.online ? 'online' : 'offline',
    cpuUsage: percent(snapshot.cpuUsage),
    memoryUsage: percent(snapshot.memoryUsage),
    loadAvg: snapshot.loadAverage
      ? snapshot.loadAverage.map(load => load.toFixed(2)).join(', ')
      : NOT_AVAILABLE,
    gpuUsage: gpuUsageText(snapshot.gpuUsage),
    gpuMemory: gpuMemoryText(snapshot)
  };

  if (snapshot.gpuError) row.gpuError = snapshot.gpuError;
  if (snapshot.error) row.error = snapshot.error;

  return row;
}

type Column = { header: string; key: keyof HostStatusRow };

const BASE_COLUMNS: Column[] = [
  { header: 'Server', key: 'server' },
  { header: 'Status', key: 'status' },
  { header: 'CPU', key: 'cpuUsage' },
  { header: 'Memory', key: 'memoryUsage' },
  { header: 'Load Avg', key: 'loadAvg' }
];

const GPU_COLUMNS: Column[] = [
  { header: 'GPU Usage', key: 'gpuUsage' },
  { header: 'GPU Memory', key: 'gpuMemory' }
];

/**
 * Plain aligned table, one row per host. GPU columns only show up when at
 * least one host in the batch has a GPU.
 */
export function renderTable(snapshots: HostSnapshot[]): string {
  const columns = snapshots.some(s => s.hasGpu) ? [...BASE_COLUMNS, ...GPU_COLUMNS] : BASE_COLUMNS;
  const rows = snapshots.map(formatHostStatus);
  const cells = rows.map(row => columns.map(col => row[col.key] ?? NOT_AVAILABLE));

  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...cells.map(line => line[i].length))
  );

  const line = (values: string[]) => values.map((v, i) => v.padEnd(widths[i])).join('  ').trimEnd();

  return [
    line(columns.map(col => col.header)),
    line(widths.map(w => '-'.repeat(w))),
    ...cells.map(line)
  ].join('\n');
}

function titleCase(key: string): string {
  return key
    .replace(/([A-Z])/g, ' $1')
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function detailLines(row: HostStatusRow, skipServer: boolean): string[] {
  return Object.entries(row)
    .filter(([key]) => !(skipServer && key === 'server'))
    .map(([key, value]) => `${titleCase(key)}: ${value}`);
}

export function renderHostDetail(snapshot: HostSnapshot): string {
  const lines = detailLines(formatHostStatus(snapshot), false);

  if (snapshot.gpuProcesses) {
    lines.push('', 'GPU Processes:');
    for (const proc of snapshot.gpuProcesses) {
      lines.push(`  - ${proc.name} (PID: ${proc.pid}, Memory: ${proc.memoryMb} MB)`);
    }
  }

  return lines.join('\n');
}

export function renderBest(snapshot: HostSnapshot, note?: string): string {
  const lines = [`Best available server: ${snapshot.name}`, '', ...detailLines(formatHostStatus(snapshot), true)];
  if (note) lines.push('', `note: ${note}`);
  return lines.join('\n');
}

export function renderJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
