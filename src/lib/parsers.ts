import type { GpuMemory, GpuProcess, LoadAverage } from './types.js';

// parsers never throw, anything they can't read comes back undefined.
// list parsers return undefined rather than [] so "no gpu" and
// "gpu with nothing on it" stay distinguishable

const UNSUPPORTED_MARKER = 'not found';
const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;

// plain decimals only, no hex, binary or exponent forms
function toNumber(text: string): number | undefined {
  return DECIMAL.test(text) ? parseFloat(text) : undefined;
}

function toInteger(text: string): number | undefined {
  return INTEGER.test(text) ? parseInt(text, 10) : undefined;
}

function lines(output: string): string[] {
  return output.trim().split('\n').map(line => line.trim());
}

function unsupported(output: string): boolean {
  return !output || output.toLowerCase().includes(UNSUPPORTED_MARKER);
}

export function parsePercentage(output: string): number | undefined {
  if (!output) return undefined;
  return toNumber(output.trim().replace(/%+$/, '').trim());
}

export function parseCpuUsage(output: string): number | undefined {
  return parsePercentage(output);
}

export function parseMemoryUsage(output: string): number | undefined {
  return parsePercentage(output);
}

/**
 * Reads "0.10, 0.20, 0.30" or "0.10 0.20 0.30". Extra tokens after the
 * first three are ignored.
 */
export function parseLoadAverage(output: string): LoadAverage | undefined {
  if (!output) return undefined;

  const tokens = output.trim().split(/[,\s]+/);
  if (tokens.length < 3) return undefined;

  const one = toNumber(tokens[0]);
  const five = toNumber(tokens[1]);
  const fifteen = toNumber(tokens[2]);
  if (one === undefined || five === undefined || fifteen === undefined) {
    return undefined;
  }

  return [one, five, fifteen];
}

export function parseGpuUsage(output: string): number[] | undefined {
  if (unsupported(output)) return undefined;

  const usages: number[] = [];
  for (const line of lines(output)) {
    const usage = toInteger(line);
    if (usage !== undefined) usages.push(usage);
  }

  return usages.length > 0 ? usages : undefined;
}

// "used, total" in MB, one line per device
export function parseGpuMemory(output: string): GpuMemory[] | undefined {
  if (unsupported(output)) return undefined;

  const memories: GpuMemory[] = [];
  for (const line of lines(output)) {
    const parts = line.split(',');
    if (parts.length < 2) continue;

    const usedMb = toInteger(parts[0].trim());
    const totalMb = toInteger(parts[1].trim());
    if (usedMb === undefined || totalMb === undefined) continue;

    memories.push({
      usedMb,
      totalMb,
      usedPercent: totalMb > 0 ? Math.round((usedMb / totalMb) * 1000) / 10 : 0
    });
  }

  return memories.length > 0 ? memories : undefined;
}

// "pid, name, memory" per line
export function parseGpuProcesses(output: string): GpuProcess[] | undefined {
  if (unsupported(output)) return undefined;

  const processes: GpuProcess[] = [];
  for (const line of lines(output)) {
    if (!line) continue;

    const parts = line.split(',').map(part => part.trim());
    if (parts.length < 3) continue;

    processes.push({ pid: parts[0], name: parts[1], memoryMb: parts[2] });
  }

  return processes.length > 0 ? processes : undefined;
}
