import type { HostDescriptor } from './types.js';

export interface ServerDefinition {
  name?: string;
  host?: string;
  pattern?: string;
  hasGpu?: boolean;
}

// prefix{01..12}suffix, the width of the start number sets the zero padding
const RANGE = /^(.*?)\{(\d+)\.\.(\d+)\}(.*)$/;

export function expandPattern(pattern: string): string[] {
  const match = RANGE.exec(pattern);
  if (!match) return [pattern];

  const [, prefix, startText, endText, suffix] = match;
  const start = parseInt(startText, 10);
  const end = parseInt(endText, 10);

  const names: string[] = [];
  for (let i = start; i <= end; i++) {
    names.push(`${prefix}${String(i).padStart(startText.length, '0')}${suffix}`);
  }
  return names;
}

export function expandServers(definitions: ServerDefinition[]): HostDescriptor[] {
  const hosts: HostDescriptor[] = [];

  for (const def of definitions) {
    const hasGpu = def.hasGpu ?? false;

    if (def.name) {
      hosts.push({ name: def.name, host: def.host ?? def.name, hasGpu });
    } else if (def.pattern) {
      for (const name of expandPattern(def.pattern)) {
        hosts.push({ name, host: name, hasGpu });
      }
    }
  }

  return hosts;
}
