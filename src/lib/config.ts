import convict from 'convict';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { logger } from './logger.js';
import { expandServers, type ServerDefinition } from './host-patterns.js';
import type { SshOptions } from './remote.js';
import type { CommandSet, HostDescriptor } from './types.js';

export interface FleetSettings {
  servers: ServerDefinition[];
  ssh: {
    binary: string;
    username: string;
    timeout: number;
    keyFile: string;
    options: string[];
  };
  commands: {
    cpu: string;
    memory: string;
    load: string;
    gpuUsage: string;
    gpuMemory: string;
    gpuProcesses: string;
  };
  cache: {
    ttl: number;
  };
  checker: {
    concurrency: number;
  };
  api: {
    port: number;
    host: string;
    allowedOrigins: string[];
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function assertServers(value: unknown): void {
  if (!Array.isArray(value)) {
    throw new Error('must be an array of server definitions');
  }

  value.forEach((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new Error(`entry ${index} must be an object`);
    }
    const def: Record<string, unknown> = { ...entry };
    if (typeof def.name !== 'string' && typeof def.pattern !== 'string') {
      throw new Error(`entry ${index} needs a "name" or a "pattern"`);
    }
    if (def.name === '' || (def.name === undefined && def.pattern === '')) {
      throw new Error(`entry ${index} has an empty "${def.name === '' ? 'name' : 'pattern'}"`);
    }
    if (def.host !== undefined && typeof def.host !== 'string') {
      throw new Error(`entry ${index} has a non-string "host"`);
    }
    if (def.hasGpu !== undefined && typeof def.hasGpu !== 'boolean') {
      throw new Error(`entry ${index} has a non-boolean "hasGpu"`);
    }
  });
}

convict.addFormat({
  name: 'positive-int',
  validate(value: unknown) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new Error('must be a positive integer');
    }
  },
  coerce: (value: string) => parseInt(value, 10)
});

function assertStringList(value: unknown): void {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new Error('must be an array of strings');
  }
}

const schema: convict.Schema<FleetSettings> = {
  servers: {
    doc: 'hosts to scout, either {name, host?, hasGpu?} or {pattern, hasGpu?}',
    format: assertServers,
    default: []
  },
  ssh: {
    binary: {
      doc: 'ssh client to run',
      format: String,
      default: 'ssh',
      env: 'FLEET_SCOUT_SSH_BINARY'
    },
    username: {
      doc: 'remote user, empty means whatever ssh picks',
      format: String,
      default: process.env.USER ?? '',
      env: 'FLEET_SCOUT_SSH_USER'
    },
    timeout: {
      doc: 'seconds for the connect and for each remote command',
      format: 'positive-int',
      default: 10,
      env: 'FLEET_SCOUT_SSH_TIMEOUT'
    },
    keyFile: {
      doc: 'identity file handed to ssh -i',
      format: String,
      default: '',
      env: 'FLEET_SCOUT_SSH_KEY_FILE'
    },
    options: {
      doc: 'extra ssh arguments',
      format: assertStringList,
      default: ['-o', 'BatchMode=yes', '-o', 'LogLevel=ERROR']
    }
  },
  commands: {
    cpu: {
      doc: 'prints cpu usage percent',
      format: String,
      default: "top -bn1 | awk '/^%?Cpu/ {print 100 - $8; exit}'"
    },
    memory: {
      doc: 'prints memory usage percent',
      format: String,
      default: "free | awk '/^Mem:/ {printf \"%.1f\", $3/$2*100}'"
    },
    load: {
      doc: 'prints the 1, 5 and 15 minute load averages',
      format: String,
      default: "awk '{print $1, $2, $3}' /proc/loadavg"
    },
    gpuUsage: {
      doc: 'prints gpu utilization percent, one line per device',
      format: String,
      default: 'nvidia-smi --query-gpu=utilization.gpu --format=csv,noheader,nounits'
    },
    gpuMemory: {
      doc: 'prints "used, total" MB, one line per device',
      format: String,
      default: 'nvidia-smi --query-gpu=memory.used,memory.total --format=csv,noheader,nounits'
    },
    gpuProcesses: {
      doc: 'prints "pid, name, memory" per gpu process, empty to skip',
      format: String,
      default: 'nvidia-smi --query-compute-apps=pid,process_name,used_memory --format=csv,noheader,nounits'
    }
  },
  cache: {
    ttl: {
      doc: 'seconds a host snapshot stays fresh',
      format: 'nat',
      default: 30,
      env: 'FLEET_SCOUT_CACHE_TTL'
    }
  },
  checker: {
    concurrency: {
      doc: 'max hosts probed at the same time',
      format: 'positive-int',
      default: 10,
      env: 'FLEET_SCOUT_CONCURRENCY'
    }
  },
  api: {
    port: {
      doc: 'http api port',
      format: 'port',
      default: 4100,
      env: 'FLEET_SCOUT_PORT'
    },
    host: {
      doc: 'http api bind address',
      format: String,
      default: '127.0.0.1',
      env: 'FLEET_SCOUT_BIND'
    },
    allowedOrigins: {
      doc: 'browser origins allowed besides localhost, comma separated in the env var',
      format: Array,
      default: [],
      env: 'FLEET_SCOUT_ALLOWED_ORIGINS'
    }
  }
};

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function configSearchPaths(configPath?: string): string[] {
  if (configPath) return [configPath];
  return [
    join(process.cwd(), 'config', 'servers.json'),
    join(homedir(), '.config', 'fleet-scout', 'servers.json')
  ];
}

export class FleetConfig {
  readonly source: string;
  readonly hosts: HostDescriptor[];
  readonly commands: CommandSet;
  readonly ssh: SshOptions;
  readonly cacheTtlMs: number;
  readonly concurrency: number;
  readonly api: { port: number; host: string; allowedOrigins: string[] };

  constructor(settings: FleetSettings, source: string) {
    this.source = source;
    this.hosts = expandServers(settings.servers).map(host => Object.freeze(host));

    const { gpuProcesses, ...required } = settings.commands;
    this.commands = Object.freeze(gpuProcesses ? { ...required, gpuProcesses } : required);

    this.ssh = {
      binary: settings.ssh.binary,
      username: settings.ssh.username,
      timeoutSeconds: settings.ssh.timeout,
      keyFile: settings.ssh.keyFile ? expandHome(settings.ssh.keyFile) : '',
      options: [...settings.ssh.options]
    };
    this.cacheTtlMs = settings.cache.ttl * 1000;
    this.concurrency = settings.checker.concurrency;
    this.api = { ...settings.api, allowedOrigins: [...settings.api.allowedOrigins] };

    const seen = new Set<string>();
    for (const host of this.hosts) {
      if (seen.has(host.name)) {
        logger.warn({ name: host.name, source }, 'duplicate server name, lookups will use the first');
      }
      seen.add(host.name);
    }
  }

  // validates raw settings (parsed json) against the schema, env overrides apply
  static fromObject(raw: object, source: string = 'inline'): FleetConfig {
    const config = convict(schema);
    config.load(raw);

    try {
      config.validate({ allowed: 'strict' });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`invalid configuration in ${source}: ${message}`);
    }

    return new FleetConfig(config.getProperties(), source);
  }

  static load(configPath?: string): FleetConfig {
    const paths = configSearchPaths(configPath);
    const path = paths.find(p => existsSync(p));

    if (!path) {
      throw new ConfigError(`no configuration file found, searched: ${paths.join(', ')}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`could not read ${path}: ${message}`);
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigError(`${path} must contain a json object`);
    }

    const config = FleetConfig.fromObject(raw, path);
    logger.debug({ path, hosts: config.hosts.length }, 'loaded configuration');
    return config;
  }

  getHost(name: string): HostDescriptor | undefined {
    return this.hosts.find(host => host.name === name);
  }

  getGpuHosts(): HostDescriptor[] {
    return this.hosts.filter(host => host.hasGpu);
  }
}
