import { FleetConfig } from '../src/lib/config.js';
import type { RemoteExecutor } from '../src/lib/remote.js';
import type { CommandSet, HostDescriptor, HostSnapshot, RemoteError, RemoteResult } from '../src/lib/types.js';

export const TEST_COMMANDS: CommandSet = {
  cpu: 'cpu',
  memory: 'mem',
  load: 'load',
  gpuUsage: 'gpu-usage',
  gpuMemory: 'gpu-mem',
  gpuProcesses: 'gpu-procs'
};

export function host(name: string, hasGpu: boolean = false): HostDescriptor {
  return { name, host: `${name}.test`, hasGpu };
}

export function snapshot(name: string, fields: Partial<HostSnapshot> = {}): HostSnapshot {
  return { name, host: `${name}.test`, hasGpu: false, checkedAt: 0, online: true, ...fields };
}

export class FakeClock {
  time = 1_000_000;
  now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}

type Reply = string | RemoteError;

// scripted executor: replies per (address, command), unscripted commands fail
export class FakeExecutor implements RemoteExecutor {
  calls: Array<{ host: string; command: string }> = [];
  active = 0;
  maxActive = 0;
  private replies: Map<string, Reply> = new Map();
  private gates: Map<string, Promise<void>> = new Map();
  private crashes: Map<string, string> = new Map();

  reply(address: string, command: string, reply: Reply): this {
    this.replies.set(`${address}\u0000${command}`, reply);
    return this;
  }

  healthy(address: string, cpu = '10.0', memory = '20.0', load = '0.10 0.20 0.30'): this {
    return this.reply(address, TEST_COMMANDS.cpu, cpu)
      .reply(address, TEST_COMMANDS.memory, memory)
      .reply(address, TEST_COMMANDS.load, load);
  }

  // execute rejects for this address instead of returning a result
  crash(address: string, message: string): this {
    this.crashes.set(address, message);
    return this;
  }

  // commands for this address wait until the returned function is called
  hold(address: string): () => void {
    let release: () => void = () => {};
    this.gates.set(address, new Promise<void>(resolve => { release = () => resolve(); }));
    return () => release();
  }

  commandsFor(address: string): string[] {
    return this.calls.filter(call => call.host === address).map(call => call.command);
  }

  async execute(address: string, command: string): Promise<RemoteResult> {
    this.calls.push({ host: address, command });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      const gate = this.gates.get(address);
      if (gate) await gate;
      await Promise.resolve();

      const crash = this.crashes.get(address);
      if (crash !== undefined) throw new Error(crash);

      const reply = this.replies.get(`${address}\u0000${command}`);
      if (reply === undefined) {
        return {
          ok: false,
          error: { kind: 'RemoteCommandError', host: address, message: `SSH error: no reply for ${command}` }
        };
      }
      if (typeof reply === 'string') {
        return { ok: true, output: reply };
      }
      return { ok: false, error: reply };
    } finally {
      this.active--;
    }
  }
}

export function failure(kind: RemoteError['kind'], address: string, message: string): RemoteError {
  return { kind, host: address, message };
}

// two hosts, beta has a gpu; addresses line up with host()
export function testConfig(): FleetConfig {
  return FleetConfig.fromObject({
    servers: [
      { name: 'alpha', host: 'alpha.test' },
      { name: 'beta', host: 'beta.test', hasGpu: true }
    ],
    ssh: { username: 'scout' },
    commands: TEST_COMMANDS,
    checker: { concurrency: 4 }
  });
}
