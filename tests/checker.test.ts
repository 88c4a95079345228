import { describe, it, expect, beforeEach } from 'vitest';
import { HostChecker } from '../src/services/checker.js';
import { SnapshotCache } from '../src/lib/cache.js';
import { TaskPool } from '../src/lib/pool.js';
import type { CommandSet } from '../src/lib/types.js';
import { FakeClock, FakeExecutor, TEST_COMMANDS, failure, host } from './helpers.js';

const TTL = 30_000;

describe('HostChecker', () => {
  let clock: FakeClock;
  let executor: FakeExecutor;
  let cache: SnapshotCache;

  function makeChecker(capacity: number = 10, commands: CommandSet = TEST_COMMANDS) {
    return new HostChecker({ executor, commands, cache, pool: new TaskPool(capacity), clock: clock.now });
  }

  beforeEach(() => {
    clock = new FakeClock();
    executor = new FakeExecutor();
    cache = new SnapshotCache(TTL, clock.now);
  });

  describe('checkOne', () => {
    it('builds an online snapshot from the mandatory metrics', async () => {
      executor.healthy('alpha.test', '12.5', '40%', '0.10, 0.20, 0.30');

      const snap = await makeChecker().checkOne(host('alpha'));

      expect(snap).toEqual({
        name: 'alpha',
        host: 'alpha.test',
        hasGpu: false,
        checkedAt: clock.time,
        online: true,
        cpuUsage: 12.5,
        memoryUsage: 40,
        loadAverage: [0.1, 0.2, 0.3]
      });
      expect(executor.commandsFor('alpha.test')).toEqual(['cpu', 'mem', 'load']);
    });

    it('leaves out metrics that did not parse but stays online', async () => {
      executor.healthy('alpha.test', 'garbage', '', '1 2');

      const snap = await makeChecker().checkOne(host('alpha'));

      expect(snap.online).toBe(true);
      expect('cpuUsage' in snap).toBe(false);
      expect('memoryUsage' in snap).toBe(false);
      expect('loadAverage' in snap).toBe(false);
    });

    it('marks the host offline on the first mandatory failure and stops there', async () => {
      executor
        .reply('alpha.test', 'cpu', '12.5')
        .reply('alpha.test', 'mem', failure('ConnectionRefused', 'alpha.test', 'Connection refused to alpha.test'))
        .reply('alpha.test', 'load', '0.1 0.2 0.3');

      const snap = await makeChecker().checkOne(host('alpha', true));

      expect(snap).toEqual({
        name: 'alpha',
        host: 'alpha.test',
        hasGpu: true,
        checkedAt: clock.time,
        online: false,
        error: 'Connection refused to alpha.test',
        errorKind: 'ConnectionRefused'
      });
      expect(executor.commandsFor('alpha.test')).toEqual(['cpu', 'mem']);
    });

    it('probes gpu metrics on gpu hosts', async () => {
      executor
        .healthy('beta.test')
        .reply('beta.test', 'gpu-usage', '45\n55')
        .reply('beta.test', 'gpu-mem', '1000, 4000\n2000, 4000')
        .reply('beta.test', 'gpu-procs', '4242, trainer, 1000');

      const snap = await makeChecker().checkOne(host('beta', true));

      expect(snap.online).toBe(true);
      expect(snap.gpuUsage).toEqual([45, 55]);
      expect(snap.gpuMemory).toEqual([
        { usedMb: 1000, totalMb: 4000, usedPercent: 25 },
        { usedMb: 2000, totalMb: 4000, usedPercent: 50 }
      ]);
      expect(snap.gpuProcesses).toEqual([{ pid: '4242', name: 'trainer', memoryMb: '1000' }]);
      expect(snap.gpuError).toBeUndefined();
    });

    it('skips the process listing when no command is configured', async () => {
      const { gpuProcesses: _unused, ...withoutProcesses } = TEST_COMMANDS;
      executor
        .healthy('beta.test')
        .reply('beta.test', 'gpu-usage', '10')
        .reply('beta.test', 'gpu-mem', '1, 2');

      const snap = await makeChecker(10, withoutProcesses).checkOne(host('beta', true));

      expect(executor.commandsFor('beta.test')).toEqual(['cpu', 'mem', 'load', 'gpu-usage', 'gpu-mem']);
      expect(snap.gpuProcesses).toBeUndefined();
      expect(snap.gpuError).toBeUndefined();
    });

    it('keeps the host online when a gpu command fails', async () => {
      executor
        .healthy('beta.test')
        .reply('beta.test', 'gpu-usage', '70')
        .reply('beta.test', 'gpu-mem', failure('RemoteCommandError', 'beta.test', 'SSH error: nvidia-smi failed'));

      const snap = await makeChecker().checkOne(host('beta', true));

      expect(snap.online).toBe(true);
      expect(snap.cpuUsage).toBe(10);
      expect(snap.gpuUsage).toEqual([70]);
      expect(snap.gpuMemory).toBeUndefined();
      expect(snap.gpuError).toBe('SSH error: nvidia-smi failed');
      expect(snap.gpuErrorKind).toBe('RemoteCommandError');
      expect(executor.commandsFor('beta.test')).not.toContain('gpu-procs');
    });

    it('never runs gpu commands on hosts without a gpu', async () => {
      executor.healthy('alpha.test');

      await makeChecker().checkOne(host('alpha'));

      expect(executor.commandsFor('alpha.test')).toEqual(['cpu', 'mem', 'load']);
    });

    it('serves the second call inside the ttl from the cache', async () => {
      executor.healthy('alpha.test');
      const checker = makeChecker();

      const first = await checker.checkOne(host('alpha'));
      clock.advance(TTL - 1);
      const second = await checker.checkOne(host('alpha'));

      expect(second).toBe(first);
      expect(executor.calls).toHaveLength(3);
    });

    it('probes again once the snapshot is older than the ttl', async () => {
      executor.healthy('alpha.test');
      const checker = makeChecker();

      const first = await checker.checkOne(host('alpha'));
      clock.advance(TTL);
      const second = await checker.checkOne(host('alpha'));

      expect(second).not.toBe(first);
      expect(second.checkedAt).toBe(first.checkedAt + TTL);
      expect(executor.calls).toHaveLength(6);
    });

    it('caches failed checks too', async () => {
      executor.reply('down.test', 'cpu', failure('Timeout', 'down.test', 'Connection timeout to down.test'));
      const checker = makeChecker();

      await checker.checkOne(host('down'));
      const again = await checker.checkOne(host('down'));

      expect(again.online).toBe(false);
      expect(again.errorKind).toBe('Timeout');
      expect(executor.calls).toHaveLength(1);
    });

    it('bypasses the cache when asked to', async () => {
      executor.healthy('alpha.test');
      const checker = makeChecker();

      await checker.checkOne(host('alpha'));
      await checker.checkOne(host('alpha'), false);

      expect(executor.calls).toHaveLength(6);
    });

    it('shares one probe between concurrent callers', async () => {
      executor.healthy('alpha.test');
      const release = executor.hold('alpha.test');
      const checker = makeChecker();

      const a = checker.checkOne(host('alpha'));
      const b = checker.checkOne(host('alpha'));
      release();

      const [first, second] = await Promise.all([a, b]);
      expect(second).toBe(first);
      expect(executor.calls).toHaveLength(3);
    });

    it('returns frozen snapshots', async () => {
      executor.healthy('alpha.test');
      const snap = await makeChecker().checkOne(host('alpha'));
      expect(Object.isFrozen(snap)).toBe(true);
    });

    it('freezes nested metrics so cached snapshots cannot be edited', async () => {
      executor
        .healthy('beta.test')
        .reply('beta.test', 'gpu-usage', '10')
        .reply('beta.test', 'gpu-mem', '100, 1000')
        .reply('beta.test', 'gpu-procs', '7, trainer, 100');
      const checker = makeChecker();

      const snap = await checker.checkOne(host('beta', true));

      expect(Object.isFrozen(snap.loadAverage)).toBe(true);
      expect(Object.isFrozen(snap.gpuUsage)).toBe(true);
      expect(Object.isFrozen(snap.gpuMemory?.[0])).toBe(true);
      expect(Object.isFrozen(snap.gpuProcesses?.[0])).toBe(true);
      expect(() => snap.gpuUsage?.push(100)).toThrow(TypeError);
      expect(() => {
        if (snap.loadAverage) snap.loadAverage[0] = 99;
      }).toThrow(TypeError);

      const cached = await checker.checkOne(host('beta', true));
      expect(cached.gpuUsage).toEqual([10]);
      expect(cached.loadAverage).toEqual([0.1, 0.2, 0.3]);
    });

    it('turns a rejecting executor into an offline snapshot and caches it', async () => {
      executor.crash('bad.test', 'spawn failed');
      const checker = makeChecker();

      const snap = await checker.checkOne(host('bad'));
      await checker.checkOne(host('bad'));

      expect(snap).toEqual({
        name: 'bad',
        host: 'bad.test',
        hasGpu: false,
        checkedAt: clock.time,
        online: false,
        error: 'SSH error: spawn failed',
        errorKind: 'RemoteCommandError'
      });
      expect(executor.commandsFor('bad.test')).toEqual(['cpu']);
    });
  });

  describe('checkMany', () => {
    it('returns results in request order, not completion order', async () => {
      executor.healthy('slow.test', '1').healthy('fast.test', '2').healthy('mid.test', '3');
      const releaseSlow = executor.hold('slow.test');
      const checker = makeChecker();

      const batch = checker.checkMany([host('slow'), host('fast'), host('mid')]);

      // let fast and mid finish first
      await new Promise(resolve => setTimeout(resolve, 10));
      releaseSlow();

      const snapshots = await batch;
      expect(snapshots.map(s => s.name)).toEqual(['slow', 'fast', 'mid']);
      expect(snapshots.map(s => s.cpuUsage)).toEqual([1, 2, 3]);
    });

    it('reports every host even when some fail', async () => {
      executor
        .healthy('alpha.test')
        .reply('ghost.test', 'cpu', failure('UnknownHost', 'ghost.test', 'Unknown host: ghost.test'))
        .healthy('gamma.test');

      const snapshots = await makeChecker().checkMany([host('alpha'), host('ghost', true), host('gamma')]);

      expect(snapshots).toHaveLength(3);
      expect(snapshots.map(s => s.online)).toEqual([true, false, true]);
      expect(snapshots[1].error).toBe('Unknown host: ghost.test');
      expect(snapshots[1].gpuUsage).toBeUndefined();
      expect(snapshots[1].gpuError).toBeUndefined();
    });

    it('keeps the batch alive when the executor rejects for one host', async () => {
      executor.healthy('alpha.test').crash('bad.test', 'boom');

      const snapshots = await makeChecker().checkMany([host('alpha'), host('bad')]);

      expect(snapshots.map(s => s.online)).toEqual([true, false]);
      expect(snapshots[1].error).toBe('SSH error: boom');
    });

    it('keeps concurrency within the pool capacity', async () => {
      const hosts = ['a', 'b', 'c', 'd', 'e', 'f'].map(name => host(name));
      for (const h of hosts) executor.healthy(h.host);

      const snapshots = await makeChecker(2).checkMany(hosts);

      expect(snapshots).toHaveLength(6);
      expect(executor.maxActive).toBeLessThanOrEqual(2);
      expect(executor.maxActive).toBe(2);
    });

    it('returns an empty list for no hosts', async () => {
      await expect(makeChecker().checkMany([])).resolves.toEqual([]);
    });
  });

  it('invalidateAll forces the next check to probe', async () => {
    executor.healthy('alpha.test');
    const checker = makeChecker();

    await checker.checkOne(host('alpha'));
    checker.invalidateAll();
    await checker.checkOne(host('alpha'));

    expect(executor.calls).toHaveLength(6);
  });
});
