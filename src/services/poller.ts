import { EventEmitter } from 'events';
import { logger } from '../lib/logger.js';
import type { HostSnapshot } from '../lib/types.js';
import type { FleetScout } from './scout.js';

export type PollTarget = 'all' | 'gpu';

export interface PollEvent {
  target: PollTarget;
  snapshots: HostSnapshot[];
  timestamp: number;
}

// re-samples the fleet on an interval, always bypassing the cache.
// emits 'poll' with a PollEvent and 'poll-error' with the error
export class FleetPoller extends EventEmitter {
  private scout: FleetScout;
  private target: PollTarget;
  private interval: NodeJS.Timeout | null = null;
  private intervalMs: number;
  private isRunning: boolean = false;
  private polling: boolean = false;

  constructor(scout: FleetScout, intervalSeconds: number = 60, target: PollTarget = 'all') {
    super();
    if (!(intervalSeconds > 0)) {
      throw new RangeError(`poll interval must be positive, got ${intervalSeconds}`);
    }
    this.scout = scout;
    this.target = target;
    this.intervalMs = intervalSeconds * 1000;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('poller already running');
      return;
    }

    this.isRunning = true;

    // first round right away, then on the interval
    await this.poll();

    this.interval = setInterval(() => {
      void this.poll();
    }, this.intervalMs);

    logger.info({ intervalSeconds: this.intervalMs / 1000, target: this.target }, 'poller started');
  }

  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }

    this.isRunning = false;
    logger.info('poller stopped');
  }

  async pollNow(): Promise<void> {
    await this.poll();
  }

  isActive(): boolean {
    return this.isRunning;
  }

  private async poll(): Promise<void> {
    // a slow fleet can outlast the interval, don't stack rounds
    if (this.polling) {
      logger.debug('previous poll still running, skipping');
      return;
    }

    this.polling = true;
    try {
      const snapshots = this.target === 'gpu'
        ? await this.scout.checkGpuHosts(false)
        : await this.scout.checkAll(false);

      const event: PollEvent = { target: this.target, snapshots, timestamp: Date.now() };
      logger.debug({ hosts: snapshots.length }, 'poll finished');
      this.emit('poll', event);
    } catch (err) {
      logger.error({ err }, 'poll failed');
      this.emit('poll-error', err);
    } finally {
      this.polling = false;
    }
  }
}
