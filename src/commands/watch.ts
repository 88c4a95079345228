import { logger } from '../lib/logger.js';
import { renderJson, renderTable } from '../lib/format.js';
import { FleetPoller, type PollEvent } from '../services/poller.js';
import { fail, loadScout, type CommonOptions } from './context.js';

export interface WatchOptions extends CommonOptions {
  interval: number;
  gpu?: boolean;
}

export async function watchCommand(options: WatchOptions) {
  try {
    const { scout } = loadScout(options.config);
    const poller = new FleetPoller(scout, options.interval, options.gpu ? 'gpu' : 'all');

    poller.on('poll', (event: PollEvent) => {
      const stamp = new Date(event.timestamp).toLocaleTimeString();
      if (options.json) {
        console.log(renderJson(event));
      } else {
        console.log(`\n${stamp}  (${event.snapshots.length} servers, every ${options.interval}s)\n`);
        console.log(renderTable(event.snapshots));
      }
    });

    const shutdown = async () => {
      logger.info('stopping watch...');
      await poller.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    await poller.start();
  } catch (err) {
    fail(err, 'watch failed');
  }
}
