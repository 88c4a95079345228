import { logger } from '../lib/logger.js';
import { ScoutApiServer } from '../api/server.js';
import { FleetPoller } from '../services/poller.js';
import { fail, loadScout } from './context.js';

export interface ServeOptions {
  config?: string;
  port?: number;
  bind?: string;
  refresh?: number;
}

export async function serveCommand(options: ServeOptions) {
  try {
    const { config, scout } = loadScout(options.config);

    const server = new ScoutApiServer(scout, {
      port: options.port ?? config.api.port,
      host: options.bind ?? config.api.host,
      allowedOrigins: config.api.allowedOrigins
    });

    // optional background refresh so requests mostly hit a warm cache
    const poller = options.refresh ? new FleetPoller(scout, options.refresh) : null;

    const shutdown = async () => {
      logger.info('shutting down...');
      await poller?.stop();
      await server.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    await server.start();
    await poller?.start();
  } catch (err) {
    fail(err, 'api server failed to start');
  }
}
