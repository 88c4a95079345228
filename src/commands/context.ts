import { InvalidArgumentError } from 'commander';
import { FleetConfig } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { FleetScout } from '../services/scout.js';

export interface CommonOptions {
  config?: string;
  json?: boolean;
  fresh?: boolean;
}

export function loadScout(configPath?: string): { config: FleetConfig; scout: FleetScout } {
  const config = FleetConfig.load(configPath);
  return { config, scout: new FleetScout(config) };
}

// commander option parser for numbers
export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('not a number.');
  }
  return parsed;
}

// shared tail of every command: log it and bail with a non-zero exit
export function fail(err: unknown, message: string): never {
  logger.error({ err }, message);
  process.exit(1);
}
