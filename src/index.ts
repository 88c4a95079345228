export { FleetConfig, ConfigError, type FleetSettings } from './lib/config.js';
export { expandPattern, expandServers, type ServerDefinition } from './lib/host-patterns.js';
export { SnapshotCache, type Clock } from './lib/cache.js';
export { TaskPool } from './lib/pool.js';
export {
  SshExecutor,
  classifyFailure,
  runProcess,
  type RemoteExecutor,
  type SshOptions,
  type ProcessOutcome,
  type ProcessRunner
} from './lib/remote.js';
export * from './lib/parsers.js';
export * from './lib/format.js';
export type * from './lib/types.js';
export { HostChecker, type HostCheckerOptions } from './services/checker.js';
export * from './services/selector.js';
export { FleetScout, type BestHostResult, type FleetScoutOptions } from './services/scout.js';
export { FleetPoller, type PollEvent, type PollTarget } from './services/poller.js';
export { ScoutApiServer, isOriginAllowed, type ApiServerOptions } from './api/server.js';
