#!/usr/bin/env node
import { Command } from 'commander';
import { allCommand } from './commands/all.js';
import { gpuCommand } from './commands/gpu.js';
import { hostCommand } from './commands/host.js';
import { findCommand } from './commands/find.js';
import { freeCommand } from './commands/free.js';
import { watchCommand } from './commands/watch.js';
import { serveCommand } from './commands/serve.js';
import { parseNumber } from './commands/context.js';

const program = new Command();

program
  .name('fleet-scout')
  .description('check cpu, memory and gpu load across ssh hosts and pick the least busy one')
  .version('0.1.0');

// every scouting command takes the same trio
function scoutCommand(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .option('-c, --config <path>', 'config file path')
    .option('--json', 'print json instead of a table')
    .option('--fresh', 'skip the cache and probe every host now');
}

scoutCommand('all', 'check every configured server')
  .action(allCommand);

scoutCommand('gpu', 'check gpu servers, utilization and memory')
  .action(gpuCommand);

scoutCommand('host <name>', 'detailed stats for one server')
  .action(hostCommand);

scoutCommand('find', 'pick the least loaded server matching the criteria')
  .option('-g, --gpu', 'only servers with a working gpu')
  .option('--max-cpu <percent>', 'skip servers above this cpu usage', parseNumber)
  .option('--min-memory-gb <gb>', 'want free memory (approximate: skips servers above 80% memory usage)', parseNumber)
  .action(findCommand);

scoutCommand('free', 'servers with low load')
  .option('--max-cpu <percent>', 'cpu usage ceiling', parseNumber, 20)
  .option('--max-memory <percent>', 'memory usage ceiling', parseNumber, 50)
  .action(freeCommand);

program
  .command('watch')
  .description('re-check the fleet every few seconds until ctrl+c')
  .option('-c, --config <path>', 'config file path')
  .option('-i, --interval <seconds>', 'seconds between rounds', parseNumber, 30)
  .option('-g, --gpu', 'only gpu servers')
  .option('--json', 'print json instead of a table')
  .action(watchCommand);

program
  .command('serve')
  .description('serve the scouting operations over http')
  .option('-c, --config <path>', 'config file path')
  .option('-p, --port <number>', 'port, defaults to api.port from the config', parseNumber)
  .option('-b, --bind <address>', 'bind address, defaults to api.host from the config')
  .option('-r, --refresh <seconds>', 're-check the fleet in the background on this interval', parseNumber)
  .action(serveCommand);

program.parse(process.argv);
