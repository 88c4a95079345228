import { renderJson, renderTable } from '../lib/format.js';
import { fail, loadScout, type CommonOptions } from './context.js';

export interface FreeOptions extends CommonOptions {
  maxCpu: number;
  maxMemory: number;
}

export async function freeCommand(options: FreeOptions) {
  try {
    const { scout } = loadScout(options.config);

    const free = await scout.findFree(!options.fresh, { maxCpu: options.maxCpu, maxMemory: options.maxMemory });
    if (free.length === 0) {
      console.log('No servers currently have low load');
      return;
    }

    console.log(options.json ? renderJson(free) : renderTable(free));
  } catch (err) {
    fail(err, 'scouting free servers failed');
  }
}
