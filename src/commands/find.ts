import { renderBest, renderJson } from '../lib/format.js';
import { MEMORY_FILTER_NOTE } from '../services/selector.js';
import { fail, loadScout, type CommonOptions } from './context.js';

export interface FindOptions extends CommonOptions {
  gpu?: boolean;
  maxCpu?: number;
  minMemoryGb?: number;
}

export async function findCommand(options: FindOptions) {
  try {
    const { scout } = loadScout(options.config);

    const result = await scout.findBest(
      { needGpu: options.gpu ?? false, maxCpu: options.maxCpu, minMemoryGb: options.minMemoryGb },
      !options.fresh
    );
    const note = result.approximateMemory ? MEMORY_FILTER_NOTE : undefined;

    if (!result.best) {
      console.log('No servers found matching criteria');
      if (note) console.log(`note: ${note}`);
      process.exitCode = 1;
      return;
    }

    console.log(options.json ? renderJson({ ...result, note }) : renderBest(result.best, note));
  } catch (err) {
    fail(err, 'finding a server failed');
  }
}
