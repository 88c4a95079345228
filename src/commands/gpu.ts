import { renderJson, renderTable } from '../lib/format.js';
import { fail, loadScout, type CommonOptions } from './context.js';

export async function gpuCommand(options: CommonOptions) {
  try {
    const { scout } = loadScout(options.config);

    if (scout.gpuHosts().length === 0) {
      console.log('No GPU servers configured');
      return;
    }

    const snapshots = await scout.checkGpuHosts(!options.fresh);
    console.log(options.json ? renderJson(snapshots) : renderTable(snapshots));
  } catch (err) {
    fail(err, 'scouting gpu servers failed');
  }
}
