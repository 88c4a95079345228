import { renderJson, renderTable } from '../lib/format.js';
import { fail, loadScout, type CommonOptions } from './context.js';

export async function allCommand(options: CommonOptions) {
  try {
    const { scout } = loadScout(options.config);

    if (scout.hosts.length === 0) {
      console.log('No servers configured');
      return;
    }

    const snapshots = await scout.checkAll(!options.fresh);
    console.log(options.json ? renderJson(snapshots) : renderTable(snapshots));
  } catch (err) {
    fail(err, 'scouting all servers failed');
  }
}
