import { renderHostDetail, renderJson } from '../lib/format.js';
import { fail, loadScout, type CommonOptions } from './context.js';

export async function hostCommand(name: string, options: CommonOptions) {
  try {
    const { scout } = loadScout(options.config);

    const snapshot = await scout.checkHost(name, !options.fresh);
    if (!snapshot) {
      console.log(`Server '${name}' not found in configuration`);
      process.exitCode = 1;
      return;
    }

    console.log(options.json ? renderJson(snapshot) : renderHostDetail(snapshot));
  } catch (err) {
    fail(err, 'server check failed');
  }
}
