// Alternate loading path: per-combination config files on the engine host

import * as path from 'path';
import type { DspEngine } from './types';

/**
 * Config file for a menu combination, e.g. ('2.1 DRC', 'Stream') ->
 * `<configDir>/Stream-2.1-DRC.yml`
 */
export function configFilePath(configDir: string, topologyLabel: string, sourceLabel: string): string {
  return path.join(configDir, `${sourceLabel}-${topologyLabel.replace(/ /g, '-')}.yml`);
}

export type SelectionLoader = (engine: DspEngine, topologyLabel: string, sourceLabel: string) => Promise<void>;

/**
 * Loader that points the engine at a prepared config file and reloads it,
 * instead of pushing the in-memory catalog description.
 */
export function configFileLoader(configDir: string): SelectionLoader {
  return async (engine, topologyLabel, sourceLabel) => {
    await engine.setConfigName(configFilePath(configDir, topologyLabel, sourceLabel));
    await engine.reload();
  };
}
