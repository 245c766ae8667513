export { CamillaConnection, type CamillaConnectionOptions } from './connection';
export { configFileLoader, configFilePath, type SelectionLoader } from './files';
export type { DspEngine } from './types';
export { Reconnector, type Reconnectable } from './reconnect';
