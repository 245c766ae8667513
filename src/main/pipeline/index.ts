export * from './types';
export { buildMapping } from './mapping';
export {
  synthesize,
  describeProblems,
  correctionFilterName,
  balanceFilterName,
  mixerName,
  VOLUME_FILTER,
  LOWPASS_FILTER,
  HIGHPASS_FILTER,
  DELAY_FILTER,
} from './synthesizer';
export { encodeDescription, decodeDescription, type WireDocument } from './wire';
export {
  Catalog,
  buildCatalog,
  parseTopologyLabel,
  type CatalogEntry,
  type MenuDefinition,
  type SourceOption,
  type TopologyOption,
} from './catalog';
