export { loadMapperConfig, CONFIG_DEFAULTS } from './loader';
export type { ConfigWarning, LoadConfigResult } from './loader';
export { nbtMapperConfigSchema } from './schema';
