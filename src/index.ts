export * from './tags';
export * from './mapping';
export { loadMapperConfig, CONFIG_DEFAULTS } from './config';
export type { ConfigWarning, LoadConfigResult } from './config';
export { NbtMapperError } from './shared/types';
export type { ErrorCode, ErrorContext, NbtMapperConfig, UnmappedPolicy } from './shared/types';
