/**
 * Public entry points of the object ↔ tag mapper.
 */

import { loadMapperConfig, CONFIG_DEFAULTS } from '../config';
import { createLogger, type Logger } from '../shared/logger';
import { NbtMapperError, type NbtMapperConfig, type UnmappedPolicy } from '../shared/types';
import { NbtCompound, type NbtTag } from '../tags';
import { WalkContext, type ResolvedOptions } from './context';
import { deserializeValue, fillValue } from './deserializer';
import { recordTypeOf } from './registry';
import { serializeValue } from './serializer';
import { describeType, t, type AnyType, type Infer } from './types';

export interface MapperOptions {
  /** Descriptor of the root value. Defaults to the registered record type of the value. */
  type?: AnyType;
  maxDepth?: number;
  onUnmapped?: UnmappedPolicy;
  logger?: Logger;
}

const defaultLogger = createLogger({ module: 'mapper' });

function resolveOptions(options: MapperOptions): ResolvedOptions {
  return {
    maxDepth: options.maxDepth ?? CONFIG_DEFAULTS.max_depth,
    onUnmapped: options.onUnmapped ?? CONFIG_DEFAULTS.on_unmapped,
    logger: options.logger ?? defaultLogger,
  };
}

function rootType(value: object, options: MapperOptions): AnyType {
  return options.type ?? recordTypeOf(value) ?? t.dynamic();
}

/**
 * Serialize a record (or mapping) into a compound tag.
 * A record whose members all elide produces an empty compound.
 */
export function serializeObject(value: object, options: MapperOptions = {}): NbtCompound {
  if (value === null || value === undefined) {
    throw new NbtMapperError({
      code: 'NBTMAP_E101',
      message: 'Cannot serialize a null or undefined value',
      context: { path: 'root' },
    });
  }

  const type = rootType(value, options);
  const ctx = new WalkContext(resolveOptions(options));
  const tag = serializeValue(null, value, type, ctx);

  if (tag === null) return new NbtCompound();
  if (!(tag instanceof NbtCompound)) {
    throw new NbtMapperError({
      code: 'NBTMAP_E102',
      message: `Root value serialized to a ${tag.kind} tag, expected a compound`,
      context: { path: 'root', type: describeType(type), tag: tag.kind },
    });
  }
  return tag;
}

/** Build a new value of the described type from a tag. */
export function deserializeObject<D extends AnyType>(
  type: D,
  tag: NbtTag,
  options: Omit<MapperOptions, 'type'> = {},
): Infer<D> {
  const ctx = new WalkContext(resolveOptions(options));
  return deserializeValue(type, tag, ctx) as Infer<D>;
}

/**
 * Populate an existing instance in place from a tag. The instance is never
 * replaced, so the caller observes every change.
 */
export function fillObject<T extends object>(value: T, tag: NbtTag, options: MapperOptions = {}): void {
  if (value === null || value === undefined) {
    throw new NbtMapperError({
      code: 'NBTMAP_E101',
      message: 'Cannot fill a null or undefined value',
      context: { path: 'root' },
    });
  }

  const ctx = new WalkContext(resolveOptions(options));
  fillValue(value, rootType(value, options), tag, ctx);
}

export interface Mapper {
  readonly config: Required<NbtMapperConfig>;
  serializeObject(value: object, type?: AnyType): NbtCompound;
  deserializeObject<D extends AnyType>(type: D, tag: NbtTag): Infer<D>;
  fillObject<T extends object>(value: T, tag: NbtTag, type?: AnyType): void;
}

/** Mapper bound to a configuration and logger. */
export function createMapper(config: NbtMapperConfig = {}, logger: Logger = defaultLogger): Mapper {
  const resolved: Required<NbtMapperConfig> = {
    max_depth: config.max_depth ?? CONFIG_DEFAULTS.max_depth,
    on_unmapped: config.on_unmapped ?? CONFIG_DEFAULTS.on_unmapped,
  };
  const base = { maxDepth: resolved.max_depth, onUnmapped: resolved.on_unmapped, logger };

  return {
    config: resolved,
    serializeObject(value: object, type?: AnyType): NbtCompound {
      return serializeObject(value, { ...base, type });
    },
    deserializeObject<D extends AnyType>(type: D, tag: NbtTag): Infer<D> {
      return deserializeObject(type, tag, base);
    },
    fillObject<T extends object>(value: T, tag: NbtTag, type?: AnyType): void {
      fillObject(value, tag, { ...base, type });
    },
  };
}

/** Mapper configured from a .nbtmapper.yml file. */
export function loadMapper(filePath?: string, logger?: Logger): Mapper {
  const { config } = loadMapperConfig(filePath);
  return createMapper(config, logger);
}
