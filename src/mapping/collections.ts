/**
 * Collection adapter: arrays ↔ list tags, string-keyed maps ↔ compound tags.
 *
 * Element values go back through the tree walker via the `child` callbacks,
 * so this module never imports the walkers directly.
 */

import { NbtCompound, NbtList, type NbtTag } from '../tags';
import type { WalkContext } from './context';
import { describeType, type AnyType, type MappingType, type SequenceType } from './types';

export type SerializeChild = (
  name: string | null,
  value: unknown,
  type: AnyType,
  ctx: WalkContext,
) => NbtTag | null;

export type DeserializeChild = (type: AnyType, tag: NbtTag, ctx: WalkContext) => unknown;

export type MappingValue = Map<string, unknown> | Record<string, unknown>;

// ============================================================
// Serialize
// ============================================================

/**
 * List tag for a sequence. Empty sequences, and sequences whose every
 * element is unmappable, produce no tag.
 */
export function sequenceToTag(
  name: string | null,
  values: readonly unknown[],
  type: SequenceType,
  ctx: WalkContext,
  serializeChild: SerializeChild,
): NbtList | null {
  if (values.length === 0) return null;

  const list = new NbtList(name);
  values.forEach((element, index) => {
    const child = serializeChild(null, element, type.element, ctx.child(index));
    if (child) list.add(child);
  });

  return list.count > 0 ? list : null;
}

/**
 * Compound tag for a string-keyed mapping. Empty mappings and mappings with
 * non-string keys produce no tag.
 */
export function mappingToTag(
  name: string | null,
  entries: ReadonlyArray<readonly [unknown, unknown]>,
  type: MappingType,
  ctx: WalkContext,
  serializeChild: SerializeChild,
): NbtCompound | null {
  if (entries.length === 0) return null;

  if (type.key !== 'string' || entries.some(([key]) => typeof key !== 'string')) {
    ctx.options.logger.debug(
      { path: ctx.path, type: describeType(type) },
      'Mapping with non-string keys omitted',
    );
    return null;
  }

  const compound = new NbtCompound(name);
  for (const [key, value] of entries) {
    const childName = String(key);
    const child = serializeChild(childName, value, type.value, ctx.child(childName));
    if (child) compound.add(child);
  }

  return compound.count > 0 ? compound : null;
}

/** Entries of a `Map` or a plain object; null for anything else. */
export function entriesOf(value: unknown): Array<[unknown, unknown]> | null {
  if (value instanceof Map) return [...value.entries()];
  if (isPlainObject(value)) return Object.entries(value);
  return null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ============================================================
// Deserialize
// ============================================================

export function tagToSequence(
  type: SequenceType,
  tag: NbtTag,
  ctx: WalkContext,
  deserializeChild: DeserializeChild,
): unknown[] {
  const values: unknown[] = [];
  fillSequence(values, type, tag, ctx, deserializeChild);
  return values;
}

export function tagToMapping(
  type: MappingType,
  tag: NbtTag,
  ctx: WalkContext,
  deserializeChild: DeserializeChild,
): MappingValue {
  const target: MappingValue = type.container === 'map' ? new Map<string, unknown>() : {};
  fillMapping(target, type, tag, ctx, deserializeChild);
  return target;
}

/** Clears the array in place, then appends every list child in order. */
export function fillSequence(
  target: unknown[],
  type: SequenceType,
  tag: NbtTag,
  ctx: WalkContext,
  deserializeChild: DeserializeChild,
): void {
  if (!(tag instanceof NbtList)) {
    throw ctx.error('NBTMAP_E201', `Expected a list tag for ${describeType(type)}, got ${tag.kind}`, {
      type: describeType(type),
      tag: tag.kind,
    });
  }

  target.length = 0;
  let index = 0;
  for (const child of tag) {
    target.push(deserializeChild(type.element, child, ctx.child(index)));
    index++;
  }
}

/**
 * Clears the mapping in place, then sets one entry per compound child in order.
 * Only string-keyed mappings can be read back.
 */
export function fillMapping(
  target: MappingValue,
  type: MappingType,
  tag: NbtTag,
  ctx: WalkContext,
  deserializeChild: DeserializeChild,
): void {
  if (!(tag instanceof NbtCompound)) {
    throw ctx.error('NBTMAP_E201', `Expected a compound tag for ${describeType(type)}, got ${tag.kind}`, {
      type: describeType(type),
      tag: tag.kind,
    });
  }

  if (type.key !== 'string') {
    throw ctx.error('NBTMAP_E201', `Compound names cannot be read as ${type.key} keys`, {
      type: describeType(type),
      tag: tag.kind,
    });
  }

  if (target instanceof Map) {
    target.clear();
  } else {
    for (const key of Object.keys(target)) delete target[key];
  }

  for (const child of tag) {
    const key = child.name ?? '';
    const value = deserializeChild(type.value, child, ctx.child(key));
    if (target instanceof Map) {
      target.set(key, value);
    } else {
      setOwn(target, key, value);
    }
  }
}

/** Assigns an own enumerable property, including keys like `__proto__`. */
export function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
